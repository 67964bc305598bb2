/**
 * @file HTTP Helpers
 *
 * Transport-layer helpers used by the rates route handlers.
 *
 * @module
 */

import http from 'http';

const CORS_HEADERS: Readonly<Record<string, string>> = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization'
};

/**
 * Write a JSON response with standard CORS headers.
 *
 * @param res - HTTP response object.
 * @param data - Serializable response payload.
 * @param status - HTTP status code.
 */
export function json_send(res: http.ServerResponse, data: unknown, status: number = 200): void {
    res.writeHead(status, {
        'Content-Type': 'application/json',
        ...CORS_HEADERS
    });
    res.end(JSON.stringify(data, null, 2));
}

/**
 * Handle CORS preflight request.
 *
 * @returns True if request was handled as preflight.
 */
export function corsPreflight_handle(method: string, res: http.ServerResponse): boolean {
    if (method !== 'OPTIONS') {
        return false;
    }

    res.writeHead(204, CORS_HEADERS);
    res.end();
    return true;
}

/**
 * Read a single-valued request header.
 */
export function header_get(req: http.IncomingMessage, name: string): string | null {
    const value: string | string[] | undefined = req.headers[name.toLowerCase()];
    if (Array.isArray(value)) return value[0] ?? null;
    return value ?? null;
}
