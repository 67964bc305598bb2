/**
 * @file Rates Request Handler
 *
 * Dispatches requests across the route modules in order.
 *
 * @module
 */

import http from 'http';
import { URL } from 'url';
import { corsPreflight_handle, json_send } from './http.js';
import { errorMessage_get } from '../config/errors.js';
import { route_healthHandle } from './routes/health.js';
import { route_latestHandle } from './routes/latest.js';
import type { RatesHandlerDeps, RatesRouteContext, RatesRouteHandler } from './types.js';

const ROUTES: readonly RatesRouteHandler[] = [
    route_latestHandle,
    route_healthHandle
];

/**
 * Handle one HTTP request.
 * Returns true if the request was handled, false if it should fall through.
 */
export async function ratesRequest_handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    deps: RatesHandlerDeps
): Promise<boolean> {
    const url: URL = new URL(req.url || '/', `http://${deps.host}:${deps.port}`);
    const method: string = req.method || 'GET';

    if (corsPreflight_handle(method, res)) {
        return true;
    }

    const context: RatesRouteContext = {
        req,
        res,
        deps,
        url,
        pathname: url.pathname,
        method
    };

    try {
        for (const route of ROUTES) {
            if (await route(context)) return true;
        }
    } catch (e: unknown) {
        json_send(res, { error: errorMessage_get(e) }, 500);
        return true;
    }

    return false;
}
