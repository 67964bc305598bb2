/**
 * @file Rates Server
 *
 * Stand-in for an exchange-rate API: fixed USD table with per-request
 * jitter. Stateless across requests.
 *
 * @module
 */

import http from 'http';
import type { EventEmitter } from 'events';
import { ratesRequest_handle } from './RatesHandler.js';
import { json_send } from './http.js';
import type { RatesHandlerDeps } from './types.js';
import type { RandomSource } from '../telemetry/random.js';
import { ConsoleLog } from '../telemetry/log.js';

export interface RatesServerOptions {
    host: string;
    port: number;
    random: RandomSource;
    log?: ConsoleLog;
    clock?: () => Date;
}

/**
 * Create (but do not start) the rates HTTP server.
 */
export function ratesServer_create(options: RatesServerOptions): http.Server {
    const deps: RatesHandlerDeps = {
        random: options.random,
        log: options.log ?? new ConsoleLog(),
        clock: options.clock ?? ((): Date => new Date()),
        host: options.host,
        port: options.port
    };

    return http.createServer((req: http.IncomingMessage, res: http.ServerResponse): void => {
        ratesRequest_handle(req, res, deps)
            .then((handled: boolean): void => {
                if (!handled) json_send(res, { error: 'Not found', path: req.url ?? '/' }, 404);
            })
            .catch((error: unknown): void => {
                deps.log.error_log(`Rates request failed: ${String(error)}`);
                if (!res.headersSent) json_send(res, { error: 'Internal error' }, 500);
            });
    });
}

/**
 * Start listening; resolves with the bound server.
 */
export function ratesServer_start(options: RatesServerOptions): Promise<http.Server> {
    const server: http.Server = ratesServer_create(options);
    return new Promise((resolve: (server: http.Server) => void, reject: (reason: Error) => void): void => {
        server.once('error', reject);
        server.listen(options.port, options.host, (): void => {
            server.off('error', reject);
            resolve(server);
        });
    });
}

/**
 * Close the server on the first SIGINT or SIGTERM.
 *
 * @param signals - Signal source; the process unless a test substitutes one.
 */
export function ratesShutdown_bind(
    server: http.Server,
    log: ConsoleLog,
    signals: EventEmitter = process
): void {
    let closing: boolean = false;
    const shutdown = (signal: string): void => {
        if (closing) return;
        closing = true;
        log.info_log(`Received ${signal}, shutting down...`);
        server.close((): void => log.info_log('Goodbye.'));
    };
    signals.once('SIGINT', (): void => shutdown('SIGINT'));
    signals.once('SIGTERM', (): void => shutdown('SIGTERM'));
}
