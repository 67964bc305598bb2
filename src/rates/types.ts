/**
 * @file Rates Handler Types
 *
 * Shared interfaces for request handling and route modules.
 *
 * @module
 */

import http from 'http';
import type { URL } from 'url';
import type { RandomSource } from '../telemetry/random.js';
import type { ConsoleLog } from '../telemetry/log.js';

export interface RatesHandlerDeps {
    random: RandomSource;
    log: ConsoleLog;
    clock: () => Date;
    host: string;
    port: number;
}

export interface RatesRouteContext {
    req: http.IncomingMessage;
    res: http.ServerResponse;
    deps: RatesHandlerDeps;
    url: URL;
    pathname: string;
    method: string;
}

export type RatesRouteHandler = (context: RatesRouteContext) => Promise<boolean>;
