/**
 * @file Health Route
 *
 * @module
 */

import { json_send } from '../http.js';
import type { RatesRouteContext } from '../types.js';

/**
 * Handle the liveness endpoint.
 *
 * @returns True if handled.
 */
export async function route_healthHandle(context: RatesRouteContext): Promise<boolean> {
    if (context.pathname !== '/health' || context.method !== 'GET') {
        return false;
    }

    json_send(context.res, { status: 'healthy' });
    return true;
}
