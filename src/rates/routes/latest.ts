/**
 * @file Latest Rates Route
 *
 * Serves `GET /api/latest.json` in the shape of the upstream exchange-rate
 * API. An Authorization header is accepted but never checked.
 *
 * @module
 */

import { json_send, header_get } from '../http.js';
import { latestPayload_build, type LatestRatesPayload } from '../rates.js';
import type { RatesRouteContext } from '../types.js';

export const AUTH_PREVIEW_LENGTH: number = 20;

/**
 * Handle the latest-rates endpoint.
 *
 * @returns True if handled.
 */
export async function route_latestHandle(context: RatesRouteContext): Promise<boolean> {
    if (context.pathname !== '/api/latest.json' || context.method !== 'GET') {
        return false;
    }

    const { deps } = context;
    const auth: string | null = header_get(context.req, 'authorization');
    if (auth) {
        deps.log.info_log(`[Rates] Request with auth: ${auth.slice(0, AUTH_PREVIEW_LENGTH)}...`);
    }

    const payload: LatestRatesPayload = latestPayload_build(deps.clock(), deps.random);
    deps.log.info_log(`[Rates] Served ${Object.keys(payload.rates).length} exchange rates`);
    json_send(context.res, payload);
    return true;
}
