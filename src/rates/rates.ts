/**
 * @file Rate Table
 *
 * Builds the `latest.json` payload. Each currency gets its own relative
 * jitter per request; nothing is kept between requests.
 *
 * @module rates/rates
 */

import type { RandomSource } from '../telemetry/random.js';
import { BASE_CURRENCY, BASE_RATES } from './data/baseRates.js';

/** Maximum relative deviation applied to each rate. */
export const RATE_JITTER: number = 0.02;

export interface LatestRatesPayload {
    disclaimer: string;
    license: string;
    timestamp: number;
    base: string;
    rates: Record<string, number>;
}

/**
 * Apply independent ±2% jitter to every rate, rounded to 6 decimals.
 */
export function rates_jitter(base: Readonly<Record<string, number>>, random: RandomSource): Record<string, number> {
    const jittered: Record<string, number> = {};
    for (const [currency, rate] of Object.entries(base)) {
        const variation: number = random.float(-RATE_JITTER, RATE_JITTER);
        jittered[currency] = Math.round(rate * (1 + variation) * 1e6) / 1e6;
    }
    return jittered;
}

export function latestPayload_build(now: Date, random: RandomSource): LatestRatesPayload {
    return {
        disclaimer: 'Mock data for development - Usage subject to terms: https://openexchangerates.org/terms',
        license: 'Mock License',
        timestamp: Math.floor(now.getTime() / 1000),
        base: BASE_CURRENCY,
        rates: rates_jitter(BASE_RATES, random),
    };
}
