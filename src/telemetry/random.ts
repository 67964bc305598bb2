/**
 * @file Seeded Random Source
 *
 * Explicitly owned PRNG handed to each generator. Uses mulberry32, so a
 * given seed always replays the same sequence of draws.
 *
 * @module telemetry/random
 */

export interface RandomSource {
    /** Seed the source was created with. */
    readonly seed: number;

    /** Float in [0, 1). */
    next(): number;

    /** Integer in [min, max] inclusive. */
    int(min: number, max: number): number;

    /** Float in [min, max). */
    float(min: number, max: number): number;

    /** Uniform pick from a non-empty list. */
    pick<T>(items: readonly T[]): T;

    /** True with the given probability. */
    chance(probability: number): boolean;
}

/**
 * Create a mulberry32 random source.
 *
 * @param seed - 32-bit seed; non-integers are truncated.
 */
export function random_create(seed: number): RandomSource {
    let state: number = seed | 0;

    const next = (): number => {
        state = (state + 0x6d2b79f5) | 0;
        let t: number = Math.imul(state ^ (state >>> 15), 1 | state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };

    return {
        seed: seed | 0,
        next,
        int(min: number, max: number): number {
            return Math.floor(next() * (max - min + 1)) + min;
        },
        float(min: number, max: number): number {
            return next() * (max - min) + min;
        },
        pick<T>(items: readonly T[]): T {
            if (items.length === 0) {
                throw new RangeError('Cannot pick from an empty list');
            }
            return items[Math.floor(next() * items.length)];
        },
        chance(probability: number): boolean {
            return next() < probability;
        }
    };
}

/**
 * Seed used when none is configured. Changes every millisecond.
 */
export function seed_derive(): number {
    return Date.now() % 2147483647;
}
