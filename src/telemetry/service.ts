/**
 * @file Telemetry Service
 * Supervised periodic task: generate a batch, publish it, sleep, repeat.
 * A failing cycle is reported and the loop carries on; only a
 * configuration error stops it.
 */

import { setTimeout as delay } from 'timers/promises';
import type { TelemetryRegistryEntry } from './types.js';
import { ConfigurationError } from '../config/errors.js';

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TelemetryServiceOptions {
    intervalMs: number;
    sleep?: Sleeper;
}

export interface CycleOutcome {
    cycle: number;
    ok: boolean;
    error?: unknown;
}

/**
 * Default sleeper: resolves after `ms`, or early when the signal aborts.
 */
export async function sleep_abortable(ms: number, signal: AbortSignal): Promise<void> {
    try {
        await delay(ms, undefined, { signal });
    } catch (err: unknown) {
        if (!signal.aborted) throw err;
    }
}

export class TelemetryService<T> {
    private readonly entry: TelemetryRegistryEntry<T>;
    private readonly intervalMs: number;
    private readonly sleep: Sleeper;
    private controller: AbortController | null = null;
    private tickCount: number = 0;

    constructor(entry: TelemetryRegistryEntry<T>, options: TelemetryServiceOptions) {
        this.entry = entry;
        this.intervalMs = options.intervalMs;
        this.sleep = options.sleep ?? sleep_abortable;
    }

    /** Cycles run so far. */
    get cycle(): number {
        return this.tickCount;
    }

    get running(): boolean {
        return this.controller !== null;
    }

    /**
     * Runs the loop until `stop()`. Rejects only on a ConfigurationError.
     */
    async start(): Promise<void> {
        if (this.controller) return;
        const controller: AbortController = new AbortController();
        this.controller = controller;

        try {
            while (!controller.signal.aborted) {
                await this.tick();
                if (controller.signal.aborted) break;
                await this.sleep(this.intervalMs, controller.signal);
            }
        } finally {
            this.controller = null;
        }
    }

    /**
     * Stops the loop. The running cycle finishes; a pending sleep is cut short.
     */
    stop(): void {
        this.controller?.abort();
    }

    /**
     * Single cycle.
     */
    async tick(): Promise<CycleOutcome> {
        this.tickCount++;
        const cycle: number = this.tickCount;

        try {
            const batch: T = this.entry.generator.generate(cycle);
            await this.entry.sink.publish(batch);
            await this.report_attempt(() => this.entry.reporter.cycle_report(cycle, batch));
            return { cycle, ok: true };
        } catch (err: unknown) {
            if (err instanceof ConfigurationError) throw err;
            await this.report_attempt(() => this.entry.reporter.failure_report(cycle, err));
            return { cycle, ok: false, error: err };
        }
    }

    /**
     * Reports are best-effort; a reporter that fails lands on stderr.
     */
    private async report_attempt(report: () => void | Promise<void>): Promise<void> {
        try {
            await report();
        } catch (err: unknown) {
            console.error(`Telemetry reporter failed in entry [${this.entry.id}]:`, err);
        }
    }
}
