/**
 * @file Cycle Reporters
 *
 * Status and failure reporting for the two engines. The auth engine reports
 * on its own NDJSON channel; the metric engine reports on the console.
 *
 * @module telemetry/reporters
 */

import type { AuthBatch, MetricBatch, TelemetryReporter } from './types.js';
import type { NdjsonSink } from './sinks/NdjsonSink.js';
import { batch_summarize, type AuthBatchSummary } from './generators/AuthEventGenerator.js';
import { statusRecord_build, errorRecord_build } from './records.js';
import { ConsoleLog, timestamp_format } from './log.js';
import { errorMessage_get } from '../config/errors.js';

export const AUTH_STATUS_EVERY: number = 10;
export const METRICS_STATUS_EVERY: number = 4;

export class AuthLogReporter implements TelemetryReporter<AuthBatch> {
    constructor(
        private readonly sink: NdjsonSink<AuthBatch>,
        private readonly every: number = AUTH_STATUS_EVERY,
        private readonly clock: () => Date = (): Date => new Date()
    ) {}

    cycle_report(cycle: number, batch: AuthBatch): void {
        if (cycle % this.every !== 0) return;
        const summary: AuthBatchSummary = batch_summarize(batch);
        this.sink.record_write(statusRecord_build(this.clock(), cycle, summary.events, summary.failures));
    }

    failure_report(cycle: number, error: unknown): void {
        this.sink.record_write(errorRecord_build(this.clock(), cycle, error));
    }
}

export interface MetricsReporterOptions {
    log: ConsoleLog;
    tenants: number;
    providers: number;
    every?: number;
    clock?: () => Date;
}

export class MetricsReporter implements TelemetryReporter<MetricBatch> {
    private readonly log: ConsoleLog;
    private readonly tenants: number;
    private readonly providers: number;
    private readonly every: number;
    private readonly clock: () => Date;

    constructor(options: MetricsReporterOptions) {
        this.log = options.log;
        this.tenants = options.tenants;
        this.providers = options.providers;
        this.every = options.every ?? METRICS_STATUS_EVERY;
        this.clock = options.clock ?? ((): Date => new Date());
    }

    cycle_report(cycle: number, batch: MetricBatch): void {
        if (batch.truncated) {
            this.log.warn_log(`Cycle ${cycle} stopped at the sample cap (${batch.samples.length} samples)`);
        }
        if (cycle % this.every !== 0) return;
        this.log.ok_log(`Pushed metrics at ${timestamp_format(this.clock())}`);
        this.log.info_log(`  Generated data for ${this.tenants} tenants, ${this.providers} providers`);
    }

    failure_report(_cycle: number, error: unknown): void {
        this.log.error_log(`Error pushing metrics: ${errorMessage_get(error)}`);
    }
}
