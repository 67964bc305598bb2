#!/usr/bin/env npx tsx
/**
 * @file Traffic Metrics Generator
 *
 * Pushes a sparse, correlated traffic-metric surface to a Pushgateway every
 * METRICS_PUSH_INTERVAL_MS (default 15s).
 *
 * Usage:
 *   TENANTS=acme PUSHGATEWAY_URL=http://localhost:9091 npx tsx src/cli/metrics-generator.ts
 *
 * @module
 */

import { boot_resolve, signals_bind, fatal_report, type BootContext } from './bootstrap.js';
import { metricsPipeline_create } from '../telemetry/pipelines.js';
import { TelemetryService } from '../telemetry/service.js';
import { ConsoleLog } from '../telemetry/log.js';
import { pushUrl_build } from '../telemetry/sinks/PushGatewaySink.js';
import type { MetricBatch } from '../telemetry/types.js';

const log: ConsoleLog = new ConsoleLog();

async function main(): Promise<void> {
    const boot: BootContext = boot_resolve();
    const { settings, topology } = boot;

    log.banner_print('Operational API Metrics Generator', [
        `Target: ${pushUrl_build(settings.pushgatewayUrl, settings.metricsJob).toString()}`,
        `Interval: ${settings.metricsIntervalMs / 1000}s`,
        `Tenants: ${settings.tenants.join(', ')}`,
        `Sample cap per cycle: ${settings.maxSamples}`,
        `Seed: ${boot.random.seed}`,
    ]);

    const service: TelemetryService<MetricBatch> = new TelemetryService<MetricBatch>(
        metricsPipeline_create({ settings, topology, random: boot.random, log }),
        { intervalMs: settings.metricsIntervalMs }
    );
    signals_bind(service, log);
    await service.start();
}

main().catch((error: unknown): void => fatal_report(error, log));
