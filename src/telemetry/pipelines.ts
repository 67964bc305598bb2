/**
 * @file Pipeline Wiring
 * Builds the registry entry for each engine from resolved settings and the
 * static topology.
 */

import type { AuthBatch, MetricBatch, TelemetryRegistryEntry } from './types.js';
import type { ResolvedSettings } from '../config/settings.js';
import type { Topology } from '../config/topology.js';
import type { RandomSource } from './random.js';
import { AuthEventGenerator } from './generators/AuthEventGenerator.js';
import { TrafficMetricGenerator } from './generators/TrafficMetricGenerator.js';
import { NdjsonSink, type LineStream } from './sinks/NdjsonSink.js';
import { PushGatewaySink } from './sinks/PushGatewaySink.js';
import { AuthLogReporter, MetricsReporter } from './reporters.js';
import { authRecord_build } from './records.js';
import { ConsoleLog } from './log.js';

export interface AuthPipelineOptions {
    settings: ResolvedSettings;
    topology: Topology;
    random: RandomSource;
    stream?: LineStream;
}

export interface MetricsPipelineOptions {
    settings: ResolvedSettings;
    topology: Topology;
    random: RandomSource;
    log: ConsoleLog;
}

export function authPipeline_create(options: AuthPipelineOptions): TelemetryRegistryEntry<AuthBatch> {
    const sink: NdjsonSink<AuthBatch> = new NdjsonSink<AuthBatch>(
        (batch: AuthBatch) => batch.events.map(authRecord_build),
        options.stream
    );
    return {
        id: 'auth-logs',
        generator: new AuthEventGenerator({
            tenants: options.settings.tenants,
            topology: options.topology.auth,
            random: options.random,
        }),
        sink,
        reporter: new AuthLogReporter(sink),
    };
}

export function metricsPipeline_create(options: MetricsPipelineOptions): TelemetryRegistryEntry<MetricBatch> {
    const { settings, topology } = options;
    return {
        id: 'traffic-metrics',
        generator: new TrafficMetricGenerator({
            tenants: settings.tenants,
            topology: topology.traffic,
            random: options.random,
            maxSamples: settings.maxSamples,
        }),
        sink: new PushGatewaySink({ gatewayUrl: settings.pushgatewayUrl, job: settings.metricsJob }),
        reporter: new MetricsReporter({
            log: options.log,
            tenants: settings.tenants.length,
            providers: topology.traffic.providers.length,
        }),
    };
}
