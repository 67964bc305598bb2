/**
 * @file Traffic Metric Generator
 *
 * Materializes a sparse sample of the tenant × provider × connection-type ×
 * node × interface label product. Thinning happens in two independent
 * stages: whole (tenant, provider, connection type) combinations first,
 * then nodes within each kept combination. A kept node always reports on
 * every interface of its combination.
 *
 * Traffic windows are correlated: the 1h rate is the 5m rate under a ±20%
 * jitter, and the 1d rate is the 1h rate under a further ±10% jitter.
 *
 * @module telemetry/generators/TrafficMetricGenerator
 */

import type { MetricBatch, MetricLabels, MetricSample, TelemetryGenerator } from '../types.js';
import type { TrafficTopology } from '../../config/topology.js';
import type { RandomSource } from '../random.js';
import { interfaceMap_validate } from '../../config/topology.js';
import { ConfigurationError } from '../../config/errors.js';

export const METRIC_NAMES = {
    rate5m: 'sum:cnstraffic_interface_rx_bytes:rate5m',
    rate1h: 'sum:cnstraffic_interface_rx_bytes:rate1h',
    rate1d: 'sum:cnstraffic_interface_rx_bytes:rate1d',
    activeConnections: 'active_connections_total',
    packetLoss: 'packet_loss_rate_percent',
} as const;

export const METRIC_HELP: Readonly<Record<string, string>> = {
    [METRIC_NAMES.rate5m]: 'Network traffic RX bytes rate over 5 minutes',
    [METRIC_NAMES.rate1h]: 'Network traffic RX bytes rate over 1 hour',
    [METRIC_NAMES.rate1d]: 'Network traffic RX bytes rate over 1 day',
    [METRIC_NAMES.activeConnections]: 'Total active connections',
    [METRIC_NAMES.packetLoss]: 'Packet loss rate percentage',
};

/** Sampling ranges, in bytes per second, connections and percent. */
export const SAMPLE_RANGES = {
    rate5m: { min: 1e6, max: 1e8 },
    hourJitter: { min: 0.8, max: 1.2 },
    dayJitter: { min: 0.9, max: 1.1 },
    activeConnections: { min: 10, max: 1000 },
    packetLoss: { min: 0.0, max: 2.5 },
} as const;

export const DEFAULT_COMBINATION_SKIP: number = 0.30;
export const DEFAULT_NODE_SKIP: number = 0.40;
export const DEFAULT_MAX_SAMPLES: number = 50000;

export interface TrafficMetricGeneratorOptions {
    tenants: readonly string[];
    topology: TrafficTopology;
    random: RandomSource;
    combinationSkip?: number;
    nodeSkip?: number;
    maxSamples?: number;
}

export class TrafficMetricGenerator implements TelemetryGenerator<MetricBatch> {
    private readonly tenants: readonly string[];
    private readonly topology: TrafficTopology;
    private readonly random: RandomSource;
    private readonly combinationSkip: number;
    private readonly nodeSkip: number;
    private readonly maxSamples: number;

    constructor(options: TrafficMetricGeneratorOptions) {
        const problems: string[] = dimensions_check(options.tenants, options.topology);
        const combinationSkip: number = options.combinationSkip ?? DEFAULT_COMBINATION_SKIP;
        const nodeSkip: number = options.nodeSkip ?? DEFAULT_NODE_SKIP;
        const maxSamples: number = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
        if (!probability_isValid(combinationSkip)) problems.push(`combinationSkip ${combinationSkip} is not in [0, 1]`);
        if (!probability_isValid(nodeSkip)) problems.push(`nodeSkip ${nodeSkip} is not in [0, 1]`);
        if (!Number.isInteger(maxSamples) || maxSamples < 1) problems.push(`maxSamples ${maxSamples} must be a positive integer`);
        if (problems.length > 0) {
            throw new ConfigurationError('Traffic metric generator is misconfigured', problems);
        }
        interfaceMap_validate(options.topology);

        this.tenants = Object.freeze([...options.tenants]);
        this.topology = options.topology;
        this.random = options.random;
        this.combinationSkip = combinationSkip;
        this.nodeSkip = nodeSkip;
        this.maxSamples = maxSamples;
    }

    generate(cycle: number): MetricBatch {
        const samples: MetricSample[] = [];
        let combinations: number = 0;
        const { providers, connectionTypes, nodeTypes, nodes, interfaces } = this.topology;

        for (const tenant of this.tenants) {
            for (const provider of providers) {
                for (const connectionType of connectionTypes) {
                    if (this.random.chance(this.combinationSkip)) continue;
                    combinations++;

                    const ifaces: readonly string[] = interfaces[provider][connectionType];
                    const groupSize: number = ifaces.length * 3 + 2;

                    for (const nodetype of nodeTypes) {
                        for (const node of nodes) {
                            if (this.random.chance(this.nodeSkip)) continue;
                            if (samples.length + groupSize > this.maxSamples) {
                                return { cycle, samples, combinations, truncated: true };
                            }
                            const labels: MetricLabels = { tenant, provider, connectionType, nodetype, node };
                            this.nodeGroup_emit(samples, labels, ifaces);
                        }
                    }
                }
            }
        }

        return { cycle, samples, combinations, truncated: false };
    }

    /**
     * Append the correlated traffic triples for every interface, then the
     * node-level gauges.
     */
    private nodeGroup_emit(samples: MetricSample[], labels: MetricLabels, ifaces: readonly string[]): void {
        for (const iface of ifaces) {
            const ifaceLabels: MetricLabels = { ...labels, interface: iface };
            const rate5m: number = this.random.float(SAMPLE_RANGES.rate5m.min, SAMPLE_RANGES.rate5m.max);
            const rate1h: number = rate5m * this.random.float(SAMPLE_RANGES.hourJitter.min, SAMPLE_RANGES.hourJitter.max);
            const rate1d: number = rate1h * this.random.float(SAMPLE_RANGES.dayJitter.min, SAMPLE_RANGES.dayJitter.max);
            samples.push(sample_make(METRIC_NAMES.rate5m, ifaceLabels, rate5m));
            samples.push(sample_make(METRIC_NAMES.rate1h, ifaceLabels, rate1h));
            samples.push(sample_make(METRIC_NAMES.rate1d, ifaceLabels, rate1d));
        }

        const connections: number = this.random.int(SAMPLE_RANGES.activeConnections.min, SAMPLE_RANGES.activeConnections.max);
        const loss: number = this.random.float(SAMPLE_RANGES.packetLoss.min, SAMPLE_RANGES.packetLoss.max);
        samples.push(sample_make(METRIC_NAMES.activeConnections, { ...labels }, connections));
        samples.push(sample_make(METRIC_NAMES.packetLoss, { ...labels }, loss));
    }
}

function sample_make(name: string, labels: MetricLabels, value: number): MetricSample {
    return { name, help: METRIC_HELP[name] ?? name, labels, value };
}

function probability_isValid(p: number): boolean {
    return Number.isFinite(p) && p >= 0 && p <= 1;
}

/**
 * Every dimension must be non-empty and repeat-free; a repeated value would
 * emit the same series twice in one push.
 */
function dimensions_check(tenants: readonly string[], topology: TrafficTopology): string[] {
    const dimensions: Array<[string, readonly string[]]> = [
        ['tenants', tenants],
        ['providers', topology.providers],
        ['connectionTypes', topology.connectionTypes],
        ['nodeTypes', topology.nodeTypes],
        ['nodes', topology.nodes],
    ];
    const problems: string[] = [];
    for (const [name, values] of dimensions) {
        if (values.length === 0) {
            problems.push(`${name} is empty`);
        } else if (new Set(values).size !== values.length) {
            problems.push(`${name} repeats values`);
        }
    }
    return problems;
}
