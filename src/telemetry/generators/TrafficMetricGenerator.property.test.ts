/**
 * @file TrafficMetricGenerator Property Tests
 *
 * Invariants under test, for any seed and tenant set:
 *   1. 1h / 5m lies in [0.8, 1.2] and 1d / 1h in [0.9, 1.1] per label tuple;
 *   2. every label value belongs to its configured dimension set;
 *   3. interfaces match the (provider, connection type) mapping;
 *   4. each label tuple appears at most once per metric name.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { TrafficMetricGenerator, METRIC_NAMES } from './TrafficMetricGenerator.js';
import { random_create } from '../random.js';
import { topology_load, type TrafficTopology } from '../../config/topology.js';
import { labels_render } from '../sinks/exposition.js';
import type { MetricSample } from '../types.js';

const TRAFFIC: TrafficTopology = topology_load().traffic;
const EPSILON: number = 1e-9;

const tenantSets = fc.uniqueArray(
    fc.stringMatching(/^[a-z][a-z0-9-]{0,11}$/),
    { minLength: 1, maxLength: 3 }
);

function samples_generate(seed: number, tenants: string[]): MetricSample[] {
    return new TrafficMetricGenerator({ tenants, topology: TRAFFIC, random: random_create(seed) }).generate(1).samples;
}

function byName(samples: MetricSample[], name: string): Map<string, number> {
    const values: Map<string, number> = new Map();
    samples
        .filter((sample: MetricSample): boolean => sample.name === name)
        .forEach((sample: MetricSample): void => {
            values.set(labels_render(sample.labels), sample.value);
        });
    return values;
}

describe('TrafficMetricGenerator property invariants', (): void => {
    it('keeps aggregation windows within their jitter bounds', (): void => {
        fc.assert(fc.property(fc.integer(), tenantSets, (seed: number, tenants: string[]): boolean => {
            const samples: MetricSample[] = samples_generate(seed, tenants);
            const rate5m: Map<string, number> = byName(samples, METRIC_NAMES.rate5m);
            const rate1h: Map<string, number> = byName(samples, METRIC_NAMES.rate1h);
            const rate1d: Map<string, number> = byName(samples, METRIC_NAMES.rate1d);
            if (rate5m.size !== rate1h.size || rate1h.size !== rate1d.size) return false;

            for (const [key, base] of rate5m) {
                const hour: number | undefined = rate1h.get(key);
                const day: number | undefined = rate1d.get(key);
                if (hour === undefined || day === undefined) return false;
                const hourRatio: number = hour / base;
                const dayRatio: number = day / hour;
                if (hourRatio < 0.8 - EPSILON || hourRatio > 1.2 + EPSILON) return false;
                if (dayRatio < 0.9 - EPSILON || dayRatio > 1.1 + EPSILON) return false;
            }
            return true;
        }), { numRuns: 50 });
    });

    it('never emits a label outside the configured sets', (): void => {
        fc.assert(fc.property(fc.integer(), tenantSets, (seed: number, tenants: string[]): boolean => {
            return samples_generate(seed, tenants).every((sample: MetricSample): boolean => {
                const { tenant, provider, connectionType, nodetype, node } = sample.labels;
                if (!tenants.includes(tenant)) return false;
                if (!TRAFFIC.providers.includes(provider)) return false;
                if (!TRAFFIC.connectionTypes.includes(connectionType)) return false;
                if (!TRAFFIC.nodeTypes.includes(nodetype) || !TRAFFIC.nodes.includes(node)) return false;
                const iface: string | undefined = sample.labels.interface;
                const isRate: boolean = sample.name.startsWith('sum:cnstraffic');
                if (!isRate) return iface === undefined;
                return iface !== undefined && TRAFFIC.interfaces[provider][connectionType].includes(iface);
            });
        }), { numRuns: 50 });
    });

    it('emits each label tuple once per metric', (): void => {
        fc.assert(fc.property(fc.integer(), tenantSets, (seed: number, tenants: string[]): boolean => {
            const seen: Set<string> = new Set();
            for (const sample of samples_generate(seed, tenants)) {
                const key: string = `${sample.name}${labels_render(sample.labels)}`;
                if (seen.has(key)) return false;
                seen.add(key);
            }
            return true;
        }), { numRuns: 50 });
    });
});
