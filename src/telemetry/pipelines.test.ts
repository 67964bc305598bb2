import { describe, it, expect } from 'vitest';
import { authPipeline_create, metricsPipeline_create } from './pipelines.js';
import { TelemetryService, type CycleOutcome } from './service.js';
import { SettingsService, type ResolvedSettings } from '../config/settings.js';
import { topology_load, type Topology } from '../config/topology.js';
import { random_create } from './random.js';
import { ConsoleLog } from './log.js';
import { PushGatewaySink } from './sinks/PushGatewaySink.js';
import type { AuthBatch } from './types.js';

const topology: Topology = topology_load();

function settings_create(env: Record<string, string>): ResolvedSettings {
    return new SettingsService({ TENANTS: 'acme,globex', ...env }).snapshot();
}

describe('authPipeline_create', (): void => {
    it('streams one NDJSON line per generated event', async (): Promise<void> => {
        const lines: string[] = [];
        const entry = authPipeline_create({
            settings: settings_create({}),
            topology,
            random: random_create(11),
            stream: {
                write(chunk: string): boolean {
                    lines.push(chunk);
                    return true;
                },
            },
        });

        const batch: AuthBatch = random_replayBatch();
        const outcome: CycleOutcome = await new TelemetryService<AuthBatch>(entry, { intervalMs: 1000 }).tick();

        expect(entry.id).toBe('auth-logs');
        expect(outcome.ok).toBe(true);
        expect(lines).toHaveLength(batch.events.length);
        const first = JSON.parse(lines[0]);
        expect(first.event_type).toBe('authentication');
        expect(first.auth.username).toBe(batch.events[0].username);
    });
});

describe('metricsPipeline_create', (): void => {
    it('targets the configured gateway and job', (): void => {
        const entry = metricsPipeline_create({
            settings: settings_create({ PUSHGATEWAY_URL: 'localhost:9091', METRICS_JOB: 'edge_metrics' }),
            topology,
            random: random_create(11),
            log: new ConsoleLog({ out: (): void => undefined, err: (): void => undefined, color: false }),
        });

        expect(entry.id).toBe('traffic-metrics');
        expect(entry.sink).toBeInstanceOf(PushGatewaySink);
        expect(entry.sink instanceof PushGatewaySink ? entry.sink.url : null)
            .toBe('http://localhost:9091/metrics/job/edge_metrics');
    });
});

/**
 * Same seed, same generator: the batch the pipeline streams on its first cycle.
 */
function random_replayBatch(): AuthBatch {
    const replay = authPipeline_create({
        settings: settings_create({}),
        topology,
        random: random_create(11),
        stream: { write: (): boolean => true },
    });
    return replay.generator.generate(1);
}
