import { describe, it, expect, vi } from 'vitest';
import { TelemetryService, sleep_abortable, type CycleOutcome } from './service.js';
import { ConfigurationError, SinkError } from '../config/errors.js';
import type { TelemetryRegistryEntry } from './types.js';

interface Recorder {
    published: number[];
    reported: number[];
    failures: Array<{ cycle: number; error: unknown }>;
}

function entry_create(
    recorder: Recorder,
    publish: (batch: number) => Promise<void> = async (): Promise<void> => undefined
): TelemetryRegistryEntry<number> {
    return {
        id: 'test',
        generator: { generate: (cycle: number): number => cycle * 10 },
        sink: {
            publish: async (batch: number): Promise<void> => {
                await publish(batch);
                recorder.published.push(batch);
            },
        },
        reporter: {
            cycle_report: (cycle: number): void => {
                recorder.reported.push(cycle);
            },
            failure_report: (cycle: number, error: unknown): void => {
                recorder.failures.push({ cycle, error });
            },
        },
    };
}

function recorder_create(): Recorder {
    return { published: [], reported: [], failures: [] };
}

describe('TelemetryService.tick', (): void => {
    it('generates, publishes and reports one cycle', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const service = new TelemetryService<number>(entry_create(recorder), { intervalMs: 1000 });

        const outcome: CycleOutcome = await service.tick();

        expect(outcome).toEqual({ cycle: 1, ok: true });
        expect(recorder.published).toEqual([10]);
        expect(recorder.reported).toEqual([1]);
        expect(service.cycle).toBe(1);
    });

    it('reports a sink failure and keeps the cycle count moving', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const failure: SinkError = new SinkError('Pushgateway rejected push with HTTP 500', 500);
        let calls: number = 0;
        const service = new TelemetryService<number>(entry_create(recorder, async (): Promise<void> => {
            calls++;
            if (calls === 1) throw failure;
        }), { intervalMs: 1000 });

        const first: CycleOutcome = await service.tick();
        const second: CycleOutcome = await service.tick();

        expect(first).toEqual({ cycle: 1, ok: false, error: failure });
        expect(second).toEqual({ cycle: 2, ok: true });
        expect(recorder.failures).toEqual([{ cycle: 1, error: failure }]);
        expect(recorder.published).toEqual([20]);
    });

    it('rethrows configuration errors', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const service = new TelemetryService<number>(entry_create(recorder, async (): Promise<void> => {
            throw new ConfigurationError('Interface mapping is invalid', ['no interfaces for AWS/VPN']);
        }), { intervalMs: 1000 });

        await expect(service.tick()).rejects.toBeInstanceOf(ConfigurationError);
        expect(recorder.failures).toEqual([]);
    });

    it('keeps going when a reporter throws', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const entry: TelemetryRegistryEntry<number> = entry_create(recorder);
        entry.reporter = {
            cycle_report: (): void => {
                throw new Error('reporter down');
            },
            failure_report: (): void => undefined,
        };
        const errorSpy = vi.spyOn(console, 'error').mockImplementation((): void => undefined);
        const service = new TelemetryService<number>(entry, { intervalMs: 1000 });

        const outcome: CycleOutcome = await service.tick();

        expect(outcome.ok).toBe(true);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        errorSpy.mockRestore();
    });
});

describe('TelemetryService.start', (): void => {
    it('sleeps the configured interval between cycles until stopped', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const sleeps: number[] = [];
        let service: TelemetryService<number> | null = null;
        service = new TelemetryService<number>(entry_create(recorder), {
            intervalMs: 2000,
            sleep: async (ms: number): Promise<void> => {
                sleeps.push(ms);
                if (sleeps.length === 3) service?.stop();
            },
        });

        await service.start();

        expect(recorder.published).toEqual([10, 20, 30]);
        expect(sleeps).toEqual([2000, 2000, 2000]);
        expect(service.running).toBe(false);
    });

    it('stops on a configuration error', async (): Promise<void> => {
        const recorder: Recorder = recorder_create();
        const service = new TelemetryService<number>(entry_create(recorder, async (): Promise<void> => {
            throw new ConfigurationError('tenants is empty');
        }), { intervalMs: 10, sleep: async (): Promise<void> => undefined });

        await expect(service.start()).rejects.toThrow('tenants is empty');
        expect(service.running).toBe(false);
    });
});

describe('sleep_abortable', (): void => {
    it('resolves early when the signal aborts', async (): Promise<void> => {
        const controller: AbortController = new AbortController();
        const started: number = Date.now();
        const pending: Promise<void> = sleep_abortable(60000, controller.signal);
        controller.abort();

        await expect(pending).resolves.toBeUndefined();
        expect(Date.now() - started).toBeLessThan(5000);
    });
});
