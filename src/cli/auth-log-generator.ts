#!/usr/bin/env npx tsx
/**
 * @file Auth Log Generator
 *
 * Emits synthetic authentication attempts as NDJSON on stdout, one batch
 * every AUTH_LOG_INTERVAL_MS (default 2s). Banner and diagnostics go to
 * stderr so stdout stays machine-readable.
 *
 * Usage:
 *   TENANTS=acme,globex npx tsx src/cli/auth-log-generator.ts
 *
 * @module
 */

import { boot_resolve, signals_bind, fatal_report, type BootContext } from './bootstrap.js';
import { authPipeline_create } from '../telemetry/pipelines.js';
import { TelemetryService } from '../telemetry/service.js';
import { ConsoleLog } from '../telemetry/log.js';
import type { AuthBatch } from '../telemetry/types.js';

const log: ConsoleLog = new ConsoleLog({ out: (line: string): void => console.error(line) });

async function main(): Promise<void> {
    const boot: BootContext = boot_resolve();
    const { settings, topology } = boot;

    log.banner_print('Mock Authentication Log Generator', [
        `Generating authentication logs every ${settings.authIntervalMs / 1000} seconds`,
        `Tenants: ${settings.tenants.join(', ')}`,
        `Attacker IPs (high failure rate): ${topology.auth.attacker.ips.join(', ')}`,
        `Legitimate IPs (high success rate): ${topology.auth.legitimate.ips.join(', ')}`,
        `Corporate IPs (always allowed): ${topology.auth.corporate.ips.join(', ')}`,
        `Seed: ${boot.random.seed}`,
    ], 80);

    const service: TelemetryService<AuthBatch> = new TelemetryService<AuthBatch>(
        authPipeline_create({ settings, topology, random: boot.random }),
        { intervalMs: settings.authIntervalMs }
    );
    signals_bind(service, log);
    await service.start();
}

main().catch((error: unknown): void => fatal_report(error, log));
