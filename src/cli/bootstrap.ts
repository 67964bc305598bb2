/**
 * @file CLI Bootstrap
 *
 * Shared start-up steps for the generator entry points: `.env` hydration,
 * settings, topology, random source, and fatal-error handling.
 *
 * @module
 */

import { env_load } from '../config/env.js';
import { SettingsService, type ResolvedSettings } from '../config/settings.js';
import { topology_load, type Topology } from '../config/topology.js';
import { ConfigurationError, errorMessage_get } from '../config/errors.js';
import { random_create, seed_derive, type RandomSource } from '../telemetry/random.js';
import type { ConsoleLog } from '../telemetry/log.js';
import type { TelemetryService } from '../telemetry/service.js';

export interface BootContext {
    settings: ResolvedSettings;
    topology: Topology;
    random: RandomSource;
}

/**
 * Resolve everything a generator needs. Throws ConfigurationError.
 */
export function boot_resolve(): BootContext {
    env_load();
    const settings: ResolvedSettings = new SettingsService(process.env).snapshot();
    const topology: Topology = settings.topologyFile ? topology_load(settings.topologyFile) : topology_load();
    const random: RandomSource = random_create(settings.seed ?? seed_derive());
    return { settings, topology, random };
}

/**
 * Stop the service on SIGINT/SIGTERM; the current cycle completes first.
 */
export function signals_bind<T>(service: TelemetryService<T>, log: ConsoleLog): void {
    const stop = (signal: string): void => {
        log.info_log(`Received ${signal}, stopping after the current cycle`);
        service.stop();
    };
    process.once('SIGINT', (): void => stop('SIGINT'));
    process.once('SIGTERM', (): void => stop('SIGTERM'));
}

/**
 * Report a start-up or fatal error and set a failing exit code.
 */
export function fatal_report(error: unknown, log: ConsoleLog): void {
    if (error instanceof ConfigurationError) {
        log.error_log(`Configuration error: ${error.message}`);
    } else {
        log.error_log(`Fatal: ${errorMessage_get(error)}`);
    }
    process.exitCode = 1;
}
