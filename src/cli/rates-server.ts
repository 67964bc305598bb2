#!/usr/bin/env npx tsx
/**
 * @file Rates Stub Server
 *
 * Serves a jittered USD exchange-rate table on /api/latest.json.
 *
 * Usage:
 *   RATES_PORT=8080 npx tsx src/cli/rates-server.ts
 *
 * @module
 */

import http from 'http';
import { env_load } from '../config/env.js';
import { SettingsService } from '../config/settings.js';
import { ratesServer_start, ratesShutdown_bind } from '../rates/RatesServer.js';
import { random_create, seed_derive } from '../telemetry/random.js';
import { ConsoleLog } from '../telemetry/log.js';
import { fatal_report } from './bootstrap.js';

const log: ConsoleLog = new ConsoleLog();

async function main(): Promise<void> {
    env_load();
    const settings: SettingsService = new SettingsService(process.env);
    const host: string = settings.text_resolve('ratesHost');
    const port: number = settings.numeric_resolve('ratesPort');
    const seed: number = settings.seed_resolve() ?? seed_derive();

    const server: http.Server = await ratesServer_start({ host, port, random: random_create(seed), log });
    log.banner_print('Exchange Rates Mock API Server', [
        `Listening on http://${host}:${port}`,
        'Endpoint: /api/latest.json',
    ]);

    ratesShutdown_bind(server, log);
}

main().catch((error: unknown): void => fatal_report(error, log));
