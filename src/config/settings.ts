/**
 * @file Runtime Settings Service
 *
 * Generator settings with central validation and deterministic precedence
 * (explicit override > env > defaults). Everything is resolved once at
 * process start; there is no runtime reconfiguration.
 *
 * @module
 */

import { ConfigurationError } from './errors.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface SettingsOverrides {
    tenants?: string[];
    authIntervalMs?: number;
    metricsIntervalMs?: number;
    maxSamples?: number;
    ratesPort?: number;
    seed?: number;
    pushgatewayUrl?: string;
    metricsJob?: string;
    ratesHost?: string;
    topologyFile?: string;
}

export type NumericKey = 'authIntervalMs' | 'metricsIntervalMs' | 'maxSamples' | 'ratesPort';
export type TextKey = 'pushgatewayUrl' | 'metricsJob' | 'ratesHost';

export interface ResolvedSettings {
    tenants: string[];
    authIntervalMs: number;
    metricsIntervalMs: number;
    maxSamples: number;
    ratesPort: number;
    seed: number | null;
    pushgatewayUrl: string;
    metricsJob: string;
    ratesHost: string;
    topologyFile: string | null;
}

export type SettingSource = 'override' | 'env' | 'default';

interface NumericBounds {
    min: number;
    max: number;
}

const NUMERIC_ENV: Readonly<Record<NumericKey, string>> = {
    authIntervalMs: 'AUTH_LOG_INTERVAL_MS',
    metricsIntervalMs: 'METRICS_PUSH_INTERVAL_MS',
    maxSamples: 'METRICS_MAX_SAMPLES',
    ratesPort: 'RATES_PORT',
};

const TEXT_ENV: Readonly<Record<TextKey, string>> = {
    pushgatewayUrl: 'PUSHGATEWAY_URL',
    metricsJob: 'METRICS_JOB',
    ratesHost: 'RATES_HOST',
};

function key_isNumeric(key: NumericKey | TextKey): key is NumericKey {
    return key in NUMERIC_ENV;
}

export class SettingsService {
    private readonly env: Env;
    private readonly overrides: SettingsOverrides;
    private readonly numericDefaults: Record<NumericKey, number> = {
        authIntervalMs: 2000,
        metricsIntervalMs: 15000,
        maxSamples: 50000,
        ratesPort: 8080,
    };
    private readonly textDefaults: Record<TextKey, string> = {
        pushgatewayUrl: 'http://pushgateway:19091',
        metricsJob: 'cnstraffic_metrics',
        ratesHost: '0.0.0.0',
    };
    private readonly bounds: Record<NumericKey, NumericBounds> = {
        authIntervalMs: { min: 100, max: 600000 },
        metricsIntervalMs: { min: 1000, max: 600000 },
        maxSamples: { min: 1, max: 1000000 },
        ratesPort: { min: 1, max: 65535 },
    };

    constructor(env: Env = process.env, overrides: SettingsOverrides = {}) {
        this.env = env;
        this.overrides = overrides;
    }

    /**
     * Return every effective setting. Fails when no tenant is configured.
     */
    public snapshot(): ResolvedSettings {
        return {
            tenants: this.tenants_resolve(),
            authIntervalMs: this.numeric_resolve('authIntervalMs'),
            metricsIntervalMs: this.numeric_resolve('metricsIntervalMs'),
            maxSamples: this.numeric_resolve('maxSamples'),
            ratesPort: this.numeric_resolve('ratesPort'),
            seed: this.seed_resolve(),
            pushgatewayUrl: this.text_resolve('pushgatewayUrl'),
            metricsJob: this.text_resolve('metricsJob'),
            ratesHost: this.text_resolve('ratesHost'),
            topologyFile: this.overrides.topologyFile ?? this.envText_resolve('TOPOLOGY_FILE') ?? null,
        };
    }

    /**
     * Resolve the tenant set from the comma-separated `TENANTS` variable.
     *
     * Repeated names collapse to their first occurrence.
     *
     * @throws ConfigurationError when the set is empty.
     */
    public tenants_resolve(): string[] {
        const source: string[] = this.overrides.tenants ?? (this.env['TENANTS'] ?? '').split(',');
        const tenants: string[] = Array.from(new Set(
            source.map((tenant: string): string => tenant.trim()).filter(Boolean)
        ));
        if (tenants.length === 0) {
            throw new ConfigurationError('TENANTS must name at least one tenant');
        }
        return tenants;
    }

    /**
     * Resolve one bounded numeric setting.
     */
    public numeric_resolve(key: NumericKey): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number' && Number.isFinite(override)) {
            return this.value_clamp(key, Math.round(override));
        }

        const envOverride: number | undefined = this.envNumeric_resolve(NUMERIC_ENV[key]);
        if (typeof envOverride === 'number') {
            return this.value_clamp(key, envOverride);
        }

        return this.numericDefaults[key];
    }

    /**
     * Resolve one text setting.
     */
    public text_resolve(key: TextKey): string {
        return this.overrides[key] ?? this.envText_resolve(TEXT_ENV[key]) ?? this.textDefaults[key];
    }

    /**
     * Resolve the random seed, or null to let the caller derive one.
     */
    public seed_resolve(): number | null {
        if (typeof this.overrides.seed === 'number') return this.overrides.seed;
        return this.envNumeric_resolve('GENERATOR_SEED') ?? null;
    }

    /**
     * Resolve where a setting's effective value came from.
     */
    public source(key: NumericKey | TextKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (key_isNumeric(key)) {
            return typeof this.envNumeric_resolve(NUMERIC_ENV[key]) === 'number' ? 'env' : 'default';
        }
        return this.envText_resolve(TEXT_ENV[key]) !== undefined ? 'env' : 'default';
    }

    private envNumeric_resolve(key: string): number | undefined {
        const envRaw: string | undefined = this.envText_resolve(key);
        if (!envRaw) return undefined;

        const parsed: number = Number.parseInt(envRaw, 10);
        return Number.isFinite(parsed) ? parsed : undefined;
    }

    private envText_resolve(key: string): string | undefined {
        const value: string | undefined = this.env[key]?.trim();
        return value ? value : undefined;
    }

    private value_clamp(key: NumericKey, value: number): number {
        const bounds: NumericBounds = this.bounds[key];
        return Math.max(bounds.min, Math.min(bounds.max, value));
    }
}
