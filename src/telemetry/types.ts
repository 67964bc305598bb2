/**
 * @file Telemetry Types
 * Contracts shared by the generators, sinks and the scheduler.
 */

/**
 * A Generator produces one batch per tick cycle.
 * It is pure computation: no I/O, no suspension.
 */
export interface TelemetryGenerator<T> {
    /**
     * Produces the batch for the given cycle number (1-based).
     */
    generate(cycle: number): T;
}

/**
 * A Sink delivers a completed batch. One call per cycle.
 */
export interface TelemetrySink<T> {
    publish(batch: T): Promise<void>;
}

/**
 * Receives per-cycle status and failures. Reports are best-effort.
 */
export interface TelemetryReporter<T> {
    cycle_report(cycle: number, batch: T): void | Promise<void>;
    failure_report(cycle: number, error: unknown): void | Promise<void>;
}

/**
 * A registered pipeline for one engine.
 */
export interface TelemetryRegistryEntry<T> {
    id: string;
    generator: TelemetryGenerator<T>;
    sink: TelemetrySink<T>;
    reporter: TelemetryReporter<T>;
}

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

// ─── Auth events ─────────────────────────────────────────────────────────────

export type ActorClass = 'attacker' | 'legitimate' | 'corporate';

export interface AuthEvent {
    timestamp: string;
    tenant: string;
    actor: ActorClass;
    ip: string;
    username: string;
    success: boolean;
    failureReason?: string;
    userAgent: string;
    method: 'password';
}

export interface AuthBatch {
    cycle: number;
    events: AuthEvent[];
}

// ─── Metric samples ──────────────────────────────────────────────────────────

export interface MetricLabels {
    tenant: string;
    provider: string;
    connectionType: string;
    interface?: string;
    nodetype: string;
    node: string;
}

export interface MetricSample {
    name: string;
    help: string;
    labels: MetricLabels;
    value: number;
}

export interface MetricBatch {
    cycle: number;
    samples: MetricSample[];
    /** (tenant, provider, connection type) combinations kept after thinning. */
    combinations: number;
    /** Generation stopped at the per-cycle sample cap. */
    truncated: boolean;
}
