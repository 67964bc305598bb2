/**
 * @file Log Records
 *
 * JSON shapes written to the auth log stream. Every line carries the
 * envelope `timestamp`, `level`, `service` and `event_type`.
 *
 * @module telemetry/records
 */

import type { AuthEvent, LogLevel } from './types.js';
import { errorMessage_get } from '../config/errors.js';

export const AUTH_SERVICE: string = 'auth-service';
export const GENERATOR_SERVICE: string = 'auth-log-generator';

export interface AuthLogRecord {
    timestamp: string;
    level: LogLevel;
    service: string;
    tenant: string;
    event_type: 'authentication';
    auth: {
        ip_address: string;
        username: string;
        success: boolean;
        method: string;
        user_agent: string;
        actor_class: string;
        failure_reason?: string;
    };
}

export interface GeneratorLogRecord {
    timestamp: string;
    level: LogLevel;
    service: string;
    event_type: 'generator_status' | 'generator_error';
    message: string;
    iteration: number;
    error_type?: string;
}

/**
 * Wire form of one authentication attempt.
 */
export function authRecord_build(event: AuthEvent): AuthLogRecord {
    const record: AuthLogRecord = {
        timestamp: event.timestamp,
        level: event.success ? 'INFO' : 'WARN',
        service: AUTH_SERVICE,
        tenant: event.tenant,
        event_type: 'authentication',
        auth: {
            ip_address: event.ip,
            username: event.username,
            success: event.success,
            method: event.method,
            user_agent: event.userAgent,
            actor_class: event.actor,
        },
    };
    if (!event.success && event.failureReason !== undefined) {
        record.auth.failure_reason = event.failureReason;
    }
    return record;
}

/**
 * Periodic status line: batch size and failure count.
 */
export function statusRecord_build(now: Date, iteration: number, events: number, failures: number): GeneratorLogRecord {
    return {
        timestamp: now.toISOString(),
        level: 'INFO',
        service: GENERATOR_SERVICE,
        event_type: 'generator_status',
        message: `Generated ${events} events (${failures} failures)`,
        iteration,
    };
}

/**
 * Failure line for a cycle that could not be generated or delivered.
 */
export function errorRecord_build(now: Date, iteration: number, error: unknown): GeneratorLogRecord {
    const record: GeneratorLogRecord = {
        timestamp: now.toISOString(),
        level: 'ERROR',
        service: GENERATOR_SERVICE,
        event_type: 'generator_error',
        message: `Error generating logs: ${errorMessage_get(error)}`,
        iteration,
    };
    if (error instanceof Error) record.error_type = error.name;
    return record;
}
