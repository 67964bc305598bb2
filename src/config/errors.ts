/**
 * @file Error Types
 *
 * Two failure families: configuration errors are fatal for the engine that
 * raises them, sink errors are transient and only cost one cycle.
 *
 * @module config/errors
 */

/**
 * Static configuration is missing or inconsistent. No valid output can be
 * produced, so the owning engine must stop.
 */
export class ConfigurationError extends Error {
    public readonly issues: readonly string[];

    constructor(message: string, issues: readonly string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

/**
 * A sink rejected or could not receive a batch.
 */
export class SinkError extends Error {
    public readonly status: number | null;

    constructor(message: string, status: number | null = null) {
        super(message);
        this.name = 'SinkError';
        this.status = status;
    }
}

/**
 * Convert unknown error payload to display-safe message text.
 *
 * @param error - Unknown error value.
 * @returns Resolved message.
 */
export function errorMessage_get(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}
