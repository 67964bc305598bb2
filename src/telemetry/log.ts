/**
 * @file Console Log
 *
 * Human-oriented console output for the generator processes. Colour comes
 * from chalk and is switched off when the output is not a terminal.
 *
 * @module telemetry/log
 */

import { Chalk, type ChalkInstance } from 'chalk';

export const MARKERS = {
    OK: '✓',
    FAIL: '✗',
    WARN: '!',
    RULE: '=',
};

export type LineWriter = (line: string) => void;

export interface ConsoleLogOptions {
    out?: LineWriter;
    err?: LineWriter;
    color?: boolean;
}

export class ConsoleLog {
    private readonly out: LineWriter;
    private readonly err: LineWriter;
    private readonly paint: ChalkInstance;

    constructor(options: ConsoleLogOptions = {}) {
        this.out = options.out ?? ((line: string): void => console.log(line));
        this.err = options.err ?? ((line: string): void => console.error(line));
        const color: boolean = options.color ?? Boolean(process.stdout.isTTY);
        this.paint = new Chalk({ level: color ? 1 : 0 });
    }

    info_log(message: string): void {
        this.out(message);
    }

    ok_log(message: string): void {
        this.out(this.paint.green(`${MARKERS.OK} ${message}`));
    }

    warn_log(message: string): void {
        this.err(this.paint.yellow(`${MARKERS.WARN} ${message}`));
    }

    error_log(message: string): void {
        this.err(this.paint.red(`${MARKERS.FAIL} ${message}`));
    }

    /**
     * Print a ruled banner: title, then one line per detail.
     */
    banner_print(title: string, details: readonly string[], width: number = 60): void {
        const rule: string = MARKERS.RULE.repeat(width);
        this.out(rule);
        this.out(this.paint.bold(title));
        this.out(rule);
        details.forEach((detail: string): void => this.out(detail));
        this.out(rule);
    }
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function timestamp_format(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
