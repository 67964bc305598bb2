/**
 * @file Environment Loading
 *
 * Hydrates `process.env` from a `.env` file in the working directory.
 * Variables already set in the environment always win.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';

/**
 * Parse `.env` text into key/value pairs. Blank lines and `#` comments are
 * skipped; surrounding quotes on values are stripped.
 */
export function envText_parse(content: string): Record<string, string> {
    const parsed: Record<string, string> = {};
    content.split('\n').forEach((line: string): void => {
        const trimmed: string = line.trim();
        if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) return;

        const splitLine: string[] = trimmed.split('=');
        const key: string = splitLine[0].trim();
        const val: string = splitLine.slice(1).join('=').trim().replace(/^["']|["']$/g, '');
        if (key) parsed[key] = val;
    });
    return parsed;
}

/**
 * Load `.env` from a directory into the target environment.
 *
 * @param cwd - Directory holding the `.env` file.
 * @param target - Environment to hydrate.
 * @returns Keys that were newly set.
 */
export function env_load(cwd: string = process.cwd(), target: NodeJS.ProcessEnv = process.env): string[] {
    const envPath: string = path.join(cwd, '.env');
    if (!fs.existsSync(envPath)) return [];

    const loaded: string[] = [];
    const entries: Record<string, string> = envText_parse(fs.readFileSync(envPath, 'utf-8'));
    for (const [key, val] of Object.entries(entries)) {
        if (!target[key]) {
            target[key] = val;
            loaded.push(key);
        }
    }
    return loaded;
}
