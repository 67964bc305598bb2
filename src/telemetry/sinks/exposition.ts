/**
 * @file Exposition Format
 *
 * Renders samples in the Prometheus text exposition format (0.0.4).
 * Samples are grouped per metric name in first-seen order; each group
 * gets its HELP and TYPE header once.
 *
 * @module telemetry/sinks/exposition
 */

import type { MetricLabels, MetricSample } from '../types.js';

export const EXPOSITION_CONTENT_TYPE: string = 'text/plain; version=0.0.4; charset=utf-8';

const LABEL_ORDER: ReadonlyArray<keyof MetricLabels> = [
    'tenant', 'provider', 'connectionType', 'interface', 'nodetype', 'node'
];

/**
 * Render a full push body. Ends with a newline unless empty.
 */
export function exposition_render(samples: readonly MetricSample[]): string {
    const groups: Map<string, MetricSample[]> = new Map();
    for (const sample of samples) {
        const group: MetricSample[] | undefined = groups.get(sample.name);
        if (group) {
            group.push(sample);
        } else {
            groups.set(sample.name, [sample]);
        }
    }

    const lines: string[] = [];
    for (const [name, group] of groups) {
        lines.push(`# HELP ${name} ${help_escape(group[0].help)}`);
        lines.push(`# TYPE ${name} gauge`);
        for (const sample of group) {
            lines.push(`${name}${labels_render(sample.labels)} ${value_render(sample.value)}`);
        }
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * `{k="v",...}` in canonical label order, skipping absent labels.
 */
export function labels_render(labels: MetricLabels): string {
    const parts: string[] = [];
    for (const key of LABEL_ORDER) {
        const value: string | undefined = labels[key];
        if (value === undefined) continue;
        parts.push(`${key}="${labelValue_escape(value)}"`);
    }
    return parts.length > 0 ? `{${parts.join(',')}}` : '';
}

export function labelValue_escape(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function help_escape(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

function value_render(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return '+Inf';
    if (value === -Infinity) return '-Inf';
    return String(value);
}
