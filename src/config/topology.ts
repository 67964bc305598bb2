/**
 * @file Topology Loader
 *
 * Reads the static topology YAML (actor pools, vocabularies, traffic
 * dimensions, interface mapping), validates it once, and returns frozen
 * structures. Lookups never happen lazily per sample.
 *
 * @module config/topology
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { TopologySchema, type RawTopology } from './schemas.js';
import { ConfigurationError, errorMessage_get } from './errors.js';

export type InterfaceMap = Readonly<Record<string, Readonly<Record<string, readonly string[]>>>>;

export interface AuthTopology {
    readonly clientSignatures: readonly string[];
    readonly attacker: {
        readonly ips: readonly string[];
        readonly usernames: readonly string[];
        readonly failureReasons: readonly string[];
    };
    readonly legitimate: {
        readonly ips: readonly string[];
        readonly usernames: readonly string[];
        readonly failureReasons: readonly string[];
    };
    readonly corporate: {
        readonly ips: readonly string[];
    };
}

export interface TrafficTopology {
    readonly providers: readonly string[];
    readonly connectionTypes: readonly string[];
    readonly nodeTypes: readonly string[];
    readonly nodes: readonly string[];
    readonly interfaces: InterfaceMap;
}

export interface Topology {
    readonly auth: AuthTopology;
    readonly traffic: TrafficTopology;
}

/**
 * Location of the bundled topology file (`config/topology.yml` at the repo
 * root), seen from either `src/config` or the built `dist/src/config`.
 */
export function topologyPath_default(): string {
    const here: string = path.dirname(fileURLToPath(import.meta.url));
    const candidates: string[] = [
        path.resolve(here, '..', '..', 'config', 'topology.yml'),
        path.resolve(here, '..', '..', '..', 'config', 'topology.yml')
    ];
    return candidates.find((candidate: string): boolean => fs.existsSync(candidate)) ?? candidates[0];
}

/**
 * Parse and validate a topology YAML document.
 *
 * @param yamlStr - Raw YAML text.
 * @returns Frozen topology.
 * @throws ConfigurationError on malformed YAML or schema violations.
 */
export function topology_parse(yamlStr: string): Topology {
    let raw: unknown;
    try {
        raw = yaml.load(yamlStr);
    } catch (error: unknown) {
        throw new ConfigurationError('Topology YAML is malformed', [errorMessage_get(error)]);
    }

    const result = TopologySchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError('Topology failed validation', result.error.issues.map(issue_format));
    }

    const topology: Topology = topology_build(result.data);
    interfaceMap_validate(topology.traffic);
    return topology;
}

/**
 * Read and validate a topology file.
 *
 * @param filePath - YAML file path; defaults to the bundled topology.
 */
export function topology_load(filePath: string = topologyPath_default()): Topology {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigurationError(`Cannot read topology file ${filePath}`, [errorMessage_get(error)]);
    }
    return topology_parse(content);
}

/**
 * Check that every provider × connection-type pair the dimension sets can
 * produce has a non-empty interface list without repeats.
 *
 * @throws ConfigurationError listing every offending pair.
 */
export function interfaceMap_validate(traffic: TrafficTopology): void {
    const problems: string[] = [];
    for (const provider of traffic.providers) {
        const byType: Readonly<Record<string, readonly string[]>> | undefined = traffic.interfaces[provider];
        for (const connectionType of traffic.connectionTypes) {
            const list: readonly string[] | undefined = byType?.[connectionType];
            if (!list || list.length === 0) {
                problems.push(`no interfaces for ${provider}/${connectionType}`);
            } else if (new Set(list).size !== list.length) {
                problems.push(`repeated interfaces for ${provider}/${connectionType}`);
            }
        }
    }
    if (problems.length > 0) {
        throw new ConfigurationError('Interface mapping is invalid', problems);
    }
}

function issue_format(issue: ZodIssue): string {
    const where: string = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
}

function topology_build(raw: RawTopology): Topology {
    const interfaces: Record<string, Readonly<Record<string, readonly string[]>>> = {};
    for (const [provider, byType] of Object.entries(raw.traffic.interfaces)) {
        const frozen: Record<string, readonly string[]> = {};
        for (const [connectionType, list] of Object.entries(byType)) {
            frozen[connectionType] = Object.freeze([...list]);
        }
        interfaces[provider] = Object.freeze(frozen);
    }

    const { attacker, legitimate, corporate } = raw.auth.actors;
    return Object.freeze({
        auth: Object.freeze({
            clientSignatures: Object.freeze([...raw.auth.clientSignatures]),
            attacker: Object.freeze({
                ips: Object.freeze([...attacker.ips]),
                usernames: Object.freeze([...attacker.usernames]),
                failureReasons: Object.freeze([...attacker.failureReasons])
            }),
            legitimate: Object.freeze({
                ips: Object.freeze([...legitimate.ips]),
                usernames: Object.freeze([...legitimate.usernames]),
                failureReasons: Object.freeze([...legitimate.failureReasons])
            }),
            corporate: Object.freeze({
                ips: Object.freeze([...corporate.ips])
            })
        }),
        traffic: Object.freeze({
            providers: Object.freeze([...raw.traffic.providers]),
            connectionTypes: Object.freeze([...raw.traffic.connectionTypes]),
            nodeTypes: Object.freeze([...raw.traffic.nodeTypes]),
            nodes: Object.freeze([...raw.traffic.nodes]),
            interfaces: Object.freeze(interfaces)
        })
    });
}
