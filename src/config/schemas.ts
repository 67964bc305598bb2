/**
 * @file Topology Schemas
 *
 * Zod runtime schemas for the static topology YAML. Pools and vocabularies
 * must be non-empty, so every random draw downstream is a total function.
 *
 * @module config/schemas
 */

import { z } from 'zod';

// ─── Shared ──────────────────────────────────────────────────────────────────

function values_areUnique(values: readonly string[]): boolean {
    return new Set(values).size === values.length;
}

const PoolSchema = z.array(z.string().min(1))
    .min(1, 'pool must not be empty')
    .refine(values_areUnique, 'pool must not repeat values');

// ─── Auth vocabularies ───────────────────────────────────────────────────────

export const ActorPoolSchema = z.object({
    ips:            PoolSchema,
    usernames:      PoolSchema.optional(),
    failureReasons: PoolSchema.optional()
});

export const AuthTopologySchema = z.object({
    clientSignatures: z.array(z.string().min(1)).length(2, 'exactly two client signatures are required'),
    actors: z.object({
        attacker:   ActorPoolSchema.extend({ usernames: PoolSchema, failureReasons: PoolSchema }),
        legitimate: ActorPoolSchema.extend({ usernames: PoolSchema, failureReasons: PoolSchema }),
        corporate:  ActorPoolSchema
    })
});

// ─── Traffic dimensions ──────────────────────────────────────────────────────

/**
 * provider → connection type → interface list. Completeness against the
 * provider and connection-type sets is checked after parsing.
 */
export const InterfaceMapSchema = z.record(
    z.string(),
    z.record(z.string(), z.array(z.string().min(1)).refine(values_areUnique, 'interfaces must not repeat'))
);

export const TrafficTopologySchema = z.object({
    providers:       PoolSchema,
    connectionTypes: PoolSchema,
    nodeTypes:       PoolSchema,
    nodes:           PoolSchema,
    interfaces:      InterfaceMapSchema
});

// ─── Document ────────────────────────────────────────────────────────────────

export const TopologySchema = z.object({
    auth:    AuthTopologySchema,
    traffic: TrafficTopologySchema
});

export type RawTopology = z.infer<typeof TopologySchema>;
export type RawAuthTopology = z.infer<typeof AuthTopologySchema>;
export type RawTrafficTopology = z.infer<typeof TrafficTopologySchema>;
