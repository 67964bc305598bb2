/**
 * @file Auth Event Generator
 * Produces authentication attempts from three actor classes, each with its
 * own pools and success profile.
 */

import type { AuthBatch, AuthEvent, ActorClass, TelemetryGenerator } from '../types.js';
import type { AuthTopology } from '../../config/topology.js';
import type { RandomSource } from '../random.js';
import { ConfigurationError } from '../../config/errors.js';

export interface ActorProfile {
    countMin: number;
    countMax: number;
    successProbability: number;
}

export const ACTOR_PROFILES: Readonly<Record<'attacker' | 'legitimate', ActorProfile>> = {
    attacker: { countMin: 3, countMax: 8, successProbability: 0.05 },
    legitimate: { countMin: 5, countMax: 10, successProbability: 0.90 },
};

/** Chance per batch that one corporate-network login appears. */
export const CORPORATE_PROBABILITY: number = 0.30;

/** Chance that an event carries the first (browser) client signature. */
export const PRIMARY_SIGNATURE_PROBABILITY: number = 0.7;

export interface AuthEventGeneratorOptions {
    tenants: readonly string[];
    topology: AuthTopology;
    random: RandomSource;
    clock?: () => Date;
}

interface ActorDraw {
    actor: ActorClass;
    ips: readonly string[];
    usernames: readonly string[];
    failureReasons: readonly string[];
    successProbability: number;
}

export interface AuthBatchSummary {
    events: number;
    failures: number;
}

export class AuthEventGenerator implements TelemetryGenerator<AuthBatch> {
    private readonly tenants: readonly string[];
    private readonly topology: AuthTopology;
    private readonly random: RandomSource;
    private readonly clock: () => Date;

    constructor(options: AuthEventGeneratorOptions) {
        const empty: string[] = pools_findEmpty(options.tenants, options.topology);
        if (empty.length > 0) {
            throw new ConfigurationError('Auth event generator cannot attribute events', empty);
        }
        this.tenants = Object.freeze([...options.tenants]);
        this.topology = options.topology;
        this.random = options.random;
        this.clock = options.clock ?? ((): Date => new Date());
    }

    generate(cycle: number): AuthBatch {
        const events: AuthEvent[] = [];
        const { attacker, legitimate, corporate } = this.topology;

        const attackers: ActorDraw = {
            actor: 'attacker',
            ips: attacker.ips,
            usernames: attacker.usernames,
            failureReasons: attacker.failureReasons,
            successProbability: ACTOR_PROFILES.attacker.successProbability,
        };
        const attackerCount: number = this.random.int(ACTOR_PROFILES.attacker.countMin, ACTOR_PROFILES.attacker.countMax);
        for (let i = 0; i < attackerCount; i++) {
            events.push(this.event_draw(attackers));
        }

        const legitimates: ActorDraw = {
            actor: 'legitimate',
            ips: legitimate.ips,
            usernames: legitimate.usernames,
            failureReasons: legitimate.failureReasons,
            successProbability: ACTOR_PROFILES.legitimate.successProbability,
        };
        const legitimateCount: number = this.random.int(ACTOR_PROFILES.legitimate.countMin, ACTOR_PROFILES.legitimate.countMax);
        for (let i = 0; i < legitimateCount; i++) {
            events.push(this.event_draw(legitimates));
        }

        // Corporate logins reuse the legitimate vocabulary and never fail.
        if (this.random.chance(CORPORATE_PROBABILITY)) {
            events.push(this.event_draw({
                actor: 'corporate',
                ips: corporate.ips,
                usernames: legitimate.usernames,
                failureReasons: [],
                successProbability: 1,
            }));
        }

        return { cycle, events };
    }

    private event_draw(draw: ActorDraw): AuthEvent {
        const tenant: string = this.random.pick(this.tenants);
        const ip: string = this.random.pick(draw.ips);
        const username: string = this.random.pick(draw.usernames);
        const success: boolean = draw.successProbability >= 1 || this.random.chance(draw.successProbability);
        const failureReason: string | undefined = !success && draw.failureReasons.length > 0
            ? this.random.pick(draw.failureReasons)
            : undefined;
        const [primary, secondary] = this.topology.clientSignatures;
        const userAgent: string = this.random.chance(PRIMARY_SIGNATURE_PROBABILITY) ? primary : secondary;

        const event: AuthEvent = {
            timestamp: this.clock().toISOString(),
            tenant,
            actor: draw.actor,
            ip,
            username,
            success,
            userAgent,
            method: 'password',
        };
        if (failureReason !== undefined) event.failureReason = failureReason;
        return event;
    }
}

/**
 * Count events and failures in a batch.
 */
export function batch_summarize(batch: AuthBatch): AuthBatchSummary {
    return {
        events: batch.events.length,
        failures: batch.events.filter((event: AuthEvent): boolean => !event.success).length,
    };
}

function pools_findEmpty(tenants: readonly string[], topology: AuthTopology): string[] {
    const pools: Array<[string, readonly string[]]> = [
        ['tenants', tenants],
        ['attacker.ips', topology.attacker.ips],
        ['attacker.usernames', topology.attacker.usernames],
        ['attacker.failureReasons', topology.attacker.failureReasons],
        ['legitimate.ips', topology.legitimate.ips],
        ['legitimate.usernames', topology.legitimate.usernames],
        ['legitimate.failureReasons', topology.legitimate.failureReasons],
        ['corporate.ips', topology.corporate.ips],
    ];
    const problems: string[] = pools
        .filter(([, pool]: [string, readonly string[]]): boolean => pool.length === 0)
        .map(([name]: [string, readonly string[]]): string => `${name} is empty`);
    if (topology.clientSignatures.length !== 2) {
        problems.push('clientSignatures must hold exactly two values');
    }
    return problems;
}
