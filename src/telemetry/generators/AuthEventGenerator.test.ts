import { describe, it, expect } from 'vitest';
import { AuthEventGenerator, batch_summarize, ACTOR_PROFILES } from './AuthEventGenerator.js';
import { random_create } from '../random.js';
import { ConfigurationError } from '../../config/errors.js';
import type { AuthTopology } from '../../config/topology.js';
import type { AuthBatch, AuthEvent } from '../types.js';

const FIXED_CLOCK = (): Date => new Date('2024-05-01T12:00:00.000Z');

function topology_make(overrides: Partial<AuthTopology> = {}): AuthTopology {
    return {
        clientSignatures: ['Mozilla/5.0', 'curl/7.68.0'],
        attacker: {
            ips: ['1.2.3.4'],
            usernames: ['root', 'admin'],
            failureReasons: ['invalid_credentials', 'user_not_found', 'password_mismatch', 'account_locked'],
        },
        legitimate: {
            ips: ['10.0.1.50', '10.0.1.51'],
            usernames: ['alice@example.test', 'bob@example.test'],
            failureReasons: ['invalid_credentials', 'session_expired'],
        },
        corporate: { ips: ['10.0.0.10'] },
        ...overrides,
    };
}

function generator_make(seed: number, tenants: string[] = ['acme']): AuthEventGenerator {
    return new AuthEventGenerator({
        tenants,
        topology: topology_make(),
        random: random_create(seed),
        clock: FIXED_CLOCK,
    });
}

function byActor(batch: AuthBatch, actor: AuthEvent['actor']): AuthEvent[] {
    return batch.events.filter((event: AuthEvent): boolean => event.actor === actor);
}

describe('AuthEventGenerator', (): void => {
    it('reproduces the same batch for the same seed', (): void => {
        const first: AuthBatch = generator_make(2024).generate(1);
        const second: AuthBatch = generator_make(2024).generate(1);

        expect(first).toEqual(second);
    });

    it('draws the attacker sub-batch from the configured pools', (): void => {
        const batch: AuthBatch = generator_make(2024).generate(1);
        const attackers: AuthEvent[] = byActor(batch, 'attacker');

        expect(attackers.length).toBeGreaterThanOrEqual(3);
        expect(attackers.length).toBeLessThanOrEqual(8);
        for (const event of attackers) {
            expect(event.ip).toBe('1.2.3.4');
            expect(event.tenant).toBe('acme');
        }
    });

    it('emits actor classes in attacker, legitimate, corporate order', (): void => {
        const generator: AuthEventGenerator = generator_make(5);
        for (let cycle = 1; cycle <= 50; cycle++) {
            const actors: string[] = generator.generate(cycle).events.map((event: AuthEvent): string => event.actor);
            const firstLegit: number = actors.indexOf('legitimate');
            const lastAttacker: number = actors.lastIndexOf('attacker');
            expect(lastAttacker).toBeLessThan(firstLegit);
            expect(actors.filter((actor: string): boolean => actor === 'corporate').length).toBeLessThanOrEqual(1);
            if (actors.includes('corporate')) {
                expect(actors[actors.length - 1]).toBe('corporate');
            }
        }
    });

    it('keeps sub-batch sizes inside their ranges', (): void => {
        const generator: AuthEventGenerator = generator_make(17);
        for (let cycle = 1; cycle <= 200; cycle++) {
            const batch: AuthBatch = generator.generate(cycle);
            const legit: number = byActor(batch, 'legitimate').length;
            const attack: number = byActor(batch, 'attacker').length;
            expect(attack).toBeGreaterThanOrEqual(ACTOR_PROFILES.attacker.countMin);
            expect(attack).toBeLessThanOrEqual(ACTOR_PROFILES.attacker.countMax);
            expect(legit).toBeGreaterThanOrEqual(ACTOR_PROFILES.legitimate.countMin);
            expect(legit).toBeLessThanOrEqual(ACTOR_PROFILES.legitimate.countMax);
        }
    });

    it('always succeeds corporate logins with legitimate usernames', (): void => {
        const generator: AuthEventGenerator = generator_make(99);
        let corporate: number = 0;
        for (let cycle = 1; cycle <= 300; cycle++) {
            for (const event of byActor(generator.generate(cycle), 'corporate')) {
                corporate++;
                expect(event.success).toBe(true);
                expect(event.failureReason).toBeUndefined();
                expect(event.ip).toBe('10.0.0.10');
                expect(['alice@example.test', 'bob@example.test']).toContain(event.username);
            }
        }
        // 300 cycles at p=0.3 lands well inside (45, 135)
        expect(corporate).toBeGreaterThan(45);
        expect(corporate).toBeLessThan(135);
    });

    it('converges to the class success rates', (): void => {
        const generator: AuthEventGenerator = generator_make(31337, ['acme', 'globex']);
        const tally = { attacker: { n: 0, ok: 0 }, legitimate: { n: 0, ok: 0 } };
        let cycle: number = 0;
        while (tally.attacker.n < 20000 || tally.legitimate.n < 20000) {
            cycle++;
            for (const event of generator.generate(cycle).events) {
                if (event.actor === 'corporate') continue;
                tally[event.actor].n++;
                if (event.success) tally[event.actor].ok++;
            }
        }

        expect(Math.abs(tally.attacker.ok / tally.attacker.n - 0.05)).toBeLessThanOrEqual(0.01);
        expect(Math.abs(tally.legitimate.ok / tally.legitimate.n - 0.90)).toBeLessThanOrEqual(0.01);
    });

    it('stamps events with the injected clock', (): void => {
        const batch: AuthBatch = generator_make(1).generate(1);
        expect(batch.events.every((event: AuthEvent): boolean => event.timestamp === '2024-05-01T12:00:00.000Z')).toBe(true);
        expect(batch.cycle).toBe(1);
    });

    it('fails with a configuration error on an empty tenant set', (): void => {
        expect(() => generator_make(1, [])).toThrow(ConfigurationError);
        expect(() => generator_make(1, [])).toThrow('tenants is empty');
    });

    it('fails with a configuration error on an empty pool', (): void => {
        expect(() => new AuthEventGenerator({
            tenants: ['acme'],
            topology: topology_make({ corporate: { ips: [] } }),
            random: random_create(1),
        })).toThrow('corporate.ips is empty');
    });
});

describe('batch_summarize', (): void => {
    it('counts events and failures', (): void => {
        const event: AuthEvent = {
            timestamp: '2024-05-01T12:00:00.000Z',
            tenant: 'acme',
            actor: 'attacker',
            ip: '1.2.3.4',
            username: 'root',
            success: false,
            failureReason: 'user_not_found',
            userAgent: 'curl/7.68.0',
            method: 'password',
        };
        const batch: AuthBatch = { cycle: 3, events: [event, { ...event, success: true, failureReason: undefined }, event] };

        expect(batch_summarize(batch)).toEqual({ events: 3, failures: 2 });
    });
});
