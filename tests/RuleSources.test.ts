import { describe, it, expect, vi } from 'vitest';
import { StaticRuleSource } from '../src/StaticRuleSource.js';
import { ConfigMapRuleSource } from '../src/ConfigMapRuleSource.js';
import { DynamicRuleSource } from '../src/DynamicRuleSource.js';
import { InMemoryRuleStore } from '../src/InMemoryRuleStore.js';
import { ConfigurationError, SourceUnavailableError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import type { RuleStore } from '../src/types.js';

const logger = createLogger({ level: 'silent' });

describe('StaticRuleSource', () => {
    it('keeps declared casing and is read-only', async () => {
        const source = new StaticRuleSource([{ pattern: '/Reports/**', access: ['ROLE_ANALYST'] }]);

        expect(source.kind).toBe('static');
        expect(source.caseSensitive).toBe(true);
        expect(source.supportsLiveInvalidation()).toBe(false);
        expect(source.listRules().map(rule => rule.pattern)).toEqual(['/Reports/**']);
    });

    it('lower-cases configured exemptions when asked to', () => {
        const source = new StaticRuleSource([{ pattern: '/Login/**', access: 'ROLE_A' }], { lowercase: true });

        expect(source.kind).toBe('static');
        expect(source.caseSensitive).toBe(false);
        expect(source.listRules().map(rule => rule.pattern)).toEqual(['/login/**']);
    });

    it('fails fast on invalid entries', () => {
        expect(() => new StaticRuleSource([{ pattern: '/users/{id}', access: 'ROLE_A' }]))
            .toThrow(ConfigurationError);
    });
});

describe('ConfigMapRuleSource', () => {
    it('lower-cases patterns and keeps entry order', () => {
        const source = new ConfigMapRuleSource([
            { pattern: '/Admin/**', access: ['ROLE_ADMIN'] },
            { pattern: '/Login/**', access: 'permitAll' },
        ]);

        expect(source.kind).toBe('map');
        expect(source.supportsLiveInvalidation()).toBe(false);
        expect(source.listRules().map(rule => rule.pattern)).toEqual(['/admin/**', '/login/**']);
    });
});

describe('DynamicRuleSource', () => {
    it('lists stored rules as lower-cased rules', async () => {
        const store = new InMemoryRuleStore([
            { id: 'r1', url: '/Orders/**', configAttribute: 'ROLE_SALES, ROLE_ADMIN', httpMethod: 'get' },
        ]);
        const source = new DynamicRuleSource(store, logger);

        const rules = await source.listRules();
        expect(rules).toHaveLength(1);
        expect(rules[0].pattern).toBe('/orders/**');
        expect(rules[0].httpMethod).toBe('GET');
        expect(rules[0].accessRequirement).toEqual({
            kind: 'authorities',
            authorities: new Set(['ROLE_SALES', 'ROLE_ADMIN']),
        });
    });

    it('wraps store failures as SourceUnavailableError', async () => {
        const outage = new Error('connection refused');
        const store: RuleStore = {
            findAll: vi.fn().mockRejectedValue(outage),
            findById: vi.fn(),
            insert: vi.fn(),
            replace: vi.fn(),
            remove: vi.fn(),
        };
        const source = new DynamicRuleSource(store, logger);

        const failure = source.listRules();
        await expect(failure).rejects.toBeInstanceOf(SourceUnavailableError);
        await expect(failure).rejects.toMatchObject({ cause: outage, status: 503 });
    });

    it('adds, updates and removes through the store', async () => {
        const store = new InMemoryRuleStore();
        const source = new DynamicRuleSource(store, logger);

        await source.add({ id: 'r1', url: '/a/**', configAttribute: 'ROLE_A' });
        await source.update({ id: 'r1', url: '/a/**', configAttribute: 'ROLE_B' });
        expect(await store.findById('r1')).toEqual({ id: 'r1', url: '/a/**', configAttribute: 'ROLE_B' });

        expect(await source.remove('r1')).toBe(true);
        expect(await source.remove('r1')).toBe(false);
        expect(await store.findAll()).toEqual([]);
    });

    it('rejects duplicate adds and unknown updates', async () => {
        const store = new InMemoryRuleStore([{ id: 'r1', url: '/a/**', configAttribute: 'ROLE_A' }]);
        const source = new DynamicRuleSource(store, logger);

        await expect(source.add({ id: 'r1', url: '/b/**', configAttribute: 'ROLE_B' }))
            .rejects.toThrow('Dynamic rule "r1" already exists.');
        await expect(source.update({ id: 'r2', url: '/b/**', configAttribute: 'ROLE_B' }))
            .rejects.toThrow('Dynamic rule "r2" does not exist.');
    });

    it('lets only one of two concurrent adds with the same id through', async () => {
        const store = new InMemoryRuleStore();
        const source = new DynamicRuleSource(store, logger);

        const [first, second] = await Promise.allSettled([
            source.add({ id: 'r1', url: '/a/**', configAttribute: 'ROLE_A' }),
            source.add({ id: 'r1', url: '/b/**', configAttribute: 'ROLE_B' }),
        ]);

        expect(first.status).toBe('fulfilled');
        expect(second).toMatchObject({ status: 'rejected', reason: { message: 'Dynamic rule "r1" already exists.' } });
        expect(await store.findAll()).toEqual([{ id: 'r1', url: '/a/**', configAttribute: 'ROLE_A' }]);
    });

    it('accepts mixed-case authority tokens in stored attributes', async () => {
        const store = new InMemoryRuleStore([{ id: 'r1', url: '/support/**', configAttribute: 'ROLE_Support' }]);
        const rules = await new DynamicRuleSource(store, logger).listRules();

        expect(rules[0].accessRequirement).toEqual({ kind: 'authorities', authorities: new Set(['ROLE_Support']) });
    });

    it('validates before saving', async () => {
        const store = new InMemoryRuleStore();
        const source = new DynamicRuleSource(store, logger);

        await expect(source.add({ id: 'r1', url: 'no-slash', configAttribute: 'ROLE_A' }))
            .rejects.toBeInstanceOf(ConfigurationError);
        expect(await store.findAll()).toEqual([]);
    });

    it('notifies subscribers only on explicit invalidate()', async () => {
        const source = new DynamicRuleSource(new InMemoryRuleStore(), logger);
        const listener = vi.fn();
        const unsubscribe = source.subscribe(listener);

        await source.add({ id: 'r1', url: '/a/**', configAttribute: 'ROLE_A' });
        expect(listener).not.toHaveBeenCalled();

        source.invalidate();
        expect(listener).toHaveBeenCalledTimes(1);

        unsubscribe();
        source.invalidate();
        expect(listener).toHaveBeenCalledTimes(1);
        expect(source.supportsLiveInvalidation()).toBe(true);
    });
});
