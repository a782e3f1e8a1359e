import { describe, it, expect, vi } from 'vitest';
import { RuleCache } from '../src/RuleCache.js';
import { DynamicRuleSource } from '../src/DynamicRuleSource.js';
import { InMemoryRuleStore } from '../src/InMemoryRuleStore.js';
import { normalizeEntry } from '../src/RuleNormalizer.js';
import { ConfigurationError, SourceUnavailableError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import type { Rule, RuleSource } from '../src/types.js';

const logger = createLogger({ level: 'silent' });

// ── Helpers ─────────────────────────────────────────────────────────

function rule(pattern: string): Rule {
    return normalizeEntry({ pattern, access: 'ROLE_A' }, 0, { source: 'map', lowercase: true });
}

function fakeSource(listRules: () => Promise<readonly Rule[]>): RuleSource {
    return { kind: 'map', caseSensitive: false, listRules, supportsLiveInvalidation: () => false };
}

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

// ── Tests ───────────────────────────────────────────────────────────

describe('RuleCache', () => {
    it('requires at least one source', () => {
        expect(() => new RuleCache([], logger)).toThrow(ConfigurationError);
    });

    it('builds lazily once and returns the same snapshot', async () => {
        const listRules = vi.fn(async () => [rule('/a')]);
        const cache = new RuleCache([fakeSource(listRules)], logger);

        expect(cache.peek()).toBeUndefined();
        const first = await cache.current();
        const second = await cache.current();

        expect(second).toBe(first);
        expect(listRules).toHaveBeenCalledTimes(1);
        expect(cache.isFresh()).toBe(true);
    });

    it('shares one rebuild between concurrent callers', async () => {
        const gate = deferred<readonly Rule[]>();
        const listRules = vi.fn(() => gate.promise);
        const cache = new RuleCache([fakeSource(listRules)], logger);

        const a = cache.current();
        const b = cache.current();
        gate.resolve([rule('/a')]);

        expect(await a).toBe(await b);
        expect(listRules).toHaveBeenCalledTimes(1);
    });

    it('rebuilds after invalidate()', async () => {
        const listRules = vi.fn<() => Promise<readonly Rule[]>>()
            .mockResolvedValueOnce([rule('/old')])
            .mockResolvedValueOnce([rule('/new')]);
        const cache = new RuleCache([fakeSource(listRules)], logger);

        const before = await cache.current();
        cache.invalidate();
        expect(cache.isFresh()).toBe(false);
        const after = await cache.current();

        expect(before.rules.map(r => r.pattern)).toEqual(['/old']);
        expect(after.rules.map(r => r.pattern)).toEqual(['/new']);
        expect(after.generation).toBe(before.generation + 1);
    });

    it('queues a single follow-up build when invalidated mid-build', async () => {
        const gate = deferred<readonly Rule[]>();
        const listRules = vi.fn<() => Promise<readonly Rule[]>>()
            .mockImplementationOnce(() => gate.promise)
            .mockResolvedValue([rule('/new')]);
        const cache = new RuleCache([fakeSource(listRules)], logger);

        const early = cache.current();
        cache.invalidate();
        const late = cache.current();
        const lateAgain = cache.current();

        // The follow-up waits for the running build.
        expect(listRules).toHaveBeenCalledTimes(1);
        gate.resolve([rule('/old')]);

        const earlySet = await early;
        const lateSet = await late;
        expect(earlySet.rules.map(r => r.pattern)).toEqual(['/old']);
        expect(lateSet.rules.map(r => r.pattern)).toEqual(['/new']);
        expect(await lateAgain).toBe(lateSet);
        expect(listRules).toHaveBeenCalledTimes(2);
        expect(cache.peek()).toBe(lateSet);
    });

    it('propagates build failures without falling back to the stale snapshot', async () => {
        const outage = new SourceUnavailableError('Dynamic rule store is unavailable.', new Error('down'));
        const listRules = vi.fn<() => Promise<readonly Rule[]>>()
            .mockResolvedValueOnce([rule('/a')])
            .mockRejectedValueOnce(outage)
            .mockResolvedValueOnce([rule('/b')]);
        const cache = new RuleCache([fakeSource(listRules)], logger);

        const first = await cache.current();
        cache.invalidate();

        await expect(cache.current()).rejects.toBe(outage);
        expect(cache.peek()).toBe(first);
        expect(cache.isFresh()).toBe(false);

        const retried = await cache.current();
        expect(retried.rules.map(r => r.pattern)).toEqual(['/b']);
    });

    it('invalidates itself when a live source signals', async () => {
        const source = new DynamicRuleSource(new InMemoryRuleStore(), logger);
        const cache = new RuleCache([source], logger);

        await cache.current();
        source.invalidate();
        expect(cache.isFresh()).toBe(false);

        await cache.current();
        cache.close();
        source.invalidate();
        expect(cache.isFresh()).toBe(true);
    });
});
