/**
 * RuleCache — Snapshot Cache With Explicit Invalidation
 *
 * Holds the published `CompiledRuleSet`. Readers get the snapshot reference
 * and use it to completion; a rebuild replaces the reference in one
 * assignment, so nobody sees a half-built list.
 *
 * - `invalidate()` only bumps the generation counter.
 * - `current()` rebuilds lazily when the snapshot is older than the
 *   generation. Callers for the same generation share one rebuild, and a
 *   rebuild for a newer generation waits for the running one to settle.
 * - A failed rebuild publishes nothing and the next `current()` retries.
 *   There is no fallback to the stale snapshot.
 */
import { ConfigurationError } from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import { buildRuleSet } from './RuleCompiler.js';
import type { CompiledRuleSet, RuleSource } from './types.js';

interface InflightBuild {
    readonly generation: number;
    readonly promise: Promise<CompiledRuleSet>;
}

export class RuleCache {
    private readonly sources: readonly RuleSource[];
    private readonly log: Logger;
    private readonly unsubscribers: Array<() => void> = [];

    private snapshot: CompiledRuleSet | undefined;
    private generation = 0;
    private inflight: InflightBuild | undefined;

    constructor(sources: readonly RuleSource[], logger?: Logger) {
        if (sources.length === 0) {
            throw new ConfigurationError('RuleCache requires at least one rule source.');
        }

        this.sources = Object.freeze([...sources]);
        this.log = componentLogger('RuleCache', logger);

        for (const source of this.sources) {
            if (source.supportsLiveInvalidation() && source.subscribe) {
                this.unsubscribers.push(source.subscribe(() => this.invalidate()));
            }
        }
    }

    /** The fresh snapshot, building it first if needed. */
    current(): Promise<CompiledRuleSet> {
        const snapshot = this.snapshot;
        if (snapshot && snapshot.generation === this.generation) {
            return Promise.resolve(snapshot);
        }

        if (this.inflight && this.inflight.generation === this.generation) {
            return this.inflight.promise;
        }

        const generation = this.generation;
        const promise = this.rebuild(generation, this.inflight?.promise);
        this.inflight = { generation, promise };
        return promise;
    }

    /** The last published snapshot, fresh or not. Never builds. */
    peek(): CompiledRuleSet | undefined {
        return this.snapshot;
    }

    /** Mark the snapshot stale. The next `current()` rebuilds. */
    invalidate(): void {
        this.generation++;
        this.log.debug({ generation: this.generation }, 'rules_invalidated');
    }

    /** Whether `current()` would return without building. */
    isFresh(): boolean {
        return this.snapshot !== undefined && this.snapshot.generation === this.generation;
    }

    /** Stop listening to live sources. */
    close(): void {
        for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    }

    private async rebuild(
        generation: number,
        previous: Promise<CompiledRuleSet> | undefined,
    ): Promise<CompiledRuleSet> {
        try {
            if (previous) {
                // The earlier build reports its own failure to its own callers.
                await previous.catch(() => undefined);
            }

            const built = await buildRuleSet(this.sources, generation);
            this.snapshot = built;
            this.log.debug(
                { generation, rules: built.rules.length, stale: generation !== this.generation },
                'rule_set_compiled',
            );
            return built;
        } catch (err) {
            this.log.error({ err, generation }, 'rule_set_build_failed');
            throw err;
        } finally {
            if (this.inflight?.generation === generation) {
                this.inflight = undefined;
            }
        }
    }
}
