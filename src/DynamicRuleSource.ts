/**
 * DynamicRuleSource — Store-Backed Rules
 *
 * Reads rules from a mutable `RuleStore`. Mutations go through the store and
 * are NOT picked up until `invalidate()` is called, which tells every
 * subscriber (the rule cache) to rebuild on next use.
 */
import { ConfigurationError, SourceUnavailableError } from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import { normalizeEntries, normalizeEntry, storedRuleToEntry } from './RuleNormalizer.js';
import type {
    InvalidationListener,
    Rule,
    RuleSource,
    RuleStore,
    StoredRule,
} from './types.js';

export class DynamicRuleSource implements RuleSource {
    readonly kind = 'dynamic';
    readonly caseSensitive = false;
    private readonly store: RuleStore;
    private readonly listeners = new Set<InvalidationListener>();
    private readonly log: Logger;

    constructor(store: RuleStore, logger?: Logger) {
        this.store = store;
        this.log = componentLogger('DynamicRuleSource', logger);
    }

    async listRules(): Promise<readonly Rule[]> {
        let stored: readonly StoredRule[];
        try {
            stored = await this.store.findAll();
        } catch (err) {
            throw new SourceUnavailableError('Dynamic rule store is unavailable.', err);
        }
        return normalizeEntries(stored.map(storedRuleToEntry), { source: this.kind, lowercase: true });
    }

    supportsLiveInvalidation(): boolean {
        return true;
    }

    subscribe(listener: InvalidationListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Signal that stored rules changed. Call after the mutation is committed. */
    invalidate(): void {
        this.log.debug({ subscribers: this.listeners.size }, 'rules_invalidated');
        for (const listener of this.listeners) listener();
    }

    // ── Mutations (delegate to the store, no implicit invalidation) ─

    /** Validate and insert a new rule. Throws if the id is taken. */
    async add(rule: StoredRule): Promise<void> {
        this.validate(rule);
        if (!(await this.store.insert(rule))) {
            throw new ConfigurationError(`Dynamic rule "${rule.id}" already exists.`, { source: this.kind });
        }
    }

    /** Validate and replace an existing rule. Throws if the id is unknown. */
    async update(rule: StoredRule): Promise<void> {
        this.validate(rule);
        if (!(await this.store.replace(rule))) {
            throw new ConfigurationError(`Dynamic rule "${rule.id}" does not exist.`, { source: this.kind });
        }
    }

    /** Returns whether a rule was removed. */
    remove(id: string): Promise<boolean> {
        return this.store.remove(id);
    }

    private validate(rule: StoredRule): void {
        normalizeEntry(storedRuleToEntry(rule), 0, { source: this.kind, lowercase: true });
    }
}
