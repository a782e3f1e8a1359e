/**
 * InMemoryRuleStore — process-local `RuleStore`.
 *
 * Keeps insertion order; a replaced rule keeps its original position.
 */
import type { RuleStore, StoredRule } from './types.js';

export class InMemoryRuleStore implements RuleStore {
    private readonly rules = new Map<string, StoredRule>();

    constructor(initial: readonly StoredRule[] = []) {
        for (const rule of initial) this.rules.set(rule.id, Object.freeze({ ...rule }));
    }

    async findAll(): Promise<readonly StoredRule[]> {
        return Object.freeze([...this.rules.values()]);
    }

    async findById(id: string): Promise<StoredRule | undefined> {
        return this.rules.get(id);
    }

    async insert(rule: StoredRule): Promise<boolean> {
        if (this.rules.has(rule.id)) return false;
        this.rules.set(rule.id, Object.freeze({ ...rule }));
        return true;
    }

    async replace(rule: StoredRule): Promise<boolean> {
        if (!this.rules.has(rule.id)) return false;
        this.rules.set(rule.id, Object.freeze({ ...rule }));
        return true;
    }

    async remove(id: string): Promise<boolean> {
        return this.rules.delete(id);
    }
}
