/**
 * StaticRuleSource — Declared Rules
 *
 * Rules handed over at startup by the declaration collaborator keep their
 * casing. Configured exemptions (`staticRules`) are free text and are
 * lower-cased like the map source. Read-only after construction.
 */
import { normalizeEntries } from './RuleNormalizer.js';
import type { Rule, RuleEntry, RuleSource } from './types.js';

export interface StaticRuleSourceOptions {
    /** Lower-case patterns and match the path case-insensitively. Default `false`. */
    readonly lowercase?: boolean;
}

export class StaticRuleSource implements RuleSource {
    readonly kind = 'static';
    readonly caseSensitive: boolean;
    private readonly rules: readonly Rule[];

    constructor(entries: readonly RuleEntry[], options: StaticRuleSourceOptions = {}) {
        const lowercase = options.lowercase ?? false;
        this.caseSensitive = !lowercase;
        this.rules = normalizeEntries(entries, { source: this.kind, lowercase });
    }

    listRules(): readonly Rule[] {
        return this.rules;
    }

    supportsLiveInvalidation(): boolean {
        return false;
    }
}
