/**
 * ConfigMapRuleSource — Configuration Map Rules
 *
 * Rules parsed from `staticRules` or `interceptUrlMap` entries when the map
 * is the primary source. Patterns are lower-cased.
 */
import { normalizeEntries } from './RuleNormalizer.js';
import type { Rule, RuleEntry, RuleSource } from './types.js';

export class ConfigMapRuleSource implements RuleSource {
    readonly kind = 'map';
    readonly caseSensitive = false;
    private readonly rules: readonly Rule[];

    constructor(entries: readonly RuleEntry[]) {
        this.rules = normalizeEntries(entries, { source: this.kind, lowercase: true });
    }

    listRules(): readonly Rule[] {
        return this.rules;
    }

    supportsLiveInvalidation(): boolean {
        return false;
    }
}
