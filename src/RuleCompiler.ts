/**
 * RuleCompiler — Merge + Sort
 *
 * Pure given its inputs: concatenates every source's rules and sorts them
 * by specificity, then source rank, then declaration order. The result is
 * frozen and never mutated after it is returned.
 */
import { compareSpecificity, specificity } from './PatternMatcher.js';
import { SOURCE_RANK } from './types.js';
import type { CompiledRule, CompiledRuleSet, Rule, RuleSource } from './types.js';

/** Total order over compiled rules; most specific first. */
export function compareRules(a: CompiledRule, b: CompiledRule): number {
    return compareSpecificity(a.specificity, b.specificity)
        || a.rank - b.rank
        || a.order - b.order;
}

/** Attach source metadata and specificity to plain rules. */
export function compileRules(
    batches: ReadonlyArray<{ readonly source: RuleSource; readonly rules: readonly Rule[] }>,
): CompiledRule[] {
    const compiled: CompiledRule[] = [];
    let order = 0;

    for (const { source, rules } of batches) {
        for (const rule of rules) {
            compiled.push(Object.freeze({
                ...rule,
                source: source.kind,
                rank: SOURCE_RANK[source.kind],
                order: order++,
                caseSensitive: source.caseSensitive,
                specificity: specificity(rule.pattern),
            }));
        }
    }

    return compiled.sort(compareRules);
}

/**
 * Collect rules from every source (in the given order) and build a snapshot.
 * Source failures propagate unchanged.
 */
export async function buildRuleSet(
    sources: readonly RuleSource[],
    generation: number,
): Promise<CompiledRuleSet> {
    const batches = await Promise.all(
        sources.map(async source => ({ source, rules: await source.listRules() })),
    );

    return Object.freeze({
        rules: Object.freeze(compileRules(batches)),
        generation,
        builtAt: Date.now(),
    });
}
