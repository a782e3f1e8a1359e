/**
 * RuleNormalizer — Entry → Rule
 *
 * Turns configuration entries and stored rules into validated `Rule` values.
 * Patterns are lower-cased for every source except static declarations.
 */
import { ConfigurationError } from './errors.js';
import { validateMethod, validatePattern, type RuleLocation } from './PatternValidator.js';
import type { AccessExpr, Rule, RuleEntry, RuleSourceKind, StoredRule } from './types.js';

/**
 * Identifiers starting with an upper-case letter are authority tokens
 * (`ROLE_ADMIN`, `ROLE_Support`); anything else is an expression.
 */
const AUTHORITY_TOKEN = /^[A-Z][A-Za-z0-9_]*$/;

export function isAuthorityToken(token: string): boolean {
    return AUTHORITY_TOKEN.test(token);
}

// ── Access ──────────────────────────────────────────────────────────

/**
 * Normalize `access` into an `AccessExpr`.
 *
 * A list of authority tokens becomes an authority set. A single expression
 * stays an expression. Expressions cannot share a rule with other tokens.
 */
export function parseAccess(
    access: string | readonly string[],
    location: RuleLocation,
    pattern: string,
): AccessExpr {
    const raw: readonly string[] = typeof access === 'string' ? [access] : access;
    const tokens = raw.map(token => token.trim()).filter(token => token.length > 0);
    const where = `Rule[${location.index}] (${location.source}, pattern: "${pattern}")`;
    const details = { source: location.source, ruleIndex: location.index };

    if (tokens.length === 0) {
        throw new ConfigurationError(`${where}: 'access' must name at least one token or expression.`, details);
    }

    const expressions = tokens.filter(token => !isAuthorityToken(token));
    if (expressions.length === 0) {
        const authorities: AccessExpr = { kind: 'authorities', authorities: new Set(tokens) };
        return Object.freeze(authorities);
    }

    if (tokens.length > 1) {
        throw new ConfigurationError(
            `${where}: "${expressions[0]}" is read as an expression and cannot be combined with other ` +
            `access tokens. Authority tokens must start with an upper-case letter and contain only ` +
            `letters, digits and underscores; join expressions into one instead.`,
            details,
        );
    }

    const expression: AccessExpr = { kind: 'expression', expression: tokens[0] };
    return Object.freeze(expression);
}

/**
 * Split a stored comma-separated attribute list. Commas inside parentheses
 * or quotes belong to an expression and do not split.
 *
 * @example
 * splitConfigAttribute("ROLE_A, ROLE_B")           // ['ROLE_A', 'ROLE_B']
 * splitConfigAttribute("hasAnyRole('A','B')")       // ["hasAnyRole('A','B')"]
 */
export function splitConfigAttribute(attribute: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let quote: string | undefined;
    let current = '';

    for (const ch of attribute) {
        if (quote) {
            if (ch === quote) quote = undefined;
        } else if (ch === '\'' || ch === '"') {
            quote = ch;
        } else if (ch === '(') {
            depth++;
        } else if (ch === ')') {
            depth = Math.max(0, depth - 1);
        } else if (ch === ',' && depth === 0) {
            parts.push(current.trim());
            current = '';
            continue;
        }
        current += ch;
    }
    parts.push(current.trim());

    return parts.filter(part => part.length > 0);
}

// ── Rules ───────────────────────────────────────────────────────────

export interface NormalizeOptions {
    readonly source: RuleSourceKind;
    readonly lowercase: boolean;
}

/** Validate and normalize a single entry. */
export function normalizeEntry(entry: RuleEntry, index: number, options: NormalizeOptions): Rule {
    const location = { source: options.source, index };
    const validated = validatePattern(entry.pattern, location);
    const pattern = options.lowercase ? validated.toLowerCase() : validated;
    const httpMethod = validateMethod(entry.httpMethod, location, pattern);
    const accessRequirement = parseAccess(entry.access, location, pattern);

    const rule: Rule = httpMethod
        ? { pattern, httpMethod, accessRequirement }
        : { pattern, accessRequirement };
    return Object.freeze(rule);
}

/** Validate and normalize a list of entries, failing on the first bad one. */
export function normalizeEntries(
    entries: readonly RuleEntry[],
    options: NormalizeOptions,
): readonly Rule[] {
    return Object.freeze(entries.map((entry, i) => normalizeEntry(entry, i, options)));
}

/** Convert a persisted dynamic rule into a configuration entry. */
export function storedRuleToEntry(stored: StoredRule): RuleEntry {
    return {
        pattern: stored.url,
        access: splitConfigAttribute(stored.configAttribute),
        httpMethod: stored.httpMethod,
    };
}
