/**
 * PatternValidator — Eager Rule Validation
 *
 * Pure functions. Single responsibility: validate patterns and HTTP methods
 * at load time (fail-fast), naming the offending rule in the error.
 */
import { ConfigurationError } from './errors.js';
import { HTTP_METHODS, type HttpMethod, type RuleSourceKind } from './types.js';

// ── Constants ───────────────────────────────────────────────────────

export const VALID_METHODS = new Set<string>(HTTP_METHODS);

/** Valid segment: `**`, or any run of characters without whitespace or braces. */
const VALID_SEGMENT = /^(\*\*|[^\s{}]+)$/;

// ── Rule Location ───────────────────────────────────────────────────

export interface RuleLocation {
    readonly source: RuleSourceKind;
    readonly index: number;
}

function describe(location: RuleLocation, pattern: unknown): string {
    return `Rule[${location.index}] (${location.source}, pattern: "${String(pattern)}")`;
}

// ── Validate Pattern ────────────────────────────────────────────────

/**
 * Validate an Ant-style pattern. Throws `ConfigurationError` on the first
 * problem found.
 */
export function validatePattern(pattern: unknown, location: RuleLocation): string {
    const prefix = describe(location, pattern);
    const details = { source: location.source, ruleIndex: location.index };

    if (!pattern || typeof pattern !== 'string') {
        throw new ConfigurationError(`${prefix}: 'pattern' must be a non-empty string.`, details);
    }

    if (!pattern.startsWith('/')) {
        throw new ConfigurationError(`${prefix}: 'pattern' must start with "/".`, details);
    }

    for (const seg of pattern.split('/')) {
        if (seg === '') continue;
        if (!VALID_SEGMENT.test(seg)) {
            throw new ConfigurationError(
                `${prefix}: invalid segment "${seg}". ` +
                `Whitespace and "{}" path variables are not allowed.`,
                details,
            );
        }
        if (seg !== '**' && seg.includes('**')) {
            throw new ConfigurationError(
                `${prefix}: invalid segment "${seg}". "**" must be a whole segment.`,
                details,
            );
        }
    }

    return pattern;
}

// ── Validate Method ─────────────────────────────────────────────────

/**
 * Normalize an optional HTTP method to upper case and check it is known.
 */
export function validateMethod(
    method: string | undefined,
    location: RuleLocation,
    pattern: string,
): HttpMethod | undefined {
    if (method === undefined || method === '') return undefined;

    const upper = method.trim().toUpperCase();
    if (!isHttpMethod(upper)) {
        throw new ConfigurationError(
            `${describe(location, pattern)}: invalid httpMethod "${method}". ` +
            `Allowed: ${HTTP_METHODS.join(', ')}.`,
            { source: location.source, ruleIndex: location.index },
        );
    }
    return upper;
}

export function isHttpMethod(value: string): value is HttpMethod {
    return VALID_METHODS.has(value);
}
