/**
 * PatternMatcher — Ant-Style Path Matching
 *
 * Pure functions. Single responsibility: match a `/`-separated request path
 * against an Ant-style pattern and rank patterns by specificity.
 *
 * - `?`  matches exactly one character within a segment
 * - `*`  matches zero or more characters within a segment
 * - `**` matches zero or more whole segments
 *
 * Empty segments are ignored, so `/admin/` and `/admin` are the same path.
 */
import type { SpecificityKey } from './types.js';

/**
 * Match a request path against an Ant-style pattern. Case-sensitive.
 *
 * @example
 * matchPattern('/admin/**', '/admin/users/7')   // true
 * matchPattern('/admin/*', '/admin/users/7')    // false
 * matchPattern('/files/?.txt', '/files/a.txt')  // true
 */
export function matchPattern(pattern: string, path: string): boolean {
    return matchSegments(
        tokenize(pattern), 0,
        tokenize(path), 0,
    );
}

/** Split on `/`, dropping empty segments. */
export function tokenize(path: string): string[] {
    return path.split('/').filter(segment => segment.length > 0);
}

function matchSegments(
    pp: string[], pi: number,
    np: string[], ni: number,
): boolean {
    if (pi === pp.length && ni === np.length) return true;
    if (pi === pp.length) return false;
    if (ni === np.length) {
        for (let i = pi; i < pp.length; i++) {
            if (pp[i] !== '**') return false;
        }
        return true;
    }

    const segment = pp[pi];

    if (segment === '**') {
        return matchSegments(pp, pi + 1, np, ni)
            || matchSegments(pp, pi, np, ni + 1);
    }

    if (matchSegment(segment, 0, np[ni], 0)) {
        return matchSegments(pp, pi + 1, np, ni + 1);
    }

    return false;
}

/** Character-level match of one segment, honouring `*` and `?`. */
function matchSegment(pattern: string, pi: number, text: string, ti: number): boolean {
    if (pi === pattern.length) return ti === text.length;

    const ch = pattern[pi];

    if (ch === '*') {
        // Collapse runs of `*`; inside a segment they mean the same thing.
        let next = pi;
        while (next < pattern.length && pattern[next] === '*') next++;
        for (let i = ti; i <= text.length; i++) {
            if (matchSegment(pattern, next, text, i)) return true;
        }
        return false;
    }

    if (ti === text.length) return false;

    if (ch === '?' || ch === text[ti]) {
        return matchSegment(pattern, pi + 1, text, ti + 1);
    }

    return false;
}

// ── Specificity ─────────────────────────────────────────────────────

/**
 * Compute the specificity key of a pattern from its segments, so that
 * repeated or trailing slashes do not count.
 *
 * The literal prefix is the leading literal segments joined with `/`, plus
 * the literal start of the first wildcard segment. A `**` segment adds
 * nothing, not even its separator, since it also matches zero segments.
 *
 * @example
 * specificity('/admin')      // { literalPrefixLength: 6, wildcardSegments: 0 }
 * specificity('/admin/**')   // { literalPrefixLength: 6, wildcardSegments: 1 }
 * specificity('/files/?.txt') // { literalPrefixLength: 7, wildcardSegments: 1 }
 */
export function specificity(pattern: string): SpecificityKey {
    const segments = tokenize(pattern);
    let literalPrefixLength = 0;

    for (const segment of segments) {
        if (segment === '**') break;
        const firstWildcard = segment.search(/[*?]/);
        if (firstWildcard === -1) {
            literalPrefixLength += segment.length + 1;
            continue;
        }
        literalPrefixLength += firstWildcard + 1;
        break;
    }

    const wildcardSegments = segments
        .filter(segment => segment.includes('*') || segment.includes('?'))
        .length;

    return Object.freeze({ literalPrefixLength, wildcardSegments });
}

/**
 * Order two keys: longer literal prefix first, then fewer wildcard segments.
 * Returns 0 for ties; callers break those by source rank and declaration order.
 */
export function compareSpecificity(a: SpecificityKey, b: SpecificityKey): number {
    if (a.literalPrefixLength !== b.literalPrefixLength) {
        return b.literalPrefixLength - a.literalPrefixLength;
    }
    return a.wildcardSegments - b.wildcardSegments;
}
