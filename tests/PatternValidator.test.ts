import { describe, it, expect } from 'vitest';
import { validatePattern, validateMethod } from '../src/PatternValidator.js';
import { ConfigurationError } from '../src/errors.js';

const at = { source: 'map', index: 2 } as const;

describe('validatePattern', () => {
    it('throws on empty pattern', () => {
        expect(() => validatePattern('', at))
            .toThrow(`Rule[2] (map, pattern: ""): 'pattern' must be a non-empty string.`);
    });

    it('throws when the pattern does not start with /', () => {
        expect(() => validatePattern('admin/**', at)).toThrow('must start with "/"');
    });

    it('throws on whitespace and path variables', () => {
        expect(() => validatePattern('/a b', at)).toThrow('invalid segment "a b"');
        expect(() => validatePattern('/users/{id}', at)).toThrow('invalid segment "{id}"');
    });

    it('throws when ** is part of a segment', () => {
        expect(() => validatePattern('/a/**x', at)).toThrow('"**" must be a whole segment');
    });

    it('identifies the offending rule on the error', () => {
        let caught: unknown;
        try {
            validatePattern('nope', at);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught).toMatchObject({ ruleIndex: 2, source: 'map', status: 500 });
    });

    it('accepts valid patterns', () => {
        for (const pattern of ['/', '/**', '/admin/**', '/assets/*.css', '/files/?.txt', '/**/edit']) {
            expect(validatePattern(pattern, at)).toBe(pattern);
        }
    });
});

describe('validateMethod', () => {
    it('upper-cases known methods', () => {
        expect(validateMethod('put', at, '/x')).toBe('PUT');
        expect(validateMethod(' Delete ', at, '/x')).toBe('DELETE');
    });

    it('returns undefined when no method is given', () => {
        expect(validateMethod(undefined, at, '/x')).toBeUndefined();
        expect(validateMethod('', at, '/x')).toBeUndefined();
    });

    it('throws on unknown methods', () => {
        expect(() => validateMethod('FETCH', at, '/x')).toThrow('invalid httpMethod "FETCH"');
    });
});
