/**
 * AccessVoter — Requirement vs. Caller
 *
 * Votes a matched access requirement for an already-identified caller.
 * Authority sets are granted when ANY token is satisfied. Expressions go to
 * the injected `ExpressionEvaluator` untranslated.
 */
import { ConfigurationError } from './errors.js';
import type {
    AccessExpr,
    AuthenticationLevel,
    Caller,
    ExpressionEvaluator,
    ReservedToken,
} from './types.js';

/** Reserved tokens and the expressions an evaluator must treat them as. */
export const RESERVED_TOKEN_EXPRESSIONS: Readonly<Record<ReservedToken, string>> = Object.freeze({
    ANY_AUTHENTICATED_ANONYMOUS: 'permitAll',
    ANY_AUTHENTICATED_REMEMBERED: 'isAuthenticated() or isRememberMe()',
    ANY_AUTHENTICATED_FULL: 'isFullyAuthenticated()',
});

const REQUIRED_LEVEL: Readonly<Record<ReservedToken, readonly AuthenticationLevel[]>> = Object.freeze({
    ANY_AUTHENTICATED_ANONYMOUS: ['anonymous', 'remembered', 'full'],
    ANY_AUTHENTICATED_REMEMBERED: ['remembered', 'full'],
    ANY_AUTHENTICATED_FULL: ['full'],
});

export function isReservedToken(token: string): token is ReservedToken {
    return Object.hasOwn(RESERVED_TOKEN_EXPRESSIONS, token);
}

export class AccessVoter {
    private readonly evaluator: ExpressionEvaluator | undefined;

    constructor(evaluator?: ExpressionEvaluator) {
        this.evaluator = evaluator;
    }

    /** `null` is the public fallthrough and is always granted. */
    vote(requirement: AccessExpr | null, caller: Caller): boolean {
        if (requirement === null) return true;

        if (requirement.kind === 'expression') {
            if (!this.evaluator) {
                throw new ConfigurationError(
                    `No expression evaluator is configured for "${requirement.expression}".`,
                );
            }
            return this.evaluator.evaluate(requirement.expression, caller);
        }

        const held = new Set(caller.authorities);
        for (const token of requirement.authorities) {
            if (isReservedToken(token)) {
                if (REQUIRED_LEVEL[token].includes(caller.authentication)) return true;
            } else if (held.has(token)) {
                return true;
            }
        }
        return false;
    }
}
