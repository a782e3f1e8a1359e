/**
 * PolicyResolver — First-Match-Wins Request Resolution
 *
 * Single responsibility: resolve (method, path) to a `PolicyDecision`.
 * Scans the cached rule set in specificity order and takes the first rule
 * whose pattern and method both fit. Misses go to the lockdown enforcer.
 *
 * No I/O of its own: the only wait is for the cache when it is stale.
 */
import { AccessDeniedError, MissingRuleError } from './errors.js';
import { AccessVoter } from './AccessVoter.js';
import { decideUnmatched } from './LockdownEnforcer.js';
import { componentLogger, type Logger } from './logger.js';
import { matchPattern } from './PatternMatcher.js';
import type { RuleCache } from './RuleCache.js';
import { DEFAULT_LOCKDOWN } from './types.js';
import type {
    AuthorizationOutcome,
    Caller,
    CompiledRule,
    CompiledRuleSet,
    ExpressionEvaluator,
    LockdownPolicy,
    PolicyDecision,
} from './types.js';

export interface PolicyResolverOptions {
    /** Missing switches default to `true`. */
    readonly lockdown?: Partial<LockdownPolicy>;
    readonly evaluator?: ExpressionEvaluator;
    readonly logger?: Logger;
}

// ── Matching ────────────────────────────────────────────────────────

/** Drop `?query` and `#fragment`. */
export function requestPath(path: string): string {
    const end = path.search(/[?#]/);
    return end === -1 ? path : path.slice(0, end);
}

/**
 * First rule in the set that matches. Lower-cased rules are matched against
 * the lower-cased path; static rules against the path as received.
 */
export function findMatch(
    ruleSet: CompiledRuleSet,
    method: string,
    path: string,
): CompiledRule | undefined {
    const verb = method.toUpperCase();
    const exact = requestPath(path);
    const lower = exact.toLowerCase();

    for (const rule of ruleSet.rules) {
        if (rule.httpMethod !== undefined && rule.httpMethod !== verb) continue;
        if (matchPattern(rule.pattern, rule.caseSensitive ? exact : lower)) return rule;
    }
    return undefined;
}

// ── Outcome Status ──────────────────────────────────────────────────

/** HTTP status a request layer renders for an outcome. */
export function outcomeStatus(outcome: AuthorizationOutcome): number {
    switch (outcome.status) {
        case 'granted': return 200;
        case 'denied': return 403;
        case 'configuration-error': return 500;
    }
}

// ── PolicyResolver ──────────────────────────────────────────────────

export class PolicyResolver {
    private readonly cache: RuleCache;
    private readonly lockdown: LockdownPolicy;
    private readonly voter: AccessVoter;
    private readonly log: Logger;

    constructor(cache: RuleCache, options: PolicyResolverOptions = {}) {
        this.cache = cache;
        this.lockdown = Object.freeze({ ...DEFAULT_LOCKDOWN, ...options.lockdown });
        this.voter = new AccessVoter(options.evaluator);
        this.log = componentLogger('PolicyResolver', options.logger);
    }

    /** The lockdown switches used when `resolve()` is given none. */
    get lockdownPolicy(): LockdownPolicy {
        return this.lockdown;
    }

    /**
     * Resolve the decision for a request.
     * Rejects with `SourceUnavailableError` when the rule set cannot be built.
     */
    async resolve(
        method: string,
        path: string,
        lockdown: LockdownPolicy = this.lockdown,
    ): Promise<PolicyDecision> {
        const ruleSet = await this.cache.current();
        const rule = findMatch(ruleSet, method, path);

        if (rule) {
            const matched: PolicyDecision = { type: 'matched', accessRequirement: rule.accessRequirement, rule };
            return Object.freeze(matched);
        }

        const decision = decideUnmatched(lockdown);
        if (decision.type === 'configuration-error-no-rule') {
            this.log.warn({ method, path }, 'no_rule_matched');
        } else if (decision.type === 'denied-no-rule') {
            this.log.info({ method, path }, 'no_rule_matched');
        }
        return decision;
    }

    /** Resolve, then vote the requirement for the caller. */
    async authorize(method: string, path: string, caller: Caller): Promise<AuthorizationOutcome> {
        const decision = await this.resolve(method, path);

        switch (decision.type) {
            case 'denied-no-rule':
                return { status: 'denied', reason: 'no-rule' };
            case 'configuration-error-no-rule':
                return { status: 'configuration-error', reason: 'no-rule' };
            case 'matched':
                return this.voter.vote(decision.accessRequirement, caller)
                    ? { status: 'granted', rule: decision.rule }
                    : { status: 'denied', reason: 'insufficient-authority', rule: decision.rule };
        }
    }

    /**
     * Like `authorize()`, but throws `AccessDeniedError` or `MissingRuleError`
     * instead of returning a negative outcome.
     */
    async enforce(method: string, path: string, caller: Caller): Promise<void> {
        const outcome = await this.authorize(method, path, caller);

        if (outcome.status === 'denied') {
            throw new AccessDeniedError(method, path, outcome.reason);
        }
        if (outcome.status === 'configuration-error') {
            throw new MissingRuleError(method, path);
        }
    }

    /** Invalidate the compiled rules; the next resolution rebuilds them. */
    clearCachedRules(): void {
        this.cache.invalidate();
    }
}
