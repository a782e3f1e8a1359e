/**
 * path-policy-resolver — Public Types
 *
 * Rules map an Ant-style path pattern (and optionally an HTTP method) to an
 * access requirement. Decisions are values, never exceptions.
 */

// ── HTTP Methods ────────────────────────────────────────────────────

export const HTTP_METHODS = [
    'GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS', 'TRACE',
] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

// ── Access Requirements ─────────────────────────────────────────────

/** Reserved authority tokens understood by the access voter. */
export type ReservedToken =
    | 'ANY_AUTHENTICATED_ANONYMOUS'
    | 'ANY_AUTHENTICATED_REMEMBERED'
    | 'ANY_AUTHENTICATED_FULL';

/**
 * Either a set of authority tokens (any one suffices) or an opaque boolean
 * expression handed to the expression evaluator untranslated.
 */
export type AccessExpr =
    | { readonly kind: 'authorities'; readonly authorities: ReadonlySet<string> }
    | { readonly kind: 'expression'; readonly expression: string };

// ── Rules ───────────────────────────────────────────────────────────

/** Rule entry as written in configuration (`staticRules`, `interceptUrlMap`). */
export interface RuleEntry {
    /** Ant-style pattern. Examples: `"/admin/**"`, `"/assets/*.css"` */
    readonly pattern: string;
    /** A token or expression, or a list of them. */
    readonly access: string | readonly string[];
    readonly httpMethod?: string;
}

/** A normalized rule. */
export interface Rule {
    readonly pattern: string;
    readonly httpMethod?: HttpMethod;
    readonly accessRequirement: AccessExpr;
}

/** Rule kinds in precedence order for equal specificity. */
export type RuleSourceKind = 'static' | 'map' | 'dynamic';

export const SOURCE_RANK: Readonly<Record<RuleSourceKind, number>> = Object.freeze({
    static: 0,
    map: 1,
    dynamic: 2,
});

/** Sort key; lower sorts first. See `compareSpecificity`. */
export interface SpecificityKey {
    readonly literalPrefixLength: number;
    readonly wildcardSegments: number;
}

/** A rule as published in a compiled rule set. */
export interface CompiledRule extends Rule {
    readonly source: RuleSourceKind;
    readonly rank: number;
    /** Position in the concatenated source output. */
    readonly order: number;
    /** Copied from the source; only structural declarations are case-sensitive. */
    readonly caseSensitive: boolean;
    readonly specificity: SpecificityKey;
}

/** Immutable snapshot of every active rule, most specific first. */
export interface CompiledRuleSet {
    readonly rules: readonly CompiledRule[];
    readonly generation: number;
    readonly builtAt: number;
}

// ── Rule Sources ────────────────────────────────────────────────────

export type InvalidationListener = () => void;

/** Polymorphic provider of rules. */
export interface RuleSource {
    readonly kind: RuleSourceKind;
    /** Whether its patterns match the request path as received, without lower-casing. */
    readonly caseSensitive: boolean;
    listRules(): readonly Rule[] | Promise<readonly Rule[]>;
    supportsLiveInvalidation(): boolean;
    /** Present on sources that support live invalidation. */
    subscribe?(listener: InvalidationListener): () => void;
}

/** Dynamic rule as persisted by the store collaborator. */
export interface StoredRule {
    readonly id: string;
    readonly url: string;
    /** Comma-separated tokens, e.g. `"ROLE_ADMIN,ROLE_SUPPORT"`. */
    readonly configAttribute: string;
    readonly httpMethod?: string;
}

/** Persistence collaborator behind the dynamic source. */
export interface RuleStore {
    findAll(): Promise<readonly StoredRule[]>;
    findById(id: string): Promise<StoredRule | undefined>;
    /**
     * Insert only when no rule has this `id`; returns whether it did.
     * The check and the write must be one atomic step in the store.
     */
    insert(rule: StoredRule): Promise<boolean>;
    /** Replace only when a rule has this `id`; returns whether it did. Atomic like `insert`. */
    replace(rule: StoredRule): Promise<boolean>;
    remove(id: string): Promise<boolean>;
}

// ── Lockdown & Decisions ────────────────────────────────────────────

export interface LockdownPolicy {
    /** When true, `rejectPublicInvocations` is ignored. */
    readonly rejectIfNoRule: boolean;
    readonly rejectPublicInvocations: boolean;
}

export const DEFAULT_LOCKDOWN: LockdownPolicy = Object.freeze({
    rejectIfNoRule: true,
    rejectPublicInvocations: true,
});

export type PolicyDecision =
    | {
        readonly type: 'matched';
        /** `null` when no rule matched and public invocations are allowed. */
        readonly accessRequirement: AccessExpr | null;
        readonly rule?: CompiledRule;
    }
    | { readonly type: 'denied-no-rule' }
    | { readonly type: 'configuration-error-no-rule' };

// ── Callers & Evaluation ────────────────────────────────────────────

export type AuthenticationLevel = 'anonymous' | 'remembered' | 'full';

/** Already-identified caller, as established by the authentication layer. */
export interface Caller {
    readonly authorities: Iterable<string>;
    readonly authentication: AuthenticationLevel;
}

/** Expression-language collaborator. */
export interface ExpressionEvaluator {
    evaluate(expression: string, caller: Caller): boolean;
}

export type AuthorizationOutcome =
    | { readonly status: 'granted'; readonly rule?: CompiledRule }
    | {
        readonly status: 'denied';
        readonly reason: 'no-rule' | 'insufficient-authority';
        readonly rule?: CompiledRule;
    }
    | { readonly status: 'configuration-error'; readonly reason: 'no-rule' };
