/**
 * Errors — failure taxonomy.
 *
 * Decisions (`denied-no-rule`, `configuration-error-no-rule`) are values.
 * These classes cover what is thrown: bad configuration at load time,
 * an unreachable rule store during a rebuild, and `enforce()` rejections.
 */
import type { RuleSourceKind } from './types.js';

export abstract class PolicyError extends Error {
    abstract readonly code: string;
    /** HTTP status a request layer would answer with. */
    abstract readonly status: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export interface ConfigurationErrorDetails {
    readonly source?: RuleSourceKind;
    readonly ruleIndex?: number;
}

export class ConfigurationError extends PolicyError {
    readonly code = 'CONFIGURATION_ERROR';
    readonly status = 500;
    readonly source?: RuleSourceKind;
    readonly ruleIndex?: number;

    constructor(message: string, details: ConfigurationErrorDetails = {}) {
        super(message);
        this.source = details.source;
        this.ruleIndex = details.ruleIndex;
    }
}

/** The dynamic rule store could not be read while building a snapshot. */
export class SourceUnavailableError extends PolicyError {
    readonly code = 'SOURCE_UNAVAILABLE';
    readonly status = 503;

    constructor(message: string, cause: unknown) {
        super(message, { cause });
    }
}

export class AccessDeniedError extends PolicyError {
    readonly code = 'ACCESS_DENIED';
    readonly status = 403;

    constructor(
        readonly method: string,
        readonly path: string,
        readonly reason: 'no-rule' | 'insufficient-authority',
    ) {
        super(`Access denied to ${method} ${path} (${reason}).`);
    }
}

/** No rule covers the request and public invocations are rejected. */
export class MissingRuleError extends PolicyError {
    readonly code = 'MISSING_RULE';
    readonly status = 500;

    constructor(readonly method: string, readonly path: string) {
        super(`No access rule is configured for ${method} ${path}.`);
    }
}
