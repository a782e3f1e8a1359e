/**
 * path-policy-resolver — Public API
 *
 * Resolves whether a request may proceed by matching its method and path
 * against Ant-style rules from static, map and dynamic sources, with a
 * lockdown posture for requests no rule covers.
 */

// Facade
export { createPolicyResolver } from './ResolverFactory.js';
export type { ResolverCollaborators, PolicyRuntime } from './ResolverFactory.js';
export { PolicyResolver, findMatch, requestPath, outcomeStatus } from './PolicyResolver.js';
export type { PolicyResolverOptions } from './PolicyResolver.js';

// Types
export type {
    HttpMethod,
    ReservedToken,
    AccessExpr,
    RuleEntry,
    Rule,
    RuleSourceKind,
    SpecificityKey,
    CompiledRule,
    CompiledRuleSet,
    InvalidationListener,
    RuleSource,
    StoredRule,
    RuleStore,
    LockdownPolicy,
    PolicyDecision,
    AuthenticationLevel,
    Caller,
    ExpressionEvaluator,
    AuthorizationOutcome,
} from './types.js';
export { HTTP_METHODS, SOURCE_RANK, DEFAULT_LOCKDOWN } from './types.js';

// Configuration
export {
    loadSecurityConfig,
    readSecurityConfigFile,
    securityConfigSchema,
    ruleEntrySchema,
    SECURITY_CONFIG_TYPES,
} from './config.js';
export type { SecurityConfig, SecurityConfigInput, SecurityConfigType } from './config.js';

// Errors
export {
    PolicyError,
    ConfigurationError,
    SourceUnavailableError,
    AccessDeniedError,
    MissingRuleError,
} from './errors.js';

// Pure functions
export { matchPattern, specificity, compareSpecificity, tokenize } from './PatternMatcher.js';
export { validatePattern, validateMethod, isHttpMethod, VALID_METHODS } from './PatternValidator.js';
export { parseAccess, splitConfigAttribute, normalizeEntry, normalizeEntries, isAuthorityToken } from './RuleNormalizer.js';
export { compileRules, compareRules, buildRuleSet } from './RuleCompiler.js';
export { decideUnmatched } from './LockdownEnforcer.js';
export { AccessVoter, RESERVED_TOKEN_EXPRESSIONS, isReservedToken } from './AccessVoter.js';

// Sources & infrastructure
export { StaticRuleSource } from './StaticRuleSource.js';
export { ConfigMapRuleSource } from './ConfigMapRuleSource.js';
export { DynamicRuleSource } from './DynamicRuleSource.js';
export { InMemoryRuleStore } from './InMemoryRuleStore.js';
export { RuleCache } from './RuleCache.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
