/**
 * ResolverFactory — Config → Sources → Cache → Resolver
 *
 * Single responsibility: build the rule sources the configuration selects
 * and wire them into a `RuleCache` and `PolicyResolver`. Exactly one primary
 * source kind is active; a collaborator for another kind is rejected.
 * Configured `staticRules` exemptions rank as static rules but are
 * lower-cased; only declared rules keep their casing.
 */
import type { SecurityConfig } from './config.js';
import { ConfigMapRuleSource } from './ConfigMapRuleSource.js';
import { DynamicRuleSource } from './DynamicRuleSource.js';
import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';
import { PolicyResolver } from './PolicyResolver.js';
import { RuleCache } from './RuleCache.js';
import { StaticRuleSource } from './StaticRuleSource.js';
import type { ExpressionEvaluator, RuleEntry, RuleSource, RuleStore } from './types.js';

/** External collaborators; supply only the one the config type selects. */
export interface ResolverCollaborators {
    /** Rules derived from declarations (`Annotation`). */
    readonly declaredRules?: readonly RuleEntry[];
    /** Backing store for dynamic rules (`RequestmapInstances`). */
    readonly ruleStore?: RuleStore;
    readonly evaluator?: ExpressionEvaluator;
    readonly logger?: Logger;
}

export interface PolicyRuntime {
    readonly resolver: PolicyResolver;
    readonly cache: RuleCache;
    readonly sources: readonly RuleSource[];
    /** Present for `RequestmapInstances`. */
    readonly dynamicSource?: DynamicRuleSource;
}

function rejectExtra(config: SecurityConfig, name: string, present: boolean): void {
    if (present) {
        throw new ConfigurationError(
            `'${name}' was supplied but securityConfigType is "${config.securityConfigType}". ` +
            `Only one primary rule source may be active.`,
        );
    }
}

/**
 * Create the runtime for a loaded configuration.
 *
 * @example
 * ```typescript
 * const config = loadSecurityConfig({ securityConfigType: 'Map', interceptUrlMap: [...] });
 * const { resolver } = createPolicyResolver(config);
 * const decision = await resolver.resolve('GET', '/admin/users');
 * ```
 */
export function createPolicyResolver(
    config: SecurityConfig,
    collaborators: ResolverCollaborators = {},
): PolicyRuntime {
    const { declaredRules, ruleStore, evaluator, logger } = collaborators;
    const sources: RuleSource[] = [];
    let dynamicSource: DynamicRuleSource | undefined;

    switch (config.securityConfigType) {
        case 'Annotation': {
            rejectExtra(config, 'ruleStore', ruleStore !== undefined);
            if (!declaredRules) {
                throw new ConfigurationError(`securityConfigType "Annotation" requires 'declaredRules'.`);
            }
            sources.push(new StaticRuleSource(declaredRules));
            if (config.staticRules.length > 0) {
                sources.push(new StaticRuleSource(config.staticRules, { lowercase: true }));
            }
            break;
        }
        case 'Map': {
            rejectExtra(config, 'declaredRules', declaredRules !== undefined);
            rejectExtra(config, 'ruleStore', ruleStore !== undefined);
            sources.push(new ConfigMapRuleSource(config.interceptUrlMap ?? config.staticRules));
            break;
        }
        case 'RequestmapInstances': {
            rejectExtra(config, 'declaredRules', declaredRules !== undefined);
            if (!ruleStore) {
                throw new ConfigurationError(`securityConfigType "RequestmapInstances" requires a 'ruleStore'.`);
            }
            if (config.staticRules.length > 0) {
                sources.push(new StaticRuleSource(config.staticRules, { lowercase: true }));
            }
            dynamicSource = new DynamicRuleSource(ruleStore, logger);
            sources.push(dynamicSource);
            break;
        }
    }

    const cache = new RuleCache(sources, logger);
    const resolver = new PolicyResolver(cache, {
        lockdown: {
            rejectIfNoRule: config.rejectIfNoRule,
            rejectPublicInvocations: config.rejectPublicInvocations,
        },
        evaluator,
        logger,
    });

    return Object.freeze({ resolver, cache, sources: Object.freeze(sources), dynamicSource });
}
