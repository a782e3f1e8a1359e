/**
 * LockdownEnforcer — No-Match Outcome
 *
 * Pure function of the lockdown switches. `rejectIfNoRule` wins outright:
 * when it is set, `rejectPublicInvocations` is never read.
 *
 * | rejectIfNoRule | rejectPublicInvocations | decision                      |
 * |----------------|-------------------------|-------------------------------|
 * | true           | (ignored)               | denied-no-rule                |
 * | false          | true                    | configuration-error-no-rule   |
 * | false          | false                   | matched, no requirement       |
 */
import type { LockdownPolicy, PolicyDecision } from './types.js';

const DENIED: PolicyDecision = Object.freeze({ type: 'denied-no-rule' });
const CONFIGURATION_ERROR: PolicyDecision = Object.freeze({ type: 'configuration-error-no-rule' });
const PUBLIC: PolicyDecision = Object.freeze({ type: 'matched', accessRequirement: null });

export function decideUnmatched(policy: LockdownPolicy): PolicyDecision {
    if (policy.rejectIfNoRule) return DENIED;
    return policy.rejectPublicInvocations ? CONFIGURATION_ERROR : PUBLIC;
}
