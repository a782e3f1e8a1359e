/**
 * Example: Admin Console Lockdown
 *
 * Scenario: a back office where admins manage stored rules at runtime.
 * Everything not covered by a rule is denied (`rejectIfNoRule`), static
 * exemptions keep the login page and assets reachable, and support staff
 * gain access to `/tickets/**` as soon as the new rule is committed and
 * the cache is invalidated.
 *
 * Run: npx tsx examples/admin-console-lockdown.ts
 */
import {
    createPolicyResolver,
    loadSecurityConfig,
    InMemoryRuleStore,
    outcomeStatus,
    type Caller,
} from '../src/index.js';

// ── Configuration ───────────────────────────────────────────────────

const config = loadSecurityConfig({
    securityConfigType: 'RequestmapInstances',
    rejectIfNoRule: true,
    staticRules: [
        { pattern: '/login/**', access: 'ANY_AUTHENTICATED_ANONYMOUS' },
        { pattern: '/assets/**', access: 'ANY_AUTHENTICATED_ANONYMOUS' },
    ],
});

const store = new InMemoryRuleStore([
    { id: 'admin', url: '/admin/**', configAttribute: 'ROLE_ADMIN' },
    { id: 'users-write', url: '/users/**', configAttribute: 'ROLE_ADMIN', httpMethod: 'POST' },
    { id: 'users-read', url: '/users/**', configAttribute: 'ROLE_ADMIN,ROLE_SUPPORT', httpMethod: 'GET' },
]);

const { resolver, dynamicSource } = createPolicyResolver(config, { ruleStore: store });

// ── Callers ─────────────────────────────────────────────────────────

const support: Caller = { authentication: 'full', authorities: ['ROLE_SUPPORT'] };
const visitor: Caller = { authentication: 'anonymous', authorities: [] };

async function show(method: string, path: string, caller: Caller, label: string): Promise<void> {
    const outcome = await resolver.authorize(method, path, caller);
    console.log(`${label.padEnd(8)} ${method.padEnd(5)} ${path.padEnd(18)} → ${outcomeStatus(outcome)} ${outcome.status}`);
}

// ── Walkthrough ─────────────────────────────────────────────────────

await show('GET', '/login/auth', visitor, 'visitor');
await show('GET', '/users/42', support, 'support');
await show('POST', '/users/42', support, 'support');
await show('GET', '/tickets/7', support, 'support');

await dynamicSource?.add({ id: 'tickets', url: '/tickets/**', configAttribute: 'ROLE_SUPPORT' });
dynamicSource?.invalidate();

await show('GET', '/tickets/7', support, 'support');
