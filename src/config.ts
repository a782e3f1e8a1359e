/**
 * Config — Security Configuration Schema
 *
 * zod schema for the configuration surface, plus the cross-field checks a
 * schema cannot express. Every failure is a `ConfigurationError`.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ── Primary Source Kind ─────────────────────────────────────────────

export const SECURITY_CONFIG_TYPES = ['Annotation', 'Map', 'RequestmapInstances'] as const;

export type SecurityConfigType = typeof SECURITY_CONFIG_TYPES[number];

/** Accepted spellings, compared case-insensitively. */
const CONFIG_TYPE_ALIASES: Readonly<Record<string, SecurityConfigType>> = Object.freeze({
    annotation: 'Annotation',
    map: 'Map',
    intercepturlmap: 'Map',
    requestmap: 'RequestmapInstances',
    requestmapinstances: 'RequestmapInstances',
});

const configTypeSchema = z.string().transform((value, ctx): SecurityConfigType => {
    const type = CONFIG_TYPE_ALIASES[value.trim().toLowerCase()];
    if (!type) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown securityConfigType "${value}". Allowed: ${SECURITY_CONFIG_TYPES.join(', ')}.`,
        });
        return z.NEVER;
    }
    return type;
});

// ── Schema ──────────────────────────────────────────────────────────

export const ruleEntrySchema = z.object({
    pattern: z.string().min(1),
    access: z.union([z.string(), z.array(z.string())]),
    httpMethod: z.string().optional(),
}).strict();

export const securityConfigSchema = z.object({
    securityConfigType: configTypeSchema,
    rejectIfNoRule: z.boolean().default(true),
    /** Ignored while `rejectIfNoRule` is true. */
    rejectPublicInvocations: z.boolean().default(true),
    staticRules: z.array(ruleEntrySchema).default([]),
    interceptUrlMap: z.array(ruleEntrySchema).optional(),
}).strict();

export type SecurityConfig = z.infer<typeof securityConfigSchema>;
export type SecurityConfigInput = z.input<typeof securityConfigSchema>;

// ── Loading ─────────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Parse and check a raw configuration object.
 *
 * @throws ConfigurationError on schema violations, on `interceptUrlMap`
 *   outside the `Map` type, or on `interceptUrlMap` plus `staticRules`.
 */
export function loadSecurityConfig(raw: unknown): SecurityConfig {
    const parsed = securityConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid security configuration: ${formatIssues(parsed.error)}`);
    }

    const config = parsed.data;

    if (config.interceptUrlMap && config.securityConfigType !== 'Map') {
        throw new ConfigurationError(
            `'interceptUrlMap' enables the Map rule source, but securityConfigType is ` +
            `"${config.securityConfigType}". Only one primary rule source may be active.`,
        );
    }

    if (config.interceptUrlMap && config.staticRules.length > 0) {
        throw new ConfigurationError(
            `Both 'interceptUrlMap' and 'staticRules' are set for the Map rule source. Use one.`,
        );
    }

    return config;
}

/** Read a JSON configuration file and load it. */
export async function readSecurityConfigFile(path: string): Promise<SecurityConfig> {
    const text = await readFile(path, 'utf8');

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`Security configuration ${path} is not valid JSON: ${reason}`);
    }

    return loadSecurityConfig(raw);
}
