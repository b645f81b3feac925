/**
 * Config — Startup Configuration Value Object
 *
 * `resolveConfig` is a pure function from raw environment-style input to a
 * validated, frozen ServerConfig. It is called once at bootstrap and the
 * result is passed by reference to constructors. Fail-fast: any invalid
 * value throws a ConfigError listing every problem.
 */
import { z } from 'zod';

// ── Defaults ────────────────────────────────────────────────────────

export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_DOWNSTREAM_TIMEOUT_MS = 30_000;
export const DEFAULT_IDENTITY_TIMEOUT_MS = 10_000;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_CACHE_TTL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

// ── Schema ──────────────────────────────────────────────────────────

const positiveInt = z.coerce.number().int().positive();

const ConfigSchema = z.object({
    /** Base URL of the entity source. Absent ⇒ empty cache, refresh unavailable. */
    downstreamUrl: z.string().url().optional(),
    cacheTtlSeconds: positiveInt.max(MAX_CACHE_TTL_SECONDS).default(DEFAULT_CACHE_TTL_SECONDS),
    userinfoUrl: z.string().url(),
    downstreamTimeoutMs: positiveInt.max(MAX_TIMER_DELAY_MS).default(DEFAULT_DOWNSTREAM_TIMEOUT_MS),
    identityTimeoutMs: positiveInt.max(MAX_TIMER_DELAY_MS).default(DEFAULT_IDENTITY_TIMEOUT_MS),
    /** Secondary TTL on cached entitlements. Absent ⇒ cached for the process lifetime. */
    entitlementTtlSeconds: positiveInt.optional(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type ServerConfig = Readonly<z.infer<typeof ConfigSchema>>;

/** Raw input: typically `process.env`. */
export type RawConfig = Readonly<Record<string, string | undefined>>;

/** Schema key → the variable it is read from, for error messages. */
const SOURCE_NAMES = new Map<string, string>([
    ['downstreamUrl', 'DOWNSTREAM_API_URL'],
    ['cacheTtlSeconds', 'CACHE_TTL_SECONDS'],
    ['userinfoUrl', 'USERINFO_URL'],
    ['downstreamTimeoutMs', 'DOWNSTREAM_TIMEOUT_MS'],
    ['identityTimeoutMs', 'IDENTITY_TIMEOUT_MS'],
    ['entitlementTtlSeconds', 'ENTITLEMENT_TTL_SECONDS'],
    ['logLevel', 'LOG_LEVEL'],
]);

// ── Errors ──────────────────────────────────────────────────────────

export class ConfigError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid configuration:\n${issues.map(issue => `- ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

// ── Resolution ──────────────────────────────────────────────────────

/**
 * Resolve a ServerConfig from raw input.
 * Empty strings count as absent. `USERINFO_URL` falls back to
 * `OAUTH_GENERIC_USER_INFO_URL`.
 *
 * @throws ConfigError when any value is missing or invalid
 */
export function resolveConfig(raw: RawConfig): ServerConfig {
    const parsed = ConfigSchema.safeParse({
        downstreamUrl: pick(raw, 'DOWNSTREAM_API_URL'),
        cacheTtlSeconds: pick(raw, 'CACHE_TTL_SECONDS'),
        userinfoUrl: pick(raw, 'USERINFO_URL') ?? pick(raw, 'OAUTH_GENERIC_USER_INFO_URL'),
        downstreamTimeoutMs: pick(raw, 'DOWNSTREAM_TIMEOUT_MS'),
        identityTimeoutMs: pick(raw, 'IDENTITY_TIMEOUT_MS'),
        entitlementTtlSeconds: pick(raw, 'ENTITLEMENT_TTL_SECONDS'),
        logLevel: pick(raw, 'LOG_LEVEL'),
    });

    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => {
            const source = SOURCE_NAMES.get(String(issue.path[0])) ?? issue.path.join('.');
            return `${source}: ${issue.message}`;
        }));
    }

    return Object.freeze(parsed.data);
}

function pick(raw: RawConfig, name: string): string | undefined {
    const value = raw[name]?.trim();
    return value ? value : undefined;
}
