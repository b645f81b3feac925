/**
 * AuthorizationGate — Layered Enforcement
 *
 * Call level: `authorize` / `guard` run before every tool handler.
 * Extract the bearer credential, resolve entitlements, and require at least
 * one of the entry point's roles. No permissive fallback: any failure
 * denies the call.
 *
 * Data level: `filterPermitted` / `checkEntityAccess` are applied by the
 * tool handlers themselves to every entity they return, independent of
 * the role check.
 *
 * Nothing here survives the request; the EntitlementResolver cache is
 * the only state.
 */
import type { Logger } from './Logger.js';
import type { EntitlementResolver } from './EntitlementResolver.js';
import { AuthorizationError, type GateError } from './errors.js';
import { extractBearerToken } from './BearerToken.js';
import { type Result, ok, err } from './Result.js';
import type { EntityRecord, McpCallResult, UserProfile } from './types.js';

/** Tool handler that only ever runs for an authorized caller. */
export type AuthorizedHandler<A> = (args: A, profile: UserProfile) => Promise<McpCallResult>;

/** Handler as dispatched from the protocol layer. */
export type GuardedHandler<A> = (args: A, extra: unknown) => Promise<McpCallResult>;

export class AuthorizationGate {
    private readonly resolver: EntitlementResolver;
    private readonly logger: Logger;

    constructor(resolver: EntitlementResolver, logger: Logger) {
        this.resolver = resolver;
        this.logger = logger;
    }

    /** Resolve the caller and require one of `requiredRoles`. */
    async authorize(
        extra: unknown,
        requiredRoles: ReadonlySet<string>,
    ): Promise<Result<UserProfile, GateError>> {
        const token = extractBearerToken(extra);
        if (!token.ok) return token;

        const profile = await this.resolver.resolve(token.value);
        if (!profile.ok) return profile;

        if (!hasAnyRole(profile.value, requiredRoles)) {
            return err(AuthorizationError.missingRole(requiredRoles, profile.value.roles));
        }
        return ok(profile.value);
    }

    /**
     * Wrap a handler so it runs only after `authorize` succeeds.
     * Denials become an `isError` tool result naming the unmet requirement.
     */
    guard<A>(requiredRoles: Iterable<string>, handler: AuthorizedHandler<A>): GuardedHandler<A> {
        const roles: ReadonlySet<string> = new Set(requiredRoles);

        return async (args, extra) => {
            const authorized = await this.authorize(extra, roles);
            if (!authorized.ok) {
                const { error } = authorized;
                this.logger.warn({ kind: error.kind, code: error.code }, 'tool call denied');
                return denial(error);
            }
            return handler(args, authorized.value);
        };
    }
}

// ── Call Level ──────────────────────────────────────────────────────

export function hasAnyRole(profile: UserProfile, requiredRoles: ReadonlySet<string>): boolean {
    for (const role of requiredRoles) {
        if (profile.roles.has(role)) return true;
    }
    return false;
}

export function denial(error: GateError): McpCallResult {
    return {
        content: [{ type: 'text', text: error.message }],
        isError: true,
    };
}

// ── Data Level ──────────────────────────────────────────────────────

export function canAccessCategory(profile: UserProfile, category: string): boolean {
    return profile.permittedCategories.has(category);
}

/** Entities the caller may see, in their original order. */
export function filterPermitted(
    entities: Iterable<EntityRecord>,
    profile: UserProfile,
): EntityRecord[] {
    const permitted: EntityRecord[] = [];
    for (const entity of entities) {
        if (canAccessCategory(profile, entity.category)) permitted.push(entity);
    }
    return permitted;
}

export function checkEntityAccess(
    entity: EntityRecord,
    profile: UserProfile,
): Result<EntityRecord, AuthorizationError> {
    return canAccessCategory(profile, entity.category)
        ? ok(entity)
        : err(AuthorizationError.categoryDenied(entity.category));
}
