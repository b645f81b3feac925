/**
 * Error taxonomy for the entity cache and its authorization gate.
 *
 * Each class carries a `kind` tag (for exhaustive branching on a Result's
 * error side) and a stable `code`.
 */

// ── Codes ───────────────────────────────────────────────────────────

export const ErrorCodes = {
    /** No Authorization header on the request */
    TOKEN_MISSING: 'E_TOKEN_MISSING',
    /** Authorization header present but not `Bearer <token>` */
    TOKEN_MALFORMED: 'E_TOKEN_MALFORMED',
    /** Identity provider answered with a non-2xx status */
    TOKEN_REJECTED: 'E_TOKEN_REJECTED',
    /** Identity provider unreachable, timed out, or returned garbage */
    IDENTITY_UNAVAILABLE: 'E_IDENTITY_UNAVAILABLE',
    ROLE_REQUIRED: 'E_ROLE_REQUIRED',
    CATEGORY_DENIED: 'E_CATEGORY_DENIED',
    UPSTREAM_HTTP: 'E_UPSTREAM_HTTP',
    UPSTREAM_TIMEOUT: 'E_UPSTREAM_TIMEOUT',
    UPSTREAM_ABORTED: 'E_UPSTREAM_ABORTED',
    UPSTREAM_NETWORK: 'E_UPSTREAM_NETWORK',
    UPSTREAM_INVALID: 'E_UPSTREAM_INVALID',
    UPSTREAM_UNCONFIGURED: 'E_UPSTREAM_UNCONFIGURED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type AuthenticationCode =
    | typeof ErrorCodes.TOKEN_MISSING
    | typeof ErrorCodes.TOKEN_MALFORMED
    | typeof ErrorCodes.TOKEN_REJECTED
    | typeof ErrorCodes.IDENTITY_UNAVAILABLE;

export type UpstreamCode =
    | typeof ErrorCodes.UPSTREAM_HTTP
    | typeof ErrorCodes.UPSTREAM_TIMEOUT
    | typeof ErrorCodes.UPSTREAM_ABORTED
    | typeof ErrorCodes.UPSTREAM_NETWORK
    | typeof ErrorCodes.UPSTREAM_INVALID
    | typeof ErrorCodes.UPSTREAM_UNCONFIGURED;

// ── Errors ──────────────────────────────────────────────────────────

/** Credential missing, malformed, or rejected by the identity provider. */
export class AuthenticationError extends Error {
    readonly kind = 'authentication' as const;
    readonly code: AuthenticationCode;
    readonly status: number | undefined;

    constructor(code: AuthenticationCode, message: string, status?: number) {
        super(message);
        this.name = 'AuthenticationError';
        this.code = code;
        this.status = status;
    }
}

/**
 * Credential valid but insufficient.
 * `E_ROLE_REQUIRED` is the call-level denial; `E_CATEGORY_DENIED` the data-level one.
 */
export class AuthorizationError extends Error {
    readonly kind = 'authorization' as const;
    readonly code: typeof ErrorCodes.ROLE_REQUIRED | typeof ErrorCodes.CATEGORY_DENIED;
    readonly requiredRoles: readonly string[];
    readonly actualRoles: readonly string[];
    readonly category: string | undefined;

    private constructor(
        code: typeof ErrorCodes.ROLE_REQUIRED | typeof ErrorCodes.CATEGORY_DENIED,
        message: string,
        details: { requiredRoles?: readonly string[]; actualRoles?: readonly string[]; category?: string },
    ) {
        super(message);
        this.name = 'AuthorizationError';
        this.code = code;
        this.requiredRoles = details.requiredRoles ?? [];
        this.actualRoles = details.actualRoles ?? [];
        this.category = details.category;
    }

    static missingRole(required: Iterable<string>, actual: Iterable<string>): AuthorizationError {
        const requiredRoles = [...required].sort();
        const actualRoles = [...actual].sort();
        return new AuthorizationError(
            ErrorCodes.ROLE_REQUIRED,
            `Insufficient permissions. Required one of: ${formatRoles(requiredRoles)}, ` +
            `user has: ${formatRoles(actualRoles)}`,
            { requiredRoles, actualRoles },
        );
    }

    static categoryDenied(category: string): AuthorizationError {
        return new AuthorizationError(
            ErrorCodes.CATEGORY_DENIED,
            `Access denied: you do not have entitlements for category '${category}'.`,
            { category },
        );
    }
}

/** Downstream entity source unreachable or erroring. */
export class UpstreamFetchError extends Error {
    readonly kind = 'upstream' as const;
    readonly code: UpstreamCode;
    readonly status: number | undefined;

    constructor(code: UpstreamCode, message: string, status?: number) {
        super(message);
        this.name = 'UpstreamFetchError';
        this.code = code;
        this.status = status;
    }
}

export type GateError = AuthenticationError | AuthorizationError;

function formatRoles(roles: readonly string[]): string {
    return roles.length > 0 ? roles.join(', ') : '(none)';
}
