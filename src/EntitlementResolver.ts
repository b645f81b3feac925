/**
 * EntitlementResolver — Cached Credential Verification
 *
 * Wraps an IdentityVerifier with a cache keyed by the SHA-256 of the raw
 * credential. The raw token is never stored or logged.
 *
 * Concurrent misses for the same new token may both reach the verifier;
 * both insert an equivalent profile and the last write wins.
 *
 * By default an entry lives for the rest of the process. `entryTtlSeconds`
 * bounds that: an older entry is treated as a miss and re-verified.
 */
import { createHash } from 'node:crypto';
import type { Logger } from './Logger.js';
import type { IdentityVerifier } from './IdentityVerifier.js';
import type { AuthenticationError } from './errors.js';
import { type Result, ok } from './Result.js';
import type { UserProfile, Clock } from './types.js';

interface CacheEntry {
    readonly profile: UserProfile;
    readonly cachedAt: number;
}

export interface EntitlementResolverOptions {
    readonly verifier: IdentityVerifier;
    readonly logger: Logger;
    readonly entryTtlSeconds?: number;
    readonly clock?: Clock;
}

/** Stable one-way cache key for a credential. */
export function hashToken(token: string): string {
    return createHash('sha256').update(token, 'utf8').digest('hex');
}

export class EntitlementResolver {
    private readonly verifier: IdentityVerifier;
    private readonly logger: Logger;
    private readonly entryTtlMs: number | undefined;
    private readonly clock: Clock;
    private readonly cache = new Map<string, CacheEntry>();

    constructor(options: EntitlementResolverOptions) {
        this.verifier = options.verifier;
        this.logger = options.logger;
        this.entryTtlMs = options.entryTtlSeconds !== undefined
            ? options.entryTtlSeconds * 1000
            : undefined;
        this.clock = options.clock ?? (() => new Date());
    }

    async resolve(token: string): Promise<Result<UserProfile, AuthenticationError>> {
        const key = hashToken(token);
        const now = this.clock().getTime();

        const cached = this.cache.get(key);
        if (cached && !this.isExpired(cached, now)) {
            return ok(cached.profile);
        }

        const verified = await this.verifier.verify(token);
        if (!verified.ok) {
            this.logger.warn(
                { code: verified.error.code, tokenHash: key.slice(0, 12) },
                'credential verification failed',
            );
            return verified;
        }

        this.cache.set(key, { profile: verified.value, cachedAt: this.clock().getTime() });
        this.logger.debug(
            { subjectId: verified.value.subjectId, tokenHash: key.slice(0, 12) },
            'entitlements cached',
        );
        return verified;
    }

    /** Number of cached credentials. */
    get size(): number {
        return this.cache.size;
    }

    clear(): void {
        this.cache.clear();
    }

    private isExpired(entry: CacheEntry, now: number): boolean {
        return this.entryTtlMs !== undefined && now - entry.cachedAt > this.entryTtlMs;
    }
}
