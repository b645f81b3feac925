import { vi } from 'vitest';
import { pino } from 'pino';
import type { EntityFetcher } from '../src/EntityFetcher.js';
import type { IdentityVerifier } from '../src/IdentityVerifier.js';
import { AuthenticationError, ErrorCodes, UpstreamFetchError } from '../src/errors.js';
import { ok, err } from '../src/Result.js';
import type { EntityRecord, UserProfile } from '../src/types.js';

export const silentLogger = pino({ level: 'silent' });

export function entity(id: string, category: string, name = `Entity ${id}`): EntityRecord {
    return { id, name, category, metadata: {} };
}

export function entityMap(...entities: EntityRecord[]): ReadonlyMap<string, EntityRecord> {
    return new Map(entities.map(e => [e.id, e]));
}

export function profile(
    roles: string[],
    categories: string[],
    subjectId = 'user-1',
): UserProfile {
    return { subjectId, roles: new Set(roles), permittedCategories: new Set(categories) };
}

/** MCP request extra carrying an Authorization header. */
export function extraWithToken(token: string): { requestInfo: { headers: Record<string, string> } } {
    return { requestInfo: { headers: { authorization: `Bearer ${token}` } } };
}

// ── Fake Collaborators ──────────────────────────────────────────────

export function fakeFetcher(...batches: Array<ReadonlyMap<string, EntityRecord> | UpstreamFetchError>) {
    const queue = [...batches];
    const fetchAll = vi.fn(async (_signal?: AbortSignal) => {
        const next = queue.length > 1 ? queue.shift() : queue[0];
        if (next === undefined) throw new Error('fakeFetcher: no batches configured');
        return next instanceof UpstreamFetchError ? err(next) : ok(next);
    });
    const fetcher: EntityFetcher = { fetchAll };
    return { fetcher, fetchAll };
}

export function upstreamDown(): UpstreamFetchError {
    return new UpstreamFetchError(ErrorCodes.UPSTREAM_NETWORK, 'Request to http://upstream.test/entities failed: connect ECONNREFUSED');
}

/** Verifier that knows a fixed token → profile table. */
export function fakeVerifier(profiles: Record<string, UserProfile>) {
    const verify = vi.fn(async (token: string) => {
        const found = profiles[token];
        return found
            ? ok(found)
            : err(new AuthenticationError(ErrorCodes.TOKEN_REJECTED, 'Identity provider rejected the credential (HTTP 401)', 401));
    });
    const verifier: IdentityVerifier = { verify };
    return { verifier, verify };
}

// ── Mock MCP Server ─────────────────────────────────────────────────

type Handler = (request: unknown, extra: unknown) => unknown;

export function createMockServer() {
    const handlers = new Map<unknown, Handler>();
    return {
        setRequestHandler(schema: unknown, handler: Handler) {
            handlers.set(schema, handler);
        },
        getHandler(schema: unknown): Handler {
            const handler = handlers.get(schema);
            if (!handler) throw new Error('handler not registered');
            return handler;
        },
    };
}
