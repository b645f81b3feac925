import { describe, it, expect, vi } from 'vitest';
import { EntitlementResolver, hashToken } from '../src/EntitlementResolver.js';
import { ErrorCodes } from '../src/errors.js';
import { ok } from '../src/Result.js';
import { fakeVerifier, profile, silentLogger } from './helpers.js';

const reader = profile(['reader'], ['ops'], 'user-reader');

describe('hashToken', () => {
    it('is the SHA-256 hex digest of the token', () => {
        expect(hashToken('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('is stable and distinguishes tokens', () => {
        expect(hashToken('token-a')).toBe(hashToken('token-a'));
        expect(hashToken('token-a')).not.toBe(hashToken('token-b'));
    });
});

describe('EntitlementResolver', () => {
    it('verifies a token once and serves repeats from the cache', async () => {
        const { verifier, verify } = fakeVerifier({ 'test-token': reader });
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger });

        const first = await resolver.resolve('test-token');
        const second = await resolver.resolve('test-token');

        expect(verify).toHaveBeenCalledTimes(1);
        expect(first).toEqual({ ok: true, value: reader });
        expect(second).toEqual(first);
        expect(resolver.size).toBe(1);
    });

    it('caches each credential separately', async () => {
        const admin = profile(['admin'], ['ops', 'finance'], 'user-admin');
        const { verifier, verify } = fakeVerifier({ 'reader-token': reader, 'admin-token': admin });
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger });

        const a = await resolver.resolve('reader-token');
        const b = await resolver.resolve('admin-token');

        expect(verify).toHaveBeenCalledTimes(2);
        expect(a.ok && a.value.subjectId).toBe('user-reader');
        expect(b.ok && b.value.subjectId).toBe('user-admin');
    });

    it('propagates a rejection and does not cache it', async () => {
        const { verifier, verify } = fakeVerifier({});
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger });

        const first = await resolver.resolve('bad-token');
        const second = await resolver.resolve('bad-token');

        expect(first.ok).toBe(false);
        if (!first.ok) expect(first.error.code).toBe(ErrorCodes.TOKEN_REJECTED);
        expect(second.ok).toBe(false);
        expect(verify).toHaveBeenCalledTimes(2);
        expect(resolver.size).toBe(0);
    });

    it('tolerates concurrent misses for the same token', async () => {
        const { verifier, verify } = fakeVerifier({ 'test-token': reader });
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger });

        const [a, b] = await Promise.all([
            resolver.resolve('test-token'),
            resolver.resolve('test-token'),
        ]);

        expect(verify).toHaveBeenCalledTimes(2);
        expect(a).toEqual(b);
        expect(resolver.size).toBe(1);
    });

    it('keeps entries indefinitely by default', async () => {
        let now = new Date('2026-01-01T00:00:00.000Z');
        const { verifier, verify } = fakeVerifier({ 'test-token': reader });
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger, clock: () => now });

        await resolver.resolve('test-token');
        now = new Date('2027-01-01T00:00:00.000Z');
        await resolver.resolve('test-token');

        expect(verify).toHaveBeenCalledTimes(1);
    });

    it('re-verifies an entry older than entryTtlSeconds', async () => {
        let now = new Date('2026-01-01T00:00:00.000Z');
        const { verifier, verify } = fakeVerifier({ 'test-token': reader });
        const resolver = new EntitlementResolver({
            verifier,
            logger: silentLogger,
            entryTtlSeconds: 60,
            clock: () => now,
        });

        await resolver.resolve('test-token');
        now = new Date('2026-01-01T00:01:00.000Z');
        await resolver.resolve('test-token');
        expect(verify).toHaveBeenCalledTimes(1);

        now = new Date('2026-01-01T00:01:00.001Z');
        await resolver.resolve('test-token');
        expect(verify).toHaveBeenCalledTimes(2);
    });

    it('ages an entry from when verification finished', async () => {
        let now = new Date('2026-01-01T00:00:00.000Z');
        const verify = vi.fn(async () => {
            now = new Date('2026-01-01T00:00:30.000Z');
            return ok(reader);
        });
        const resolver = new EntitlementResolver({
            verifier: { verify },
            logger: silentLogger,
            entryTtlSeconds: 60,
            clock: () => now,
        });

        await resolver.resolve('test-token');
        now = new Date('2026-01-01T00:01:30.000Z');
        await resolver.resolve('test-token');

        expect(verify).toHaveBeenCalledTimes(1);
    });

    it('clear() forgets every credential', async () => {
        const { verifier, verify } = fakeVerifier({ 'test-token': reader });
        const resolver = new EntitlementResolver({ verifier, logger: silentLogger });

        await resolver.resolve('test-token');
        resolver.clear();
        await resolver.resolve('test-token');

        expect(resolver.size).toBe(1);
        expect(verify).toHaveBeenCalledTimes(2);
    });
});
