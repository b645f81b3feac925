import { describe, it, expect } from 'vitest';
import { AuthorizationGate } from '../src/AuthorizationGate.js';
import { CacheRefresher } from '../src/CacheRefresher.js';
import { createSnapshot } from '../src/CacheSnapshot.js';
import { EntitlementResolver } from '../src/EntitlementResolver.js';
import { createEntityTools, formatEntity, getEntity, listEntities } from '../src/EntityTools.js';
import { entity, entityMap, extraWithToken, fakeFetcher, fakeVerifier, profile, silentLogger, upstreamDown } from './helpers.js';
import type { EntityFetcher } from '../src/EntityFetcher.js';

const T0 = new Date('2026-01-01T00:00:00.000Z');
const LATER = new Date('2026-01-01T00:05:00.001Z');

const e1 = entity('e1', 'ops', 'Core Router');
const e2 = entity('e2', 'finance', 'Ledger');
const e3 = entity('e3', 'ops', 'Edge Switch');

const opsReader = profile(['reader'], ['ops']);

function textOf(result: { content: Array<{ text: string }> }): string {
    return result.content.map(block => block.text).join('');
}

// ── Pure Handlers ───────────────────────────────────────────────────

describe('listEntities', () => {
    const snapshot = createSnapshot([e1, e2], 300, T0);

    it('returns exactly the permitted entities', () => {
        const result = listEntities(snapshot, opsReader, undefined, T0);
        expect(textOf(result)).toBe('- Core Router (id=e1, category=ops)');
    });

    it('applies the optional category filter on top of entitlements', () => {
        const both = profile(['reader'], ['ops', 'finance']);
        const snapshot3 = createSnapshot([e1, e2, e3], 300, T0);

        expect(textOf(listEntities(snapshot3, both, 'finance', T0))).toBe('- Ledger (id=e2, category=finance)');
        expect(textOf(listEntities(snapshot3, both, undefined, T0))).toBe(
            '- Core Router (id=e1, category=ops)\n' +
            '- Ledger (id=e2, category=finance)\n' +
            '- Edge Switch (id=e3, category=ops)',
        );
    });

    it('never reveals a forbidden category, even when asked for it', () => {
        const result = listEntities(snapshot, opsReader, 'finance', T0);
        expect(textOf(result)).toBe('No entities found matching your entitlements and filter.');
    });

    it('annotates stale results', () => {
        const result = listEntities(snapshot, opsReader, undefined, LATER);
        expect(textOf(result)).toBe(
            '- Core Router (id=e1, category=ops)\n\n[Warning: cached data may be stale]',
        );
        expect(result.isError).toBeUndefined();
    });
});

describe('getEntity', () => {
    const snapshot = createSnapshot(
        [{ id: 'e1', name: 'Core Router', category: 'ops', metadata: { rack: 'A1', site: 'north' } }, e2],
        300,
        T0,
    );

    it('returns the entity body for a permitted category', () => {
        const result = getEntity(snapshot, opsReader, 'e1', T0);
        expect(textOf(result)).toBe(
            'Name: Core Router\nID: e1\nCategory: ops\nMetadata: rack=A1, site=north',
        );
    });

    it('returns an access-denied answer, not the body, for a forbidden category', () => {
        const result = getEntity(snapshot, opsReader, 'e2', T0);

        expect(textOf(result)).toBe("Access denied: you do not have entitlements for category 'finance'.");
        expect(result.isError).toBeUndefined();
    });

    it('reports an unknown id', () => {
        expect(textOf(getEntity(snapshot, opsReader, 'nope', T0))).toBe("Entity 'nope' not found.");
    });

    it('annotates a stale entity body', () => {
        const result = getEntity(snapshot, opsReader, 'e1', LATER);
        expect(textOf(result).endsWith('\n\n[Warning: cached data may be stale]')).toBe(true);
    });
});

describe('formatEntity', () => {
    it('prints (none) for empty metadata', () => {
        expect(formatEntity(e3)).toBe('Name: Edge Switch\nID: e3\nCategory: ops\nMetadata: (none)');
    });
});

// ── Guarded Tool Provider ───────────────────────────────────────────

async function toolsWith(fetcher: EntityFetcher | undefined) {
    const { verifier } = fakeVerifier({
        'reader-token': opsReader,
        'admin-token': profile(['admin'], ['ops', 'finance'], 'user-admin'),
        'guest-token': profile([], ['ops'], 'user-guest'),
    });
    const resolver = new EntitlementResolver({ verifier, logger: silentLogger });
    const refresher = new CacheRefresher({ fetcher, ttlSeconds: 300, logger: silentLogger, clock: () => T0 });
    await refresher.initialLoad();
    const gate = new AuthorizationGate(resolver, silentLogger);
    return { tools: createEntityTools({ refresher, gate, clock: () => T0 }), refresher };
}

describe('createEntityTools', () => {
    it('lists the three tools with their required roles', async () => {
        const { tools } = await toolsWith(undefined);

        const listed = tools.listTools().tools;

        expect(listed.map(t => t.name)).toEqual(['list_entities', 'get_entity', 'refresh_cache']);
        expect(listed[2].description).toBe(
            'Force a cache refresh from the downstream source. [Requires role: admin]',
        );
    });

    it('serves list_entities filtered by category entitlements', async () => {
        const { fetcher } = fakeFetcher(entityMap(e1, e2));
        const { tools } = await toolsWith(fetcher);

        const result = await tools.callTool('list_entities', {}, extraWithToken('reader-token'));

        expect(result).toEqual({ content: [{ type: 'text', text: '- Core Router (id=e1, category=ops)' }] });
    });

    it('denies a caller without a read role', async () => {
        const { fetcher } = fakeFetcher(entityMap(e1));
        const { tools } = await toolsWith(fetcher);

        const result = await tools.callTool('get_entity', { entity_id: 'e1' }, extraWithToken('guest-token'));

        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('Insufficient permissions. Required one of: admin, reader, user has: (none)');
    });

    it('validates arguments after authorization', async () => {
        const { tools } = await toolsWith(undefined);

        const result = await tools.callTool('get_entity', {}, extraWithToken('reader-token'));

        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe('Invalid arguments for get_entity: entity_id: Required');
    });

    it('rejects an unknown tool', async () => {
        const { tools } = await toolsWith(undefined);

        const result = await tools.callTool('drop_tables', {}, extraWithToken('admin-token'));

        expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: drop_tables' }], isError: true });
    });

    it('refresh_cache requires admin', async () => {
        const { fetcher, fetchAll } = fakeFetcher(entityMap(e1));
        const { tools } = await toolsWith(fetcher);

        const result = await tools.callTool('refresh_cache', {}, extraWithToken('reader-token'));

        expect(result.isError).toBe(true);
        expect(fetchAll).toHaveBeenCalledTimes(1);
    });

    it('refresh_cache reloads for an admin', async () => {
        const { fetcher } = fakeFetcher(entityMap(e1), entityMap(e1, e2, e3));
        const { tools, refresher } = await toolsWith(fetcher);

        const result = await tools.callTool('refresh_cache', {}, extraWithToken('admin-token'));

        expect(textOf(result)).toBe('Cache refreshed. 3 entities loaded.');
        expect(refresher.current().entities.size).toBe(3);
    });

    it('refresh_cache surfaces an upstream failure and keeps the snapshot', async () => {
        const { fetcher } = fakeFetcher(entityMap(e1), upstreamDown());
        const { tools, refresher } = await toolsWith(fetcher);
        const before = refresher.current();

        const result = await tools.callTool('refresh_cache', {}, extraWithToken('admin-token'));

        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe(
            'Cache refresh failed: Request to http://upstream.test/entities failed: connect ECONNREFUSED',
        );
        expect(refresher.current()).toBe(before);
    });

    it('refresh_cache reports an unconfigured downstream', async () => {
        const { tools } = await toolsWith(undefined);

        const result = await tools.callTool('refresh_cache', {}, extraWithToken('admin-token'));

        expect(result).toEqual({
            content: [{ type: 'text', text: 'No downstream API configured; cache refresh unavailable.' }],
        });
    });
});
