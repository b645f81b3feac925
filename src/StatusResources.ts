/**
 * StatusResources — Read-Only Cache Status
 *
 * Two MCP resources describing the cache itself (never entity bodies):
 * - `cache://entities/summary`: count, categories, freshness
 * - `cache://entities/health`: healthy | stale
 */
import { categoriesOf, isStale } from './CacheSnapshot.js';
import type { CacheSnapshot, Clock, McpResourceDef, ResourceProvider } from './types.js';

export const SUMMARY_URI = 'cache://entities/summary';
export const HEALTH_URI = 'cache://entities/health';

const RESOURCES: McpResourceDef[] = [
    {
        uri: SUMMARY_URI,
        name: 'cache_summary',
        description: 'Summary of the entity cache: counts, categories, freshness.',
        mimeType: 'text/plain',
    },
    {
        uri: HEALTH_URI,
        name: 'cache_health',
        description: 'Simple health check for the entity cache.',
        mimeType: 'text/plain',
    },
];

export function cacheSummary(snapshot: CacheSnapshot, now: Date): string {
    const categories = categoriesOf(snapshot);
    return [
        `Total entities: ${snapshot.entities.size}`,
        `Categories: ${categories.length > 0 ? categories.join(', ') : '(none)'}`,
        `Last refreshed: ${snapshot.lastRefreshedAt.toISOString()}`,
        `TTL: ${snapshot.ttlSeconds}s`,
        `Stale: ${isStale(snapshot, now)}`,
    ].join('\n');
}

export function cacheHealth(snapshot: CacheSnapshot, now: Date): string {
    const status = isStale(snapshot, now) ? 'stale' : 'healthy';
    return [
        `status: ${status}`,
        `last_refresh: ${snapshot.lastRefreshedAt.toISOString()}`,
    ].join('\n');
}

export function createStatusResources(
    current: () => CacheSnapshot,
    clock: Clock = () => new Date(),
): ResourceProvider {
    const renderers = new Map<string, (snapshot: CacheSnapshot, now: Date) => string>([
        [SUMMARY_URI, cacheSummary],
        [HEALTH_URI, cacheHealth],
    ]);

    return {
        listResources: () => ({ resources: [...RESOURCES] }),
        readResource: (uri) => {
            const render = renderers.get(uri);
            if (!render) return undefined;
            return {
                contents: [{ uri, mimeType: 'text/plain', text: render(current(), clock()) }],
            };
        },
    };
}
