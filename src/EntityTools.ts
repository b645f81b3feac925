/**
 * EntityTools — Tool Surface
 *
 * `list_entities`, `get_entity` and `refresh_cache`. Every entry point is
 * wrapped by the AuthorizationGate with its own role set; the handlers
 * below only run for an authorized caller and apply the category filter
 * to whatever they return.
 *
 * Each call reads the current snapshot once and works from that reference
 * to the end, so a concurrent swap never mixes two snapshots in one answer.
 */
import { z } from 'zod';
import type { AuthorizationGate, GuardedHandler } from './AuthorizationGate.js';
import { checkEntityAccess, filterPermitted } from './AuthorizationGate.js';
import type { CacheRefresher } from './CacheRefresher.js';
import { isStale } from './CacheSnapshot.js';
import { decorateDescription } from './DescriptionDecorator.js';
import { annotateStale } from './ResponseDecorator.js';
import type {
    CacheSnapshot,
    Clock,
    EntityRecord,
    McpCallResult,
    McpToolDef,
    ToolProvider,
    UserProfile,
} from './types.js';

// ── Roles ───────────────────────────────────────────────────────────

export const READ_ROLES = ['reader', 'admin'] as const;
export const ADMIN_ROLES = ['admin'] as const;

// ── Pure Handlers ───────────────────────────────────────────────────

export function listEntities(
    snapshot: CacheSnapshot,
    profile: UserProfile,
    category: string | undefined,
    now: Date,
): McpCallResult {
    const entities = filterPermitted(snapshot.entities.values(), profile)
        .filter(entity => category === undefined || entity.category === category);

    if (entities.length === 0) {
        return text('No entities found matching your entitlements and filter.');
    }

    const lines = entities.map(e => `- ${e.name} (id=${e.id}, category=${e.category})`);
    return withFreshness(text(lines.join('\n')), snapshot, now);
}

export function getEntity(
    snapshot: CacheSnapshot,
    profile: UserProfile,
    entityId: string,
    now: Date,
): McpCallResult {
    const entity = snapshot.entities.get(entityId);
    if (!entity) {
        return text(`Entity '${entityId}' not found.`);
    }

    // Denied entities are a normal answer, not a tool error.
    const access = checkEntityAccess(entity, profile);
    if (!access.ok) {
        return text(access.error.message);
    }

    return withFreshness(text(formatEntity(access.value)), snapshot, now);
}

export async function refreshCache(refresher: CacheRefresher): Promise<McpCallResult> {
    if (!refresher.isConfigured) {
        return text('No downstream API configured; cache refresh unavailable.');
    }

    const result = await refresher.forceRefresh();
    if (!result.ok) {
        return { ...text(`Cache refresh failed: ${result.error.message}`), isError: true };
    }
    return text(`Cache refreshed. ${result.value} entities loaded.`);
}

export function formatEntity(entity: EntityRecord): string {
    const pairs = Object.entries(entity.metadata).map(([key, value]) => `${key}=${value}`);
    return [
        `Name: ${entity.name}`,
        `ID: ${entity.id}`,
        `Category: ${entity.category}`,
        `Metadata: ${pairs.length > 0 ? pairs.join(', ') : '(none)'}`,
    ].join('\n');
}

// ── Tool Provider ───────────────────────────────────────────────────

const ListArgsSchema = z.object({ category: z.string().optional() });
const GetArgsSchema = z.object({ entity_id: z.string().min(1) });
const RefreshArgsSchema = z.object({});

interface ToolEntry {
    readonly def: McpToolDef;
    readonly call: GuardedHandler<Record<string, unknown>>;
}

export interface EntityToolsOptions {
    readonly refresher: CacheRefresher;
    readonly gate: AuthorizationGate;
    readonly clock?: Clock;
}

/** Build the guarded tool set exposed to the protocol layer. */
export function createEntityTools(options: EntityToolsOptions): ToolProvider {
    const { refresher, gate } = options;
    const clock = options.clock ?? (() => new Date());

    const entries: ToolEntry[] = [
        defineTool(gate, {
            def: {
                name: 'list_entities',
                description: 'List cached entities, filtered by the caller\'s entitlements and optional category.',
                inputSchema: {
                    type: 'object',
                    properties: { category: { type: 'string', description: 'Only return entities in this category.' } },
                },
            },
            roles: READ_ROLES,
            schema: ListArgsSchema,
            run: async (args, profile) => listEntities(refresher.current(), profile, args.category, clock()),
        }),
        defineTool(gate, {
            def: {
                name: 'get_entity',
                description: 'Retrieve a single entity by ID, subject to entitlement checks.',
                inputSchema: {
                    type: 'object',
                    properties: { entity_id: { type: 'string', description: 'Entity identifier.' } },
                    required: ['entity_id'],
                },
            },
            roles: READ_ROLES,
            schema: GetArgsSchema,
            run: async (args, profile) => getEntity(refresher.current(), profile, args.entity_id, clock()),
        }),
        defineTool(gate, {
            def: {
                name: 'refresh_cache',
                description: 'Force a cache refresh from the downstream source.',
                inputSchema: { type: 'object', properties: {} },
            },
            roles: ADMIN_ROLES,
            schema: RefreshArgsSchema,
            run: async () => refreshCache(refresher),
        }),
    ];

    const byName = new Map(entries.map(entry => [entry.def.name, entry]));

    return {
        listTools: () => ({ tools: entries.map(entry => entry.def) }),
        callTool: async (name, args, extra) => {
            const entry = byName.get(name);
            if (!entry) {
                return { ...text(`Unknown tool: ${name}`), isError: true };
            }
            return entry.call(args, extra);
        },
    };
}

// ── Helpers ─────────────────────────────────────────────────────────

interface ToolDefinition<S extends z.ZodTypeAny> {
    readonly def: McpToolDef;
    readonly roles: readonly string[];
    readonly schema: S;
    readonly run: (args: z.infer<S>, profile: UserProfile) => Promise<McpCallResult>;
}

/** Gate first, then validate arguments, then run. */
function defineTool<S extends z.ZodTypeAny>(gate: AuthorizationGate, definition: ToolDefinition<S>): ToolEntry {
    return {
        def: decorateDescription(definition.def, definition.roles),
        call: gate.guard<Record<string, unknown>>(definition.roles, async (args, profile) => {
            const parsed = definition.schema.safeParse(args);
            if (!parsed.success) {
                const issues = parsed.error.issues
                    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
                    .join('; ');
                return { ...text(`Invalid arguments for ${definition.def.name}: ${issues}`), isError: true };
            }
            return definition.run(parsed.data, profile);
        }),
    };
}

function withFreshness(result: McpCallResult, snapshot: CacheSnapshot, now: Date): McpCallResult {
    return isStale(snapshot, now) ? annotateStale(result) : result;
}

function text(value: string): McpCallResult {
    return { content: [{ type: 'text', text: value }] };
}
