/**
 * mcp-entity-cache — Public Types
 *
 * Entities, snapshots, and resolved entitlements, plus the duck-typed
 * MCP protocol shapes the server wiring needs.
 */

// ── Entities ────────────────────────────────────────────────────────

/** A single upstream entity. Frozen once fetched; identity is `id`. */
export interface EntityRecord {
    readonly id: string;
    readonly name: string;
    readonly category: string;
    readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Immutable point-in-time view of every entity.
 * A refresh replaces the whole snapshot; nothing patches one in place.
 */
export interface CacheSnapshot {
    readonly entities: ReadonlyMap<string, EntityRecord>;
    readonly lastRefreshedAt: Date;
    readonly ttlSeconds: number;
}

// ── Entitlements ────────────────────────────────────────────────────

/** Authorization profile resolved for one credential. */
export interface UserProfile {
    readonly subjectId: string;
    readonly roles: ReadonlySet<string>;
    readonly permittedCategories: ReadonlySet<string>;
}

// ── MCP Protocol Types (duck-typed, no hard SDK dependency) ─────────

/** Minimal MCP tool definition (duck-typed from @modelcontextprotocol/sdk). */
export interface McpToolDef {
    readonly name: string;
    description?: string;
    readonly inputSchema: {
        readonly type: 'object';
        readonly properties?: Record<string, unknown>;
        readonly required?: readonly string[];
    };
}

/** Minimal MCP call result (duck-typed from @modelcontextprotocol/sdk). */
export interface McpCallResult {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

/** Minimal MCP resource descriptor. */
export interface McpResourceDef {
    readonly uri: string;
    readonly name: string;
    readonly description?: string;
    readonly mimeType: string;
}

// ── Tool Plumbing ───────────────────────────────────────────────────

/**
 * Tool provider consumed by ServerWrapper.
 * `extra` is the MCP request extra object; it carries the request headers.
 */
export interface ToolProvider {
    listTools(): { tools: McpToolDef[] };
    callTool(name: string, args: Record<string, unknown>, extra: unknown): Promise<McpCallResult>;
}

/** Read-only resource provider consumed by ServerWrapper. */
export interface ResourceProvider {
    listResources(): { resources: McpResourceDef[] };
    readResource(uri: string): { contents: Array<{ uri: string; mimeType: string; text: string }> } | undefined;
}

/** Clock used for snapshot timestamps and staleness checks. */
export type Clock = () => Date;
