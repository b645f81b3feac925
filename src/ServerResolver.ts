/**
 * ServerResolver — MCP Server Duck-Type Resolution
 *
 * Resolves the low-level `Server` from either `Server` or `McpServer`.
 */

/** Duck-typed interface for the low-level MCP Server. */
export interface McpServerLike {
    setRequestHandler(schema: unknown, handler: (request: unknown, extra: unknown) => unknown): void;
}

function isServerLike(value: unknown): value is McpServerLike {
    return typeof value === 'object'
        && value !== null
        && 'setRequestHandler' in value
        && typeof value.setRequestHandler === 'function';
}

/**
 * Resolve the low-level Server from either `Server` or `McpServer`.
 *
 * - `McpServer` wraps a `Server` at `.server`
 * - `Server` has `setRequestHandler` directly
 *
 * @throws Error if the provided object is not a valid MCP server
 */
export function resolveServer(server: unknown): McpServerLike {
    if (!server || typeof server !== 'object') {
        throw new Error(
            'EntityCacheServer: expected a Server or McpServer instance, ' +
            `received ${server === null ? 'null' : typeof server}.`,
        );
    }

    // McpServer wraps a Server at `.server`
    if ('server' in server && isServerLike(server.server)) {
        return server.server;
    }

    if (isServerLike(server)) {
        return server;
    }

    throw new Error(
        'EntityCacheServer: the provided object does not have setRequestHandler(). ' +
        'Expected a Server or McpServer instance from @modelcontextprotocol/sdk.',
    );
}
