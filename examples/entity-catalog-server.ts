/**
 * Example: Entity Catalog over Streamable HTTP
 *
 * Scenario: an LLM agent browses a slow inventory API through MCP tools.
 * Readers see only the categories their identity grants; admins can force
 * a refresh. The upstream is hit once at startup and once per TTL, not
 * once per question.
 *
 * Environment:
 *   DOWNSTREAM_API_URL   base URL serving GET /entities (omit for an empty demo cache)
 *   CACHE_TTL_SECONDS    snapshot TTL, default 300
 *   USERINFO_URL         identity provider userinfo endpoint
 *   MCP_SERVER_PORT      listen port, default 8001
 *
 * Run: npx tsx examples/entity-catalog-server.ts
 */
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { EntityCacheServer, createLogger, resolveConfig } from '../src/index.js';

const config = resolveConfig(process.env);
const logger = createLogger(config.logLevel);
const port = Number(process.env.MCP_SERVER_PORT ?? '8001');

// Fail fast: a configured but unreachable downstream stops the process here.
const cacheServer = new EntityCacheServer(config, { logger });
await cacheServer.start();

// ── Stateless transport: one Server per request ─────────────────────
//
// Entitlements are cached by token hash inside EntityCacheServer, so a
// fresh protocol session per request costs no extra identity calls.

async function readBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    const raw = Buffer.concat(chunks).toString('utf8');
    return raw ? JSON.parse(raw) : undefined;
}

async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== '/mcp') {
        res.writeHead(404).end();
        return;
    }

    const body = req.method === 'POST' ? await readBody(req) : undefined;

    const server = new Server(
        { name: 'entity-catalog', version: '0.1.0' },
        { capabilities: { tools: {}, resources: {} } },
    );
    cacheServer.attachToServer(server);

    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
            logger.warn({ err: error }, 'failed to close MCP session');
        });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
}

const httpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
        logger.error({ err: error }, 'request failed');
        if (!res.headersSent) res.writeHead(500).end();
    });
});

httpServer.listen(port, () => {
    logger.info({ port }, 'entity catalog listening on /mcp');
});

// ── Shutdown ────────────────────────────────────────────────────────

async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, 'shutting down');
    await cacheServer.stop();
    await new Promise<void>(resolve => httpServer.close(() => resolve()));
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        shutdown(signal).then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ err: error }, 'shutdown failed');
                process.exit(1);
            },
        );
    });
}
