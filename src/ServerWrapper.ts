/**
 * ServerWrapper — MCP Server Handler Registration
 *
 * Registers `tools/list`, `tools/call`, `resources/list` and
 * `resources/read` on the MCP Server and delegates to the tool and
 * resource providers. Authorization lives inside the tool provider;
 * this layer only adapts protocol shapes.
 */
import {
    ListToolsRequestSchema,
    CallToolRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
    McpError,
    ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from './Logger.js';
import type { ResourceProvider, ToolProvider } from './types.js';
import { resolveServer } from './ServerResolver.js';

export class ServerWrapper {
    private readonly tools: ToolProvider;
    private readonly resources: ResourceProvider;
    private readonly logger: Logger;

    constructor(tools: ToolProvider, resources: ResourceProvider, logger: Logger) {
        this.tools = tools;
        this.resources = resources;
        this.logger = logger;
    }

    /** Register all handlers on `server` (a `Server` or `McpServer`). */
    attach(server: unknown): void {
        const resolved = resolveServer(server);

        resolved.setRequestHandler(ListToolsRequestSchema, () => this.tools.listTools());

        resolved.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
            const { params } = CallToolRequestSchema.parse(request);
            this.logger.debug({ tool: params.name }, 'tools/call');
            return this.tools.callTool(params.name, params.arguments ?? {}, extra);
        });

        resolved.setRequestHandler(ListResourcesRequestSchema, () => this.resources.listResources());

        resolved.setRequestHandler(ReadResourceRequestSchema, (request) => {
            const { params } = ReadResourceRequestSchema.parse(request);
            const result = this.resources.readResource(params.uri);
            if (!result) {
                throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${params.uri}`);
            }
            return result;
        });
    }
}
