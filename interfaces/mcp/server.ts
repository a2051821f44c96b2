/**
 * DocShelf MCP server
 *
 * Exposes each configured documentation page as a resource and offers
 * search_docs, refresh_resource and list_pages tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import type { ResourceManager } from '../../services/resources/ResourceManager.js';
import { type Logger, getLogger } from '../../shared/infrastructure/logging.js';
import type { BaseToolHandler } from './handlers/base-tool-handler.js';
import { ListPagesToolHandler } from './handlers/list-pages-tool-handler.js';
import { RefreshToolHandler } from './handlers/refresh-tool-handler.js';
import { ResourceHandler } from './handlers/resource-handler.js';
import { SearchToolHandler } from './handlers/search-tool-handler.js';
import type { McpToolResponse } from './tool-types.js';

export interface DocShelfServerOptions {
  name: string;
  version: string;
  resourceManager: ResourceManager;
  logger?: Logger;
}

export class DocShelfServer {
  private readonly server: Server;
  private readonly resourceHandler: ResourceHandler;
  private readonly toolHandlers: BaseToolHandler[];
  private readonly logger: Logger;

  constructor(options: DocShelfServerOptions) {
    this.logger = options.logger ?? getLogger();
    this.resourceHandler = new ResourceHandler(options.resourceManager);
    this.toolHandlers = [
      new SearchToolHandler(options.resourceManager),
      new RefreshToolHandler(options.resourceManager),
      new ListPagesToolHandler(options.resourceManager)
    ];

    this.server = new Server(
      {
        name: options.name,
        version: options.version
      },
      {
        capabilities: {
          resources: {},
          tools: {}
        }
      }
    );

    this.setupHandlers();

    this.server.onerror = (error: Error) => {
      this.logger.error('[MCP Error]', 'DocShelfServer', error);
    };
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => this.resourceHandler.listResources());

    this.server.setRequestHandler(ReadResourceRequestSchema, async request =>
      this.resourceHandler.readResource(request.params.uri)
    );

    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.toolHandlers.flatMap(handler => handler.getToolDefinitions())
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: toolArgs } = request.params;
      return this.callTool(name, toolArgs);
    });
  }

  /**
   * Route a tool call to the handler that provides it
   */
  async callTool(name: string, args: unknown): Promise<McpToolResponse> {
    const handler = this.toolHandlers.find(candidate => candidate.handles(name));
    if (!handler) {
      this.logger.warn(`Unknown tool requested: ${name}`, 'DocShelfServer.callTool');
      return {
        content: [{ type: 'text', text: `Unknown tool: ${name}` }],
        isError: true
      };
    }

    this.logger.debug(`Calling tool ${name}`, 'DocShelfServer.callTool');
    return handler.handleToolCall(name, args);
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Serve over stdio
   */
  async start(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('DocShelf MCP server running on stdio', 'DocShelfServer.start');
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
