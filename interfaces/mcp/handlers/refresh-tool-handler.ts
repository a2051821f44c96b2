/**
 * Handler for the refresh_resource tool
 */
import { z } from 'zod';
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse, RefreshToolArgs } from '../tool-types.js';
import type { ResourceManager } from '../../../services/resources/ResourceManager.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';

export const REFRESH_TOOL = 'refresh_resource';

const refreshArgsSchema: z.ZodType<RefreshToolArgs> = z.object({
  uri: z.string().min(1)
});

export class RefreshToolHandler extends BaseToolHandler {
  constructor(private readonly resourceManager: ResourceManager) {
    super();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: REFRESH_TOOL,
        description: 'Refresh cached content for a specific documentation page',
        inputSchema: {
          type: 'object',
          properties: {
            uri: {
              type: 'string',
              description: 'Resource URI to refresh (e.g., particle://universal-accounts/overview)'
            }
          },
          required: ['uri']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== REFRESH_TOOL) {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    const parsed = this.parseArgs(refreshArgsSchema, args);
    if (!parsed) {
      return this.createErrorResponse('Error: URI parameter is required');
    }

    const success = await this.resourceManager.refreshResource(parsed.uri);
    return success
      ? this.createSuccessResponse(`Successfully refreshed resource: ${parsed.uri}`)
      : this.createErrorResponse(`Failed to refresh resource: ${parsed.uri}`);
  }
}
