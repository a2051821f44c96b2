/**
 * Handler for the search_docs tool
 */
import { z } from 'zod';
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse, SearchToolArgs } from '../tool-types.js';
import type { ResourceManager, SearchResult } from '../../../services/resources/ResourceManager.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';

export const SEARCH_TOOL = 'search_docs';

const searchArgsSchema: z.ZodType<SearchToolArgs> = z.object({
  query: z.string().min(1)
});

/**
 * Render search results as the tool's text output
 */
export function formatSearchResults(query: string, results: SearchResult[]): string {
  const lines = [`Search results for '${query}':\n`];

  for (const result of results) {
    lines.push(`## ${result.title} (${result.category})`);
    lines.push(`Resource: ${result.resourceUri}`);
    lines.push('Matching sections:');
    for (const section of result.matchingSections) {
      lines.push(`- **${section.title}**: ${section.content}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export class SearchToolHandler extends BaseToolHandler {
  constructor(private readonly resourceManager: ResourceManager) {
    super();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: SEARCH_TOOL,
        description: 'Search across the documentation pages for sections whose title or text contains the query',
        inputSchema: {
          type: 'object',
          properties: {
            query: {
              type: 'string',
              description: 'Search query to find relevant documentation'
            }
          },
          required: ['query']
        }
      }
    ];
  }

  async handleToolCall(name: string, args: unknown): Promise<McpToolResponse> {
    if (name !== SEARCH_TOOL) {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }

    const parsed = this.parseArgs(searchArgsSchema, args);
    if (!parsed) {
      return this.createErrorResponse('Error: Query parameter is required');
    }

    const { query } = parsed;
    try {
      const results = await this.resourceManager.searchResources(query);
      if (results.length === 0) {
        return this.createSuccessResponse(`No results found for query: '${query}'`);
      }
      return this.createSuccessResponse(formatSearchResults(query, results));
    } catch (error: unknown) {
      getLogger().error(`Search failed for "${query}"`, 'SearchToolHandler.handleToolCall', error);
      return this.createStructuredErrorResponse(error);
    }
  }
}
