/**
 * Handler for the list_pages tool
 */
import { BaseToolHandler, type ToolDefinition } from './base-tool-handler.js';
import type { McpToolResponse } from '../tool-types.js';
import type { ResourceManager } from '../../../services/resources/ResourceManager.js';
import type { PageDescriptor } from '../../../shared/domain/models/PageDescriptor.js';
import { McpHandlerError } from '../../../shared/domain/errors.js';

export const LIST_PAGES_TOOL = 'list_pages';

/**
 * Render pages grouped by category
 */
export function formatPageList(groups: Map<string, PageDescriptor[]>): string {
  const lines = ['Available Documentation Pages:\n'];

  for (const [category, pages] of groups) {
    lines.push(`## ${category}`);
    for (const page of pages) {
      lines.push(`- **${page.title}**`);
      lines.push(`  - URI: ${page.resourceUri}`);
      lines.push(`  - URL: ${page.sourceUrl}`);
      lines.push(`  - Description: ${page.description}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export class ListPagesToolHandler extends BaseToolHandler {
  constructor(private readonly resourceManager: ResourceManager) {
    super();
  }

  getToolDefinitions(): ToolDefinition[] {
    return [
      {
        name: LIST_PAGES_TOOL,
        description: 'List all available documentation pages with their categories',
        inputSchema: {
          type: 'object',
          properties: {}
        }
      }
    ];
  }

  async handleToolCall(name: string): Promise<McpToolResponse> {
    if (name !== LIST_PAGES_TOOL) {
      return this.createStructuredErrorResponse(new McpHandlerError(`Handler cannot process tool: ${name}`, name));
    }
    return this.createSuccessResponse(formatPageList(this.resourceManager.pagesByCategory()));
  }
}
