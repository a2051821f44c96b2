/**
 * Handler for resources/list and resources/read
 */
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { ResourceDescriptor, ResourceManager } from '../../../services/resources/ResourceManager.js';

export type ResourceListResponse = {
  resources: ResourceDescriptor[];
};

export type ResourceReadResponse = {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
};

export class ResourceHandler {
  constructor(private readonly resourceManager: ResourceManager) {}

  listResources(): ResourceListResponse {
    return { resources: this.resourceManager.listResources() };
  }

  /**
   * Read one resource
   * @throws McpError InvalidParams for unknown URIs, InternalError when the page cannot be loaded
   */
  async readResource(uri: string): Promise<ResourceReadResponse> {
    const lookup = await this.resourceManager.getResource(uri);

    switch (lookup.status) {
      case 'found':
        return { contents: [{ uri: lookup.uri, mimeType: lookup.mimeType, text: lookup.text }] };
      case 'not_found':
        throw new McpError(ErrorCode.InvalidParams, lookup.error.message);
      case 'error':
        throw new McpError(ErrorCode.InternalError, `Failed to load resource ${uri}: ${lookup.error.message}`);
    }
  }
}
