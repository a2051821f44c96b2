/**
 * Type definitions for MCP tool arguments and responses
 */

/**
 * Arguments for the search_docs tool
 */
export type SearchToolArgs = {
  /** Text to look for in section titles and bodies */
  query: string;
};

/**
 * Arguments for the refresh_resource tool
 */
export type RefreshToolArgs = {
  /** Resource URI to refresh, e.g. particle://guides/balances */
  uri: string;
};

/**
 * Content item for MCP tool responses
 */
export type McpContentItem = {
  type: 'text';
  text: string;
};

/**
 * Response for MCP tools
 */
export type McpToolResponse = {
  content: McpContentItem[];

  /** Whether the response is an error */
  isError?: boolean;

  /** Error classification, present on structured error responses */
  errorDetails?: {
    type: string;
    code: string;
  };
};
