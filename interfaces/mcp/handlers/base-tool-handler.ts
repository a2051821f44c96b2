/**
 * Base interface and class for MCP tool handlers
 */
import { z } from 'zod';
import type { McpToolResponse } from '../tool-types.js';
import { isDocShelfError } from '../../../shared/domain/errors.js';

/**
 * Tool definition as listed to MCP clients
 */
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description?: string }>;
    required?: string[];
  };
};

/**
 * Base interface for all tool handlers
 */
export interface IToolHandler {
  getToolDefinitions(): ToolDefinition[];
  handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;
}

/**
 * Base abstract class for all tool handlers
 */
export abstract class BaseToolHandler implements IToolHandler {
  abstract getToolDefinitions(): ToolDefinition[];

  abstract handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;

  /**
   * Whether this handler provides the named tool
   */
  handles(name: string): boolean {
    return this.getToolDefinitions().some(definition => definition.name === name);
  }

  /**
   * Validate raw tool arguments; a missing arguments object is treated as empty
   * @returns Parsed arguments, or null when they do not match the schema
   */
  protected parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> | null {
    const result = schema.safeParse(args ?? {});
    return result.success ? result.data : null;
  }

  protected createSuccessResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }]
    };
  }

  protected createErrorResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }],
      isError: true
    };
  }

  /**
   * Create an error response classified by the error's type and code
   */
  protected createStructuredErrorResponse(error: unknown): McpToolResponse {
    let message = 'An unknown error occurred';
    let errorType = 'UnknownError';
    let errorCode = 'UNKNOWN';

    if (isDocShelfError(error)) {
      message = error.message;
      errorType = error.name;
      errorCode = error.errorCode;
    } else if (error instanceof Error) {
      message = error.message;
      errorType = error.name && error.name !== 'Error' ? error.name : 'GenericError';
      errorCode = 'GENERIC_ERROR';
    } else if (typeof error === 'string') {
      message = error;
      errorType = 'StringError';
      errorCode = 'STRING_ERROR';
    }

    return {
      isError: true,
      content: [{ type: 'text', text: message }],
      errorDetails: {
        type: errorType,
        code: errorCode
      }
    };
  }
}
