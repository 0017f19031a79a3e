/**
 * Common types for MCP tool handlers.
 */

import type { Warden } from '../runtime.js';

/**
 * Standard MCP tool response format.
 */
export type ToolResponse = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  /** Indicates an error response */
  isError?: boolean;
};

/**
 * Context passed to all tool handlers.
 */
export interface ToolContext {
  warden: Pick<Warden, 'manager' | 'inspector' | 'coordinator' | 'reconciler'>;
}

/**
 * Helper to create a successful tool response.
 */
export function createToolResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

export function createErrorResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    isError: true,
  };
}
