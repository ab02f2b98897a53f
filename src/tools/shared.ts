/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import * as fs from 'fs';
import { z } from 'zod';
import { MCPError, formatErrorResponse, pathNotFoundError } from '../server/errors.js';
import { assertReadableFile } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response.
 */
export function formatResponse(result: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}

/**
 * Read an input file after path, existence and size checks.
 *
 * @throws MCPError (PATH_NOT_FOUND) if the file does not exist
 * @throws ValidationError if it is not a regular file, is empty, or is too large
 */
export async function readInputFile(
  filePath: string,
  maxBytes: number,
  label: string
): Promise<Buffer> {
  if (!fs.existsSync(filePath)) {
    throw pathNotFoundError(filePath);
  }
  const resolved = assertReadableFile(filePath, maxBytes, label);
  return fs.promises.readFile(resolved);
}
