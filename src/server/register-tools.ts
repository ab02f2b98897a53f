/**
 * Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { solveTools } from '../tools/solve.js';
import { healthTools } from '../tools/health.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [solveTools, healthTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @param server - McpServer instance to register tools on
 * @param toolModules - Tool modules to register (default: all)
 * @returns Number of tools registered
 * @throws Error if two modules define the same tool name
 */
export function registerAllTools(
  server: Pick<McpServer, 'tool'>,
  toolModules: Record<string, ToolDefinition>[] = allToolModules
): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of toolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(
          `Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
      }
      registeredToolNames.add(name);
      server.tool(
        name,
        tool.description,
        tool.inputSchema as Record<string, unknown>,
        tool.handler
      );
      toolCount++;
    }
  }

  return toolCount;
}

/**
 * Get total tool count without registering on a server instance.
 */
export function getToolCount(): number {
  let count = 0;
  for (const toolModule of allToolModules) {
    count += Object.keys(toolModule).length;
  }
  return count;
}
