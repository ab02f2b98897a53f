/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH REPORTING
// ═══════════════════════════════════════════════════════════════════════════════

export type ServiceState = 'ready' | 'unavailable';

export interface ServiceHealth {
  endpoint: string;
  model: string;
  status: ServiceState;
  http_status: number | null;
  reason?: string;
  elapsed_ms: number;
}
