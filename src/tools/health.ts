/**
 * Health Check MCP Tool
 *
 * Tools: tutor_health_check
 *
 * Probes both model servers once (no retries) and reports the page
 * embedding worker and any launched model servers.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { successResult, type ServiceHealth } from '../server/types.js';
import { expectedEndpoints } from '../services/inference/endpoints.js';
import { getModelServerLauncher } from '../services/inference/model-server.js';
import { probeOnce } from '../services/inference/readiness.js';
import { getPipeline } from '../services/pipeline/factory.js';
import { HealthCheckInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: tutor_health_check
// ═══════════════════════════════════════════════════════════════════════════════

async function probeService(
  endpoint: string,
  model: string,
  timeoutMs: number,
  path: string
): Promise<ServiceHealth> {
  const result = await probeOnce(endpoint, { timeoutMs, path });
  return {
    endpoint,
    model,
    status: result.ok ? 'ready' : 'unavailable',
    http_status: result.status,
    ...(result.reason !== undefined && { reason: result.reason }),
    elapsed_ms: result.elapsedMs,
  };
}

async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(HealthCheckInput, params);
    const pipeline = getPipeline();
    const config = pipeline.config;
    const endpoints = expectedEndpoints(config);
    const timeoutMs = input.timeout_ms ?? config.health.timeoutMs;

    const [reasoning, codegen] = await Promise.all([
      probeService(endpoints.reasoning, config.reasoning.model, timeoutMs, config.health.path),
      probeService(endpoints.codegen, config.codegen.model, timeoutMs, config.health.path),
    ]);

    const nextSteps: string[] = [];
    if (reasoning.status !== 'ready' || codegen.status !== 'ready') {
      nextSteps.push(
        config.launchModelServers
          ? 'Model servers are launched on the first tutor_solve call and take minutes to load; retry later'
          : 'Start the model servers or point REASONING_BASE_URL / CODEGEN_BASE_URL at running ones'
      );
    }

    return formatResponse(
      successResult({
        healthy: reasoning.status === 'ready' && codegen.status === 'ready',
        services: { reasoning, codegen },
        page_embedder: {
          model: config.retrieval.model,
          last_device: pipeline.embedder.getLastDevice(),
          pool: pipeline.embedder.getPoolStatus(),
        },
        launched_model_servers: config.launchModelServers
          ? getModelServerLauncher().getStatus()
          : undefined,
        next_steps: nextSteps.length > 0 ? nextSteps : undefined,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const healthTools: Record<string, ToolDefinition> = {
  tutor_health_check: {
    description:
      '[ESSENTIAL] Probe the reasoning and code-generation model servers once and report the page-embedding worker status.',
    inputSchema: {
      timeout_ms: HealthCheckInput.shape.timeout_ms.describe(
        'Per-probe timeout in ms (default HEALTH_CHECK_TIMEOUT_MS)'
      ),
    },
    handler: handleHealthCheck,
  },
};
