/**
 * Model endpoint resolution
 *
 * Resolved once per request, concurrently with document indexing.
 *
 * @module services/inference/endpoints
 */

import type { TutorConfig } from '../../server/config.js';
import { configurationError } from '../../server/errors.js';
import type { ModelServerLauncher } from './model-server.js';

export interface ModelEndpoints {
  reasoning: string;
  codegen: string;
}

function checkUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw configurationError(`Invalid ${name} endpoint URL: "${value}"`, { name, value });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw configurationError(`${name} endpoint must be http(s): "${value}"`, { name, value });
  }
  return value.replace(/\/+$/, '');
}

/**
 * Return the base URLs of both model servers. With `launchModelServers`
 * the launcher starts (or reuses) local servers; otherwise the configured
 * URLs are used.
 *
 * @throws MCPError (CONFIGURATION_ERROR) for a malformed URL or a missing launcher
 */
export async function resolveEndpoints(
  config: TutorConfig,
  launcher?: ModelServerLauncher
): Promise<ModelEndpoints> {
  if (config.launchModelServers) {
    if (!launcher) {
      throw configurationError('LAUNCH_MODEL_SERVERS is set but no model server launcher is available');
    }
    return {
      reasoning: launcher.ensureRunning({
        name: 'reasoning',
        model: config.reasoning.model,
        port: config.reasoning.port,
      }),
      codegen: launcher.ensureRunning({
        name: 'codegen',
        model: config.codegen.model,
        port: config.codegen.port,
      }),
    };
  }

  return {
    reasoning: checkUrl('reasoning', config.reasoning.baseUrl),
    codegen: checkUrl('codegen', config.codegen.baseUrl),
  };
}

/**
 * Where the model servers are expected to be, without launching anything
 */
export function expectedEndpoints(config: TutorConfig): ModelEndpoints {
  if (config.launchModelServers) {
    return {
      reasoning: `http://127.0.0.1:${config.reasoning.port}`,
      codegen: `http://127.0.0.1:${config.codegen.port}`,
    };
  }
  return {
    reasoning: checkUrl('reasoning', config.reasoning.baseUrl),
    codegen: checkUrl('codegen', config.codegen.baseUrl),
  };
}
