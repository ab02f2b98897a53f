/**
 * Startup Validation
 *
 * Checks the external programs the pipeline shells out to. Warnings only:
 * a missing tool fails the requests that need it, not the whole server.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { spawnSync } from 'child_process';
import type { TutorConfig } from './config.js';

/**
 * True if `command` can be started (any exit code counts)
 */
export function isCommandAvailable(command: string, args: string[] = ['--version']): boolean {
  const result = spawnSync(command, args, { stdio: 'ignore', timeout: 10_000 });
  return result.error === undefined;
}

/**
 * Validate startup dependencies and log a warning block for anything missing.
 *
 * @returns The warnings that were logged
 */
export function validateStartupDependencies(
  config: TutorConfig,
  checkCommand: (command: string, args?: string[]) => boolean = isCommandAvailable
): string[] {
  const warnings: string[] = [];

  if (!checkCommand('pdftoppm', ['-v'])) {
    warnings.push('pdftoppm (poppler-utils) was not found on PATH. PDF indexing will fail.');
  }

  const python = config.retrieval.pythonPath ?? (process.platform === 'win32' ? 'python' : 'python3');
  if (!checkCommand(python)) {
    warnings.push(
      `Python interpreter "${python}" was not found. Page retrieval will fail. Set PYTHON_PATH.`
    );
  }

  if (config.launchModelServers && !checkCommand('vllm')) {
    warnings.push('LAUNCH_MODEL_SERVERS is set but vllm was not found on PATH.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(
    `[Config] reasoning=${config.launchModelServers ? `launch:${config.reasoning.port}` : config.reasoning.baseUrl} ` +
      `codegen=${config.launchModelServers ? `launch:${config.codegen.port}` : config.codegen.baseUrl} ` +
      `retrieval=${config.retrieval.model} top_k=${config.retrieval.topKPages}`
  );

  return warnings;
}
