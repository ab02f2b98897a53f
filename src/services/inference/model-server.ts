/**
 * Model Server Launcher
 *
 * Optionally starts the two model-serving processes (`vllm serve`) from this
 * process. At most one server runs per model: later requests get the URL of
 * the running one. The launcher does not wait for readiness; stages gate on
 * the readiness probe themselves.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/inference/model-server
 */

import { spawn, type ChildProcess } from 'child_process';

export interface ModelServerSpec {
  /** Log label, e.g. "reasoning" */
  name: string;
  /** Model identifier passed to `vllm serve` and used as served name */
  model: string;
  port: number;
}

interface RunningServer {
  spec: ModelServerSpec;
  process: ChildProcess;
  startedAt: number;
}

export interface ModelServerStatus {
  name: string;
  model: string;
  port: number;
  pid: number | undefined;
  uptimeMs: number;
}

/**
 * Build the `vllm serve` argument list for a model
 */
export function buildServeArgs(spec: ModelServerSpec): string[] {
  return [
    'serve',
    spec.model,
    '--host',
    '0.0.0.0',
    '--port',
    String(spec.port),
    '--served-model-name',
    spec.model,
    // Faster boot, slightly slower inference
    '--enforce-eager',
  ];
}

export class ModelServerLauncher {
  private readonly servers: Map<string, RunningServer> = new Map();
  private shuttingDown = false;

  constructor(private readonly command: string = 'vllm') {}

  /**
   * Start the server for `spec.model` unless one is already running.
   *
   * @returns Base URL of the server
   * @throws Error if the launcher is shutting down
   */
  ensureRunning(spec: ModelServerSpec): string {
    if (this.shuttingDown) throw new Error('Model server launcher is shutting down');

    const existing = this.servers.get(spec.model);
    if (existing) {
      return `http://127.0.0.1:${existing.spec.port}`;
    }

    const args = buildServeArgs(spec);
    console.error(`[ModelServer] Starting ${spec.name} server: ${this.command} ${args.join(' ')}`);
    const proc = spawn(this.command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env },
    });

    // vLLM logs to both streams; forward everything to stderr
    const forward = (data: Buffer): void => {
      for (const line of data.toString().split('\n')) {
        if (line.trim()) console.error(`[ModelServer:${spec.name}] ${line}`);
      }
    };
    proc.stdout?.on('data', forward);
    proc.stderr?.on('data', forward);

    // Only forget this process; a replacement may already be registered
    const forget = (): void => {
      if (this.servers.get(spec.model)?.process === proc) {
        this.servers.delete(spec.model);
      }
    };

    proc.on('exit', (code) => {
      console.error(`[ModelServer] ${spec.name} server exited with code ${code}`);
      forget();
    });

    // A failed spawn (e.g. ENOENT) emits 'error' and never 'exit'
    proc.on('error', (err) => {
      console.error(`[ModelServer] ${spec.name} server error: ${err.message}`);
      forget();
    });

    this.servers.set(spec.model, { spec, process: proc, startedAt: Date.now() });
    return `http://127.0.0.1:${spec.port}`;
  }

  getStatus(): ModelServerStatus[] {
    const now = Date.now();
    return [...this.servers.values()].map((s) => ({
      name: s.spec.name,
      model: s.spec.model,
      port: s.spec.port,
      pid: s.process.pid,
      uptimeMs: now - s.startedAt,
    }));
  }

  /**
   * Stop every launched server.
   */
  shutdown(): void {
    this.shuttingDown = true;
    for (const [, server] of this.servers) {
      server.process.kill('SIGTERM');
      const forceTimer = setTimeout(() => {
        if (server.process.exitCode === null) server.process.kill('SIGKILL');
      }, 5000);
      forceTimer.unref();
    }
    this.servers.clear();
    console.error('[ModelServer] Shut down');
  }
}

let _launcher: ModelServerLauncher | null = null;

export function getModelServerLauncher(): ModelServerLauncher {
  if (!_launcher) {
    _launcher = new ModelServerLauncher();
  }
  return _launcher;
}

/** Drop the shared launcher (for testing) */
export function resetModelServerLauncher(): void {
  _launcher = null;
}
