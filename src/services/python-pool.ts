/**
 * Python Worker Process Pool
 *
 * Maintains warm Python processes so the page-embedding model is loaded once
 * per process instead of once per request. Workers accept newline-delimited
 * JSON commands on stdin and answer with one JSON line on stdout.
 * Auto-restart on crash (bounded), hung-worker detection via heartbeat.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/python-pool
 */

import { spawn, type ChildProcess } from 'child_process';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PoolConfig {
  /** Number of worker processes to maintain (default: 1, one model copy per process) */
  poolSize: number;
  /** Restart worker after this many tasks (default: 500) */
  maxTasksPerWorker: number;
  /** Health check interval in ms (default: 30000) */
  healthCheckIntervalMs: number;
  /** Task timeout in ms (default: 300000) */
  taskTimeoutMs: number;
  /** Consecutive crashes without a completed task before giving up (default: 3) */
  maxConsecutiveCrashes: number;
  /** Python executable (default: python3, or python on Windows) */
  pythonPath?: string;
  /** Extra arguments passed to the worker script */
  scriptArgs: string[];
  /** Largest single response line accepted (default: 256 MB) */
  maxResponseBytes: number;
}

export type PythonPoolErrorCode =
  | 'SHUTTING_DOWN'
  | 'TIMEOUT'
  | 'WORKER_FAILED'
  | 'WORKER_EXITED'
  | 'PARSE_ERROR'
  | 'WRITE_FAILED'
  | 'RESPONSE_TOO_LARGE'
  | 'NO_WORKERS';

export class PythonPoolError extends Error {
  constructor(
    message: string,
    public readonly code: PythonPoolErrorCode
  ) {
    super(message);
    this.name = 'PythonPoolError';
  }
}

interface PooledWorker {
  process: ChildProcess;
  busy: boolean;
  taskCount: number;
  lastHeartbeat: number;
  currentTask: PoolTask | null;
}

interface PoolTask {
  command: Record<string, unknown>;
  resolve: (result: Record<string, unknown>) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

export interface PoolStatus {
  started: boolean;
  total: number;
  busy: number;
  idle: number;
  queued: number;
  crashed: boolean;
}

const NEWLINE = 0x0a;

// ═══════════════════════════════════════════════════════════════════════════════
// POOL IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export class PythonPool extends EventEmitter {
  private workers: Map<number, PooledWorker> = new Map();
  private taskQueue: PoolTask[] = [];
  private readonly config: PoolConfig;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private nextWorkerId = 0;
  private shuttingDown = false;
  private scriptPath: string | null = null;
  private consecutiveCrashes = 0;
  private gaveUp = false;
  private readonly pythonCommand: string;

  constructor(config?: Partial<PoolConfig>) {
    super();
    this.config = {
      poolSize: config?.poolSize ?? 1,
      maxTasksPerWorker: config?.maxTasksPerWorker ?? 500,
      healthCheckIntervalMs: config?.healthCheckIntervalMs ?? 30000,
      taskTimeoutMs: config?.taskTimeoutMs ?? 300000,
      maxConsecutiveCrashes: config?.maxConsecutiveCrashes ?? 3,
      pythonPath: config?.pythonPath,
      scriptArgs: config?.scriptArgs ?? [],
      maxResponseBytes: config?.maxResponseBytes ?? 256 * 1024 * 1024,
    };
    this.pythonCommand =
      this.config.pythonPath ?? (process.platform === 'win32' ? 'python' : 'python3');
  }

  get isStarted(): boolean {
    return this.scriptPath !== null;
  }

  /**
   * Start the pool with the given Python script.
   *
   * @param scriptPath - Path to the Python worker script
   * @throws PythonPoolError if pool is shutting down
   */
  start(scriptPath: string): void {
    if (this.shuttingDown) throw new PythonPoolError('Pool is shutting down', 'SHUTTING_DOWN');
    this.scriptPath = scriptPath;
    for (let i = 0; i < this.config.poolSize; i++) {
      this.spawnWorker(scriptPath);
    }
    this.healthCheckTimer = setInterval(
      () => this.healthCheck(),
      this.config.healthCheckIntervalMs
    );
    this.healthCheckTimer.unref();
    console.error(`[PythonPool] Started with ${this.config.poolSize} workers for ${scriptPath}`);
  }

  /**
   * Execute a command on the next available worker.
   *
   * If all workers are busy, the task is queued and dispatched when
   * a worker becomes available.
   *
   * @param command - JSON-serializable command object
   * @returns The worker's JSON response (always has success=true)
   * @throws PythonPoolError if the pool is down, the task times out,
   *   or the worker answers success=false
   */
  async execute(command: Record<string, unknown>): Promise<Record<string, unknown>> {
    if (this.shuttingDown) throw new PythonPoolError('Pool is shutting down', 'SHUTTING_DOWN');
    if (this.gaveUp) {
      throw new PythonPoolError(
        `Python workers crashed ${this.config.maxConsecutiveCrashes} times in a row; pool disabled`,
        'NO_WORKERS'
      );
    }

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.taskQueue = this.taskQueue.filter((t) => t !== task);
        reject(
          new PythonPoolError(
            `Python pool task timed out after ${this.config.taskTimeoutMs}ms`,
            'TIMEOUT'
          )
        );
      }, this.config.taskTimeoutMs);

      const task: PoolTask = { command, resolve, reject, timeoutId };

      // Try to dispatch immediately to a free worker
      const worker = this.getAvailableWorker();
      if (worker) {
        this.dispatchTask(worker, task);
      } else {
        this.taskQueue.push(task);
      }
    });
  }

  /**
   * Shut down all workers and reject queued tasks.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }

    for (const task of this.taskQueue) {
      clearTimeout(task.timeoutId);
      task.reject(new PythonPoolError('Pool shutting down', 'SHUTTING_DOWN'));
    }
    this.taskQueue = [];

    for (const [, worker] of this.workers) {
      worker.process.kill('SIGTERM');
      // Force kill after 5s
      const forceTimer = setTimeout(() => {
        if (worker.process.exitCode === null) worker.process.kill('SIGKILL');
      }, 5000);
      forceTimer.unref();
    }
    this.workers.clear();
    console.error('[PythonPool] Shut down');
  }

  /**
   * Get pool status for diagnostics.
   */
  getStatus(): PoolStatus {
    let busy = 0;
    let idle = 0;
    for (const w of this.workers.values()) {
      if (w.busy) busy++;
      else idle++;
    }
    return {
      started: this.isStarted,
      total: this.workers.size,
      busy,
      idle,
      queued: this.taskQueue.length,
      crashed: this.gaveUp,
    };
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ═════════════════════════════════════════════════════════════════════════════

  private spawnWorker(scriptPath: string): void {
    const id = this.nextWorkerId++;
    const proc = spawn(this.pythonCommand, ['-u', scriptPath, ...this.config.scriptArgs], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env },
    });

    const worker: PooledWorker = {
      process: proc,
      busy: false,
      taskCount: 0,
      lastHeartbeat: Date.now(),
      currentTask: null,
    };

    // Capture stderr for logging
    let stderrBuf = '';
    proc.stderr?.on('data', (data: Buffer) => {
      stderrBuf += data.toString();
      const lines = stderrBuf.split('\n');
      stderrBuf = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) console.error(`[PythonPool:${id}] ${line}`);
      }
    });

    let exited = false;
    const onExit = (reason: string): void => {
      if (exited) return;
      exited = true;
      console.error(`[PythonPool] Worker ${id} ${reason}`);
      this.workers.delete(id);

      const orphan = worker.currentTask;
      if (orphan) {
        worker.currentTask = null;
        clearTimeout(orphan.timeoutId);
        orphan.reject(
          new PythonPoolError(`Python worker ${id} ${reason} while running a task`, 'WORKER_EXITED')
        );
      }

      if (this.shuttingDown) return;

      // Recycled workers finished their tasks; anything else is a crash
      if (worker.taskCount < this.config.maxTasksPerWorker) {
        this.consecutiveCrashes++;
      }
      if (this.consecutiveCrashes >= this.config.maxConsecutiveCrashes) {
        this.gaveUp = true;
        console.error(
          `[PythonPool] ${this.consecutiveCrashes} consecutive worker crashes, not restarting`
        );
        for (const task of this.taskQueue) {
          clearTimeout(task.timeoutId);
          task.reject(new PythonPoolError('Python workers keep crashing', 'NO_WORKERS'));
        }
        this.taskQueue = [];
        return;
      }

      console.error(`[PythonPool] Restarting worker ${id}...`);
      this.spawnWorker(scriptPath);
    };

    proc.on('exit', (code) => onExit(`exited with code ${code}`));
    proc.on('error', (err) => onExit(`failed: ${err.message}`));

    this.workers.set(id, worker);
  }

  private getAvailableWorker(): [number, PooledWorker] | null {
    for (const [id, worker] of this.workers) {
      if (!worker.busy) return [id, worker];
    }
    return null;
  }

  private dispatchTask(entry: [number, PooledWorker], task: PoolTask): void {
    const [id, worker] = entry;
    worker.busy = true;
    worker.taskCount++;
    worker.currentTask = task;

    const chunks: Buffer[] = [];
    let received = 0;

    const onData = (data: Buffer): void => {
      // Newline-delimited: a response is complete once a newline arrives.
      // Earlier chunks had none, so only the new one is searched.
      const newlineIdx = data.indexOf(NEWLINE);
      if (newlineIdx === -1) {
        chunks.push(data);
        received += data.length;
        if (received > this.config.maxResponseBytes) {
          cleanup();
          clearTimeout(task.timeoutId);
          worker.currentTask = null;
          task.reject(
            new PythonPoolError(
              `Worker response exceeded ${this.config.maxResponseBytes} bytes`,
              'RESPONSE_TOO_LARGE'
            )
          );
          // The rest of the line is still coming; a fresh worker is simpler than draining it
          worker.process.kill('SIGKILL');
        }
        return;
      }

      chunks.push(data.subarray(0, newlineIdx));
      const line = Buffer.concat(chunks).toString('utf8');

      cleanup();
      clearTimeout(task.timeoutId);
      worker.currentTask = null;

      let result: unknown;
      try {
        result = JSON.parse(line);
      } catch {
        result = undefined;
      }

      if (typeof result !== 'object' || result === null || Array.isArray(result)) {
        task.reject(
          new PythonPoolError(
            `Failed to parse worker response: ${line.substring(0, 200)}`,
            'PARSE_ERROR'
          )
        );
      } else {
        const response = result as Record<string, unknown>;
        if (response.success !== true) {
          task.reject(
            new PythonPoolError(
              response.error
                ? String(response.error)
                : 'Python worker returned success=false with no error message',
              'WORKER_FAILED'
            )
          );
        } else {
          this.consecutiveCrashes = 0;
          task.resolve(response);
        }
      }

      worker.busy = false;
      worker.lastHeartbeat = Date.now();

      // Restart worker if it hit max tasks
      if (worker.taskCount >= this.config.maxTasksPerWorker) {
        console.error(
          `[PythonPool] Worker ${id} hit max tasks (${this.config.maxTasksPerWorker}), recycling`
        );
        worker.process.kill('SIGTERM');
      } else {
        this.processQueue();
      }
    };

    const cleanup = (): void => {
      worker.process.stdout?.removeListener('data', onData);
    };

    worker.process.stdout?.on('data', onData);

    // Send command as newline-delimited JSON
    const cmdStr = JSON.stringify(task.command) + '\n';
    worker.process.stdin?.write(cmdStr, (err) => {
      if (err) {
        cleanup();
        clearTimeout(task.timeoutId);
        worker.busy = false;
        worker.currentTask = null;
        task.reject(
          new PythonPoolError(`Failed to write to worker: ${err.message}`, 'WRITE_FAILED')
        );
      }
    });
  }

  private processQueue(): void {
    while (this.taskQueue.length > 0) {
      const worker = this.getAvailableWorker();
      if (!worker) break;
      const task = this.taskQueue.shift();
      if (!task) break;
      this.dispatchTask(worker, task);
    }
  }

  private healthCheck(): void {
    const now = Date.now();
    for (const [id, worker] of this.workers) {
      if (worker.busy && now - worker.lastHeartbeat > this.config.taskTimeoutMs * 2) {
        console.error(`[PythonPool] Worker ${id} appears hung, killing`);
        worker.process.kill('SIGKILL');
      }
    }
  }
}
