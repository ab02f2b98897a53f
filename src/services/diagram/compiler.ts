/**
 * Diagram Compiler
 *
 * Runs generated diagram code and renders the resulting figure to PNG.
 * compile() never rejects: every failure comes back as a DiagramFailure
 * with the message, stack and captured console output.
 *
 * Each compile forks a fresh render worker (render-worker.ts), so nothing
 * the code does to the schematic library or to its process outlives the
 * call. The worker gets `timeoutMs` for the script (enforced by vm) and is
 * killed if the script plus rendering runs past `timeoutMs` and a short
 * grace. The worker is isolation between requests and from the server
 * process; it is not a security boundary against hostile code.
 *
 * @module services/diagram/compiler
 */

import { fork } from 'child_process';
import path from 'path';
import { fileURLToPath } from 'url';
import type { DiagramResult } from '../../models/envelope.js';
import { ExecutionError } from '../errors.js';
import { WorkerMessageSchema, type RenderJob } from './protocol.js';
import { diagramFailure } from './sandbox.js';

const __filename = fileURLToPath(import.meta.url);

/** render-worker.js next to the build output, render-worker.ts next to the sources */
export const DEFAULT_WORKER_PATH = path.join(
  path.dirname(__filename),
  `render-worker${path.extname(__filename)}`
);

export interface DiagramCompilerOptions {
  /** Output resolution; SVG user units are treated as 96 dpi */
  dpi: number;
  /** Wall-clock limit for running the code and rendering the figure */
  timeoutMs: number;
  workerPath?: string;
}

/** Module loading (tsx compiles on the fly from sources) is outside the budget */
const WORKER_START_TIMEOUT_MS = 20_000;
/** Time past timeoutMs for the worker to report a vm timeout itself */
const RESULT_GRACE_MS = 500;
const WORKER_HEAP_MB = 256;
const MAX_STDERR_LENGTH = 16_384;

function workerExecArgv(workerPath: string): string[] {
  const heap = `--max-old-space-size=${WORKER_HEAP_MB}`;
  return workerPath.endsWith('.ts') ? ['--import', 'tsx', heap] : [heap];
}

export class DiagramCompiler {
  private readonly workerPath: string;

  constructor(private readonly options: DiagramCompilerOptions) {
    this.workerPath = options.workerPath ?? DEFAULT_WORKER_PATH;
  }

  async compile(code: string): Promise<DiagramResult> {
    const startTime = Date.now();
    let workerStderr = '';
    const collectStderr = (text: string): void => {
      if (workerStderr.length < MAX_STDERR_LENGTH) {
        workerStderr = (workerStderr + text).slice(0, MAX_STDERR_LENGTH);
      }
    };

    try {
      const result = await this.runWorker(code, collectStderr);
      if (result.success) {
        console.error(
          `[DiagramCompiler] Rendered ${Buffer.byteLength(result.image_base64, 'base64')} byte PNG ` +
            `in ${Date.now() - startTime}ms`
        );
      } else {
        console.error(`[DiagramCompiler] ${result.error}`);
      }
      return result;
    } catch (error) {
      const failure = diagramFailure(error, code, '', workerStderr);
      console.error(`[DiagramCompiler] ${failure.error}`);
      return failure;
    }
  }

  private runWorker(code: string, onStderr: (text: string) => void): Promise<DiagramResult> {
    const { dpi, timeoutMs } = this.options;

    return new Promise<DiagramResult>((resolve, reject) => {
      const child = fork(this.workerPath, [], {
        execArgv: workerExecArgv(this.workerPath),
        // Keeps the worker's stdout off the server's JSON-RPC stream
        silent: true,
        serialization: 'json',
        env: { PATH: process.env.PATH, HOME: process.env.HOME },
      });

      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        child.kill('SIGKILL');
        outcome();
      };
      const fail = (message: string, cause?: unknown): void =>
        settle(() => reject(new ExecutionError(message, { workerPid: child.pid }, { cause })));
      const deadline = (ms: number, message: string): void => {
        clearTimeout(timer);
        timer = setTimeout(() => fail(message), ms);
      };

      deadline(WORKER_START_TIMEOUT_MS, `diagram worker did not start within ${WORKER_START_TIMEOUT_MS}ms`);

      child.stdout?.resume();
      child.stderr?.on('data', (chunk: Buffer) => onStderr(chunk.toString()));

      child.on('message', (raw: unknown) => {
        const parsed = WorkerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          fail(`diagram worker sent an invalid message: ${parsed.error.message}`);
          return;
        }
        const message = parsed.data;
        if (message.type === 'ready') {
          const job: RenderJob = { type: 'job', code, dpi, timeoutMs };
          child.send(job);
          deadline(timeoutMs + RESULT_GRACE_MS, `diagram rendering did not finish within ${timeoutMs}ms`);
          return;
        }
        const result = message.result;
        settle(() => resolve(result));
      });

      child.on('error', (error) => fail(`diagram worker failed: ${error.message}`, error));
      // 'close' rather than 'exit' so stderr has been read by then
      child.on('close', (exitCode, signal) =>
        fail(`diagram worker exited (${signal ?? `code ${exitCode}`}) before returning a result`)
      );
    });
  }
}
