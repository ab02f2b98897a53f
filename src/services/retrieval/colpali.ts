/**
 * ColPaliEmbedder - TypeScript bridge to python/colpali_worker.py
 *
 * Page and query embeddings come from a warm Python worker (one model copy
 * per process). Each page becomes a multi-vector: one vector per image
 * patch. Any worker failure surfaces as ScoringError.
 *
 * @module services/retrieval/colpali
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { MultiVector, PageImage } from '../../models/document.js';
import { ScoringError, errorMessage } from '../errors.js';
import { PythonPool } from '../python-pool.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_WORKER_PATH = path.resolve(__dirname, '../../../python/colpali_worker.py');

/**
 * Anything that turns pages and queries into multi-vectors.
 * The retrieval engine depends on this, never on the worker directly.
 */
export interface PageEmbedder {
  /** One multi-vector per page, in input order */
  embedPages(pages: PageImage[], batchSize: number): Promise<MultiVector[]>;
  embedQuery(query: string): Promise<MultiVector>;
}

/** Matches the worker's embed_images response */
const PageEmbeddingsSchema = z.object({
  embeddings: z.array(z.array(z.array(z.number()))),
  device: z.string().optional(),
  elapsed_ms: z.number().optional(),
});

/** Matches the worker's embed_query response */
const QueryEmbeddingSchema = z.object({
  embedding: z.array(z.array(z.number())),
  elapsed_ms: z.number().optional(),
});

export interface ColPaliEmbedderOptions {
  model: string;
  device?: string;
  pythonPath?: string;
  workerPath?: string;
  taskTimeoutMs?: number;
  /** Inject a pool (tests); otherwise one is created on first use */
  pool?: PythonPool;
}

function toMultiVector(rows: number[][]): MultiVector {
  return rows.map((row) => new Float32Array(row));
}

export class ColPaliEmbedder implements PageEmbedder {
  private pool: PythonPool | null;
  private readonly workerPath: string;
  private _lastDevice = 'unknown';

  constructor(private readonly options: ColPaliEmbedderOptions) {
    this.pool = options.pool ?? null;
    this.workerPath = options.workerPath ?? DEFAULT_WORKER_PATH;
  }

  /**
   * Device reported by the worker on the last page batch (e.g. 'cuda:0')
   */
  getLastDevice(): string {
    return this._lastDevice;
  }

  /**
   * Embed pages `batchSize` at a time, one worker call per batch, so a
   * single response never holds more than one batch of multi-vectors.
   */
  async embedPages(pages: PageImage[], batchSize: number): Promise<MultiVector[]> {
    if (pages.length === 0) return [];
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ScoringError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const startTime = Date.now();
    const embeddings: MultiVector[] = [];
    for (let start = 0; start < pages.length; start += batchSize) {
      const batch = pages.slice(start, start + batchSize);
      embeddings.push(...(await this.embedBatch(batch, batchSize)));
    }

    console.error(
      `[ColPali] Embedded ${pages.length} pages in ${Math.ceil(pages.length / batchSize)} batches ` +
        `on ${this._lastDevice} in ${Date.now() - startTime}ms`
    );
    return embeddings;
  }

  private async embedBatch(batch: PageImage[], batchSize: number): Promise<MultiVector[]> {
    const response = await this.run('embed_images', {
      paths: batch.map((p) => p.path),
      batch_size: batchSize,
    });
    const parsed = PageEmbeddingsSchema.safeParse(response);
    if (!parsed.success) {
      throw new ScoringError(`Malformed page embedding response: ${parsed.error.message}`);
    }

    const { embeddings } = parsed.data;
    if (embeddings.length !== batch.length) {
      throw new ScoringError(
        `Embedding worker returned ${embeddings.length} embeddings for ${batch.length} pages`,
        { expected: batch.length, actual: embeddings.length }
      );
    }

    this._lastDevice = parsed.data.device ?? 'unknown';
    return embeddings.map(toMultiVector);
  }

  async embedQuery(query: string): Promise<MultiVector> {
    if (query.trim().length === 0) {
      throw new ScoringError('Query cannot be empty');
    }

    const response = await this.run('embed_query', { text: query });
    const parsed = QueryEmbeddingSchema.safeParse(response);
    if (!parsed.success) {
      throw new ScoringError(`Malformed query embedding response: ${parsed.error.message}`);
    }
    return toMultiVector(parsed.data.embedding);
  }

  /**
   * Stop the worker process if this embedder started it
   */
  async shutdown(): Promise<void> {
    if (this.pool && !this.options.pool) {
      await this.pool.shutdown();
      this.pool = null;
    }
  }

  getPoolStatus(): ReturnType<PythonPool['getStatus']> | null {
    return this.pool?.getStatus() ?? null;
  }

  private getPool(): PythonPool {
    if (!this.pool) {
      const scriptArgs = ['--model', this.options.model];
      if (this.options.device) scriptArgs.push('--device', this.options.device);
      this.pool = new PythonPool({
        poolSize: 1,
        pythonPath: this.options.pythonPath,
        taskTimeoutMs: this.options.taskTimeoutMs,
        scriptArgs,
      });
    }
    if (!this.pool.isStarted) {
      this.pool.start(this.workerPath);
    }
    return this.pool;
  }

  private async run(
    command: string,
    payload: Record<string, unknown>
  ): Promise<Record<string, unknown>> {
    try {
      return await this.getPool().execute({ command, ...payload });
    } catch (error) {
      throw new ScoringError(
        `Embedding worker failed (${command}): ${errorMessage(error)}`,
        { command },
        { cause: error }
      );
    }
  }
}
