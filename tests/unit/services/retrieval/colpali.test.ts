/**
 * Unit tests for the ColPali embedder bridge
 *
 * A real PythonPool instance is injected with start/execute stubbed, so no
 * worker process is spawned.
 *
 * @module tests/unit/services/retrieval/colpali
 */

import { describe, it, expect, vi } from 'vitest';
import { ColPaliEmbedder } from '../../../../src/services/retrieval/colpali.js';
import { PythonPool, PythonPoolError } from '../../../../src/services/python-pool.js';
import { ScoringError } from '../../../../src/services/errors.js';
import type { PageImage } from '../../../../src/models/document.js';

function stubPool(response: Record<string, unknown> | Error) {
  const pool = new PythonPool();
  vi.spyOn(pool, 'start').mockImplementation(() => {});
  const execute = vi.spyOn(pool, 'execute');
  if (response instanceof Error) execute.mockRejectedValue(response);
  else execute.mockResolvedValue(response);
  return { pool, execute };
}

const PAGES: PageImage[] = [
  { pageNumber: 1, png: Buffer.from('a'), path: '/tmp/page-1.png' },
  { pageNumber: 2, png: Buffer.from('b'), path: '/tmp/page-2.png' },
];

describe('ColPaliEmbedder.embedPages', () => {
  it('sends page paths and converts the vectors', async () => {
    const { pool, execute } = stubPool({
      success: true,
      embeddings: [[[0.5, 1]], [[1, 0], [0, 1]]],
      device: 'cuda:0',
      elapsed_ms: 12,
    });
    const embedder = new ColPaliEmbedder({ model: 'test-colpali', pool });

    const result = await embedder.embedPages(PAGES, 4);

    expect(execute).toHaveBeenCalledWith({
      command: 'embed_images',
      paths: ['/tmp/page-1.png', '/tmp/page-2.png'],
      batch_size: 4,
    });
    expect(result).toHaveLength(2);
    expect(result[0][0]).toBeInstanceOf(Float32Array);
    expect(Array.from(result[1][1])).toEqual([0, 1]);
    expect(embedder.getLastDevice()).toBe('cuda:0');
  });

  it('makes one worker call per batch and keeps page order', async () => {
    const pages: PageImage[] = [1, 2, 3, 4, 5].map((n) => ({
      pageNumber: n,
      png: Buffer.from([n]),
      path: `/tmp/page-${n}.png`,
    }));
    const pool = new PythonPool();
    vi.spyOn(pool, 'start').mockImplementation(() => {});
    const execute = vi.spyOn(pool, 'execute').mockImplementation(async (command) => {
      const paths: unknown[] = Array.isArray(command.paths) ? command.paths : [];
      return {
        success: true,
        embeddings: paths.map((p) => [[Number(String(p).replace(/\D/g, ''))]]),
      };
    });
    const embedder = new ColPaliEmbedder({ model: 'm', pool });

    const result = await embedder.embedPages(pages, 2);

    expect(execute).toHaveBeenCalledTimes(3);
    expect(execute.mock.calls.map(([command]) => command.paths)).toEqual([
      ['/tmp/page-1.png', '/tmp/page-2.png'],
      ['/tmp/page-3.png', '/tmp/page-4.png'],
      ['/tmp/page-5.png'],
    ]);
    expect(result.map((v) => v[0][0])).toEqual([1, 2, 3, 4, 5]);
  });

  it('rejects a batch size that is not a positive integer', async () => {
    const { pool, execute } = stubPool({ success: true });

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedPages(PAGES, 0)).rejects.toThrow(
      'batchSize must be a positive integer, got 0'
    );
    expect(execute).not.toHaveBeenCalled();
  });

  it('skips the worker for an empty page list', async () => {
    const { pool, execute } = stubPool({ success: true });

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedPages([], 4)).resolves.toEqual([]);
    expect(execute).not.toHaveBeenCalled();
  });

  it('rejects a response with the wrong number of embeddings', async () => {
    const { pool } = stubPool({ success: true, embeddings: [[[1]]] });

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedPages(PAGES, 4)).rejects.toThrow(
      'Embedding worker returned 1 embeddings for 2 pages'
    );
  });

  it('rejects a malformed response', async () => {
    const { pool } = stubPool({ success: true, embeddings: 'nope' });

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedPages(PAGES, 4)).rejects.toBeInstanceOf(
      ScoringError
    );
  });

  it('wraps worker failures as ScoringError', async () => {
    const { pool } = stubPool(new PythonPoolError('CUDA out of memory', 'WORKER_FAILED'));

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedPages(PAGES, 4)).rejects.toThrow(
      'Embedding worker failed (embed_images): CUDA out of memory'
    );
  });
});

describe('ColPaliEmbedder.embedQuery', () => {
  it('embeds the query text', async () => {
    const { pool, execute } = stubPool({ success: true, embedding: [[1, 2], [3, 4]] });

    const result = await new ColPaliEmbedder({ model: 'm', pool }).embedQuery('series resistors');

    expect(execute).toHaveBeenCalledWith({ command: 'embed_query', text: 'series resistors' });
    expect(result.map((v) => Array.from(v))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('rejects an empty query without calling the worker', async () => {
    const { pool, execute } = stubPool({ success: true });

    await expect(new ColPaliEmbedder({ model: 'm', pool }).embedQuery('   ')).rejects.toThrow(
      'Query cannot be empty'
    );
    expect(execute).not.toHaveBeenCalled();
  });
});

describe('ColPaliEmbedder lifecycle', () => {
  it('leaves an injected pool running on shutdown', async () => {
    const { pool } = stubPool({ success: true });
    const shutdown = vi.spyOn(pool, 'shutdown');

    await new ColPaliEmbedder({ model: 'm', pool }).shutdown();

    expect(shutdown).not.toHaveBeenCalled();
  });

  it('reports no pool before first use', () => {
    expect(new ColPaliEmbedder({ model: 'm' }).getPoolStatus()).toBeNull();
  });
});
