/**
 * Retrieval Engine
 *
 * index(): rasterize the uploaded PDF and embed every page.
 * topK(): embed the question and rank pages by MaxSim score.
 *
 * @module services/retrieval/engine
 */

import { PageIndex, type RelevantPage } from '../../models/document.js';
import { maxSimScore, safeMax } from '../../utils/math.js';
import { PipelineError, ScoringError, errorMessage } from '../errors.js';
import type { PageEmbedder } from './colpali.js';
import type { DocumentRasterizer } from './rasterizer.js';

export interface RetrievalOptions {
  /** Rasterization resolution */
  dpi: number;
  /** Pages per embedding batch */
  batchSize: number;
  /** Default k for topK() */
  topK: number;
}

export class RetrievalEngine {
  constructor(
    private readonly rasterizer: DocumentRasterizer,
    private readonly embedder: PageEmbedder,
    private readonly options: RetrievalOptions
  ) {}

  /**
   * Build the per-request page index. The caller owns the returned index
   * and must release() it once retrieval is done.
   *
   * @throws DocumentDecodeError if the bytes are not a readable PDF
   * @throws ScoringError if page embedding fails
   */
  async index(document: Buffer): Promise<PageIndex> {
    const rasterized = await this.rasterizer.rasterize(document, this.options.dpi);

    try {
      const embeddings = await this.wrapScoring('page embedding', () =>
        this.embedder.embedPages(rasterized.pages, this.options.batchSize)
      );

      if (embeddings.length !== rasterized.pages.length) {
        throw new ScoringError(
          `Page embedding returned ${embeddings.length} embeddings for ${rasterized.pages.length} pages`,
          { pages: rasterized.pages.length, embeddings: embeddings.length }
        );
      }

      console.error(`[Retrieval] Indexed ${rasterized.pages.length} pages`);
      return new PageIndex(
        rasterized.pages.map((page, i) => ({ page, embedding: embeddings[i] })),
        () => rasterized.dispose()
      );
    } catch (error) {
      await rasterized.dispose();
      throw error;
    }
  }

  /**
   * Rank indexed pages against `query` and return the best `k`.
   * Ties keep document order; k beyond the page count returns every page.
   *
   * @throws ScoringError if k is not a positive integer or scoring fails
   */
  async topK(query: string, index: PageIndex, k: number = this.options.topK): Promise<RelevantPage[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ScoringError(`k must be a positive integer, got ${k}`, { k });
    }
    if (index.size === 0) return [];

    const queryEmbedding = await this.wrapScoring('query embedding', () =>
      this.embedder.embedQuery(query)
    );

    const scored = await this.wrapScoring('similarity scoring', async () =>
      index.entries.map((entry, position) => {
        const score = maxSimScore(queryEmbedding, entry.embedding);
        if (!Number.isFinite(score)) {
          throw new Error(`non-finite score for page ${entry.page.pageNumber}`);
        }
        return { entry, position, score };
      })
    );

    // Array.prototype.sort is stable; the position tiebreak states it outright
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    const selected = scored.slice(0, k).map((s, rank) => ({
      page: s.entry.page,
      score: s.score,
      rank,
    }));

    console.error(
      `[Retrieval] Selected pages [${selected.map((s) => s.page.pageNumber).join(', ')}] ` +
        `of ${index.size} (best score ${(safeMax(selected.map((s) => s.score)) ?? 0).toFixed(3)})`
    );
    return selected;
  }

  private async wrapScoring<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new ScoringError(`${what} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }
}
