/**
 * Document interfaces for the Circuit Tutor pipeline
 *
 * A textbook PDF is rasterized once per request into ordered page images,
 * each page is embedded into a multi-vector, and the query is scored
 * against those vectors. Nothing here outlives the request.
 */

/**
 * One rasterized page of the uploaded document
 */
export interface PageImage {
  /** 1-based page number in document order */
  pageNumber: number;
  /** PNG bytes of the rendered page */
  png: Buffer;
  /** Temp file holding the same PNG (read by the embedding worker) */
  path: string;
}

/**
 * Late-interaction embedding: one vector per image patch or query token
 */
export type MultiVector = Float32Array[];

/**
 * Rasterizer output. Owns the temp directory the page files live in.
 */
export interface RasterizedDocument {
  pages: PageImage[];
  /** Remove the temp files backing `pages` */
  dispose(): Promise<void>;
}

export interface PageIndexEntry {
  page: PageImage;
  embedding: MultiVector;
}

/**
 * Immutable per-request page index.
 *
 * Only RetrievalEngine.index() builds one; topK() requires it, so scoring
 * cannot run before indexing. The private field makes the type nominal.
 */
export class PageIndex {
  readonly #entries: readonly PageIndexEntry[];
  readonly #release: () => Promise<void>;

  constructor(entries: PageIndexEntry[], release: () => Promise<void> = async () => {}) {
    this.#entries = Object.freeze([...entries]);
    this.#release = release;
  }

  get entries(): readonly PageIndexEntry[] {
    return this.#entries;
  }

  get size(): number {
    return this.#entries.length;
  }

  /** Remove the page files backing this index. The entries stay readable. */
  release(): Promise<void> {
    return this.#release();
  }
}

/**
 * A page selected for a query, with its relevance score
 */
export interface RelevantPage {
  page: PageImage;
  score: number;
  /** 0-based position in the ranking */
  rank: number;
}
