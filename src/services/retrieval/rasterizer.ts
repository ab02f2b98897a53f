/**
 * PDF page rasterization via poppler's `pdftoppm`
 *
 * Pages are written as PNGs into a per-request temp directory; the returned
 * document owns that directory and removes it on dispose().
 *
 * @module services/retrieval/rasterizer
 */

import { spawn } from 'child_process';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { PageImage, RasterizedDocument } from '../../models/document.js';
import { DocumentDecodeError, errorMessage } from '../errors.js';

export interface DocumentRasterizer {
  /**
   * Render every page of `document` to PNG, in page order.
   *
   * @throws DocumentDecodeError if the bytes are not a readable document
   */
  rasterize(document: Buffer, dpi: number): Promise<RasterizedDocument>;
}

const PDF_MAGIC = '%PDF-';
const PAGE_FILE_PREFIX = 'page';
const MAX_STDERR_LENGTH = 10_240;

export function looksLikePdf(data: Buffer): boolean {
  return data.length >= PDF_MAGIC.length && data.subarray(0, 1024).includes(PDF_MAGIC);
}

/**
 * Page number from a pdftoppm output name: page-1.png, page-01.png, page-001.png
 */
export function pageNumberFromFile(fileName: string): number | null {
  const match = /^page-(\d+)\.png$/.exec(fileName);
  return match ? parseInt(match[1], 10) : null;
}

export class PopplerRasterizer implements DocumentRasterizer {
  constructor(
    private readonly command: string = 'pdftoppm',
    private readonly timeoutMs: number = 120_000,
    /** Page renders go in a fresh `<tmpdir>/<tempPrefix>XXXXXX` per document */
    private readonly tempPrefix: string = 'circuit-tutor-'
  ) {}

  async rasterize(document: Buffer, dpi: number): Promise<RasterizedDocument> {
    if (!looksLikePdf(document)) {
      throw new DocumentDecodeError('Failed to decode document: missing %PDF- header', {
        size: document.length,
      });
    }

    const dir = await mkdtemp(path.join(os.tmpdir(), this.tempPrefix));
    const dispose = async (): Promise<void> => {
      await rm(dir, { recursive: true, force: true });
    };

    try {
      const inputPath = path.join(dir, 'input.pdf');
      await writeFile(inputPath, document);
      await this.run(['-png', '-r', String(dpi), inputPath, path.join(dir, PAGE_FILE_PREFIX)]);

      const numbered = (await readdir(dir))
        .map((name) => ({ name, pageNumber: pageNumberFromFile(name) }))
        .filter((f): f is { name: string; pageNumber: number } => f.pageNumber !== null)
        .sort((a, b) => a.pageNumber - b.pageNumber);

      if (numbered.length === 0) {
        throw new DocumentDecodeError('Failed to decode document: no pages rendered');
      }

      const pages: PageImage[] = [];
      for (const f of numbered) {
        const filePath = path.join(dir, f.name);
        pages.push({ pageNumber: f.pageNumber, png: await readFile(filePath), path: filePath });
      }

      console.error(`[Rasterizer] Rendered ${pages.length} pages at ${dpi} dpi`);
      return { pages, dispose };
    } catch (error) {
      await dispose();
      if (error instanceof DocumentDecodeError) throw error;
      throw new DocumentDecodeError(
        `Failed to decode document: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }
  }

  private run(args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish(new Error(`${this.command} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) reject(err);
        else resolve();
      };

      proc.stderr?.on('data', (data: Buffer) => {
        if (stderr.length < MAX_STDERR_LENGTH) stderr += data.toString();
      });
      proc.on('error', (err) => finish(new Error(`Could not run ${this.command}: ${err.message}`)));
      proc.on('exit', (code) => {
        if (code === 0) finish();
        else finish(new Error(`${this.command} exited with code ${code}: ${stderr.trim().slice(0, 500)}`));
      });
    });
  }
}
