/**
 * Tests for the tutor_solve MCP tool
 *
 * The pipeline factory is mocked so the handler runs against in-memory
 * stages; input files are real temp files.
 *
 * @module tests/unit/tools/solve
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { OrchestratorDeps } from '../../../src/services/pipeline/orchestrator.js';
import { PageIndex } from '../../../src/models/document.js';
import { DocumentDecodeError } from '../../../src/services/errors.js';
import { testConfig } from '../../fixtures/config.js';

const { getPipelineMock } = vi.hoisted(() => ({ getPipelineMock: vi.fn() }));

vi.mock('../../../src/services/pipeline/factory.js', () => ({
  getPipeline: getPipelineMock,
}));

import { solveTools } from '../../../src/tools/solve.js';

function fakeDeps() {
  return {
    config: testConfig(),
    retrieval: {
      index: vi.fn(async () => new PageIndex([])),
      topK: vi.fn(async () => []),
    },
    reasoning: { analyze: vi.fn(async () => 'Use Ohm’s law: I = V / R = 2 A.') },
    codegen: { generateDiagramCode: vi.fn(async () => 'd.draw();') },
    compiler: {
      compile: vi.fn(async (code: string) => ({
        success: true as const,
        image_base64: 'iVBORw0KGgo=',
        stdout: '',
        stderr: '',
        diagram_code: code,
      })),
    },
    resolveEndpoints: vi.fn(async () => ({ reasoning: 'http://r.test', codegen: 'http://c.test' })),
    createRequestId: () => 'req-tool',
  } satisfies OrchestratorDeps;
}

function parse(response: { content: Array<{ text: string }> }): Record<string, unknown> {
  return JSON.parse(response.content[0].text);
}

let tempDir: string;
let pdfPath: string;
let deps: ReturnType<typeof fakeDeps>;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'test-solve-'));
  pdfPath = join(tempDir, 'textbook.pdf');
  writeFileSync(pdfPath, '%PDF-1.4\n%placeholder\n');
  deps = fakeDeps();
  getPipelineMock.mockReset();
  getPipelineMock.mockReturnValue({ config: deps.config, deps });
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

const handler = solveTools.tutor_solve.handler;

describe('tutor_solve', () => {
  it('returns the success envelope', async () => {
    const response = await handler({ question: 'Find I', pdf_path: pdfPath });

    expect(response.isError).toBeUndefined();
    const body = parse(response);
    expect(body.success).toBe(true);
    expect(body.textual_solution).toBe('Use Ohm’s law: I = V / R = 2 A.');
    expect(body.metadata).toMatchObject({ request_id: 'req-tool', has_user_images: false });
  });

  it('passes file bytes, images and top_k to the pipeline', async () => {
    const imagePath = join(tempDir, 'circuit.png');
    writeFileSync(imagePath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));

    await handler({ question: '  Find I  ', pdf_path: pdfPath, image_paths: [imagePath], top_k: 2 });

    expect(deps.retrieval.index).toHaveBeenCalledWith(Buffer.from('%PDF-1.4\n%placeholder\n'));
    expect(deps.retrieval.topK).toHaveBeenCalledWith('Find I', expect.any(PageIndex), 2);
    expect(deps.reasoning.analyze).toHaveBeenCalledWith(
      'http://r.test',
      'Find I',
      [Buffer.from([0x89, 0x50, 0x4e, 0x47])],
      []
    );
  });

  it('marks a failure envelope as an error', async () => {
    deps.retrieval.index.mockRejectedValue(new DocumentDecodeError('Failed to decode document: no pages rendered'));

    const response = await handler({ question: 'Find I', pdf_path: pdfPath });

    expect(response.isError).toBe(true);
    expect(parse(response)).toMatchObject({
      success: false,
      error: 'Failed to decode document: no pages rendered',
      error_category: 'DOCUMENT_DECODE_ERROR',
      failed_stage: 'index_document',
    });
  });

  it('rejects a blank question before touching the pipeline', async () => {
    const response = await handler({ question: '   ', pdf_path: pdfPath });

    expect(response.isError).toBe(true);
    expect(parse(response)).toMatchObject({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'question: Question is required' },
    });
    expect(getPipelineMock).not.toHaveBeenCalled();
  });

  it('reports a missing PDF', async () => {
    const missing = join(tempDir, 'missing.pdf');

    const response = await handler({ question: 'Find I', pdf_path: missing });

    expect(parse(response)).toMatchObject({
      error: { category: 'PATH_NOT_FOUND', message: `Path does not exist: ${missing}` },
    });
  });

  it('reports an empty PDF', async () => {
    const empty = join(tempDir, 'empty.pdf');
    writeFileSync(empty, '');

    const response = await handler({ question: 'Find I', pdf_path: empty });

    expect(parse(response)).toMatchObject({
      error: { category: 'VALIDATION_ERROR', message: `PDF is empty: ${empty}` },
    });
  });

  it('rejects a top_k outside 1..50', async () => {
    const response = await handler({ question: 'Find I', pdf_path: pdfPath, top_k: 0 });

    expect(parse(response)).toMatchObject({ error: { category: 'VALIDATION_ERROR' } });
  });
});
