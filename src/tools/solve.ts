/**
 * Solve MCP Tool
 *
 * Tools: tutor_solve
 *
 * Runs the full pipeline for one question against one textbook PDF and
 * returns the solution envelope. Pipeline failures come back as a failure
 * envelope (isError: true); only bad input goes through handleError.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/solve
 */

import { getPipeline } from '../services/pipeline/factory.js';
import { solveProblem } from '../services/pipeline/orchestrator.js';
import {
  MAX_DOCUMENT_BYTES,
  MAX_IMAGE_BYTES,
  SolveInput,
  validateInput,
} from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  readInputFile,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: tutor_solve
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSolve(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SolveInput, params);

    const document = await readInputFile(input.pdf_path, MAX_DOCUMENT_BYTES, 'PDF');
    const userImages: Buffer[] = [];
    for (const imagePath of input.image_paths) {
      userImages.push(await readInputFile(imagePath, MAX_IMAGE_BYTES, 'Image'));
    }

    const pipeline = getPipeline();
    const envelope = await solveProblem(
      { question: input.question, document, userImages, topK: input.top_k },
      pipeline.deps
    );

    const response = formatResponse(envelope);
    return envelope.success ? response : { ...response, isError: true };
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const solveTools: Record<string, ToolDefinition> = {
  tutor_solve: {
    description:
      '[ESSENTIAL] Solve an electrical engineering question using a textbook PDF: retrieves the most relevant pages, produces a step-by-step solution and a rendered circuit diagram (base64 PNG).',
    inputSchema: {
      question: SolveInput.shape.question.describe('The question to solve'),
      pdf_path: SolveInput.shape.pdf_path.describe('Path to the textbook PDF'),
      image_paths: SolveInput.shape.image_paths.describe(
        'Optional photos or screenshots of the circuit (PNG/JPEG)'
      ),
      top_k: SolveInput.shape.top_k.describe('Number of textbook pages to retrieve (default 3)'),
    },
    handler: handleSolve,
  },
};
