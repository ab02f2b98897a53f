/**
 * Orchestrator
 *
 * One request, start to finish:
 *
 *   prepare_images
 *   index_document ∥ resolve_endpoints   (joined once)
 *   retrieve_pages → reasoning → code_generation → diagram_compile
 *
 * solveProblem() never rejects. A failing stage ends the run with a failure
 * envelope naming the stage; a diagram that fails to compile does not, and
 * is reported inside the success envelope instead.
 *
 * @module services/pipeline/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';
import type { PageIndex } from '../../models/document.js';
import type {
  SolutionEnvelope,
  SolutionFailure,
  StageName,
} from '../../models/envelope.js';
import type { SolveRequest } from '../../models/query.js';
import type { TutorConfig } from '../../server/config.js';
import { MCPError, validationError } from '../../server/errors.js';
import type { CodeGenerationService } from '../codegen/service.js';
import type { DiagramCompiler } from '../diagram/compiler.js';
import { errorMessage } from '../errors.js';
import type { ModelEndpoints } from '../inference/endpoints.js';
import type { ReasoningService } from '../reasoning/service.js';
import type { RetrievalEngine } from '../retrieval/engine.js';
import { SpanRecorder, StageFailure } from './spans.js';

export interface OrchestratorDeps {
  config: TutorConfig;
  retrieval: Pick<RetrievalEngine, 'index' | 'topK'>;
  reasoning: Pick<ReasoningService, 'analyze'>;
  codegen: Pick<CodeGenerationService, 'generateDiagramCode'>;
  compiler: Pick<DiagramCompiler, 'compile'>;
  resolveEndpoints: () => Promise<ModelEndpoints>;
  /** Defaults to a random uuid */
  createRequestId?: () => string;
}

/**
 * Copy the attached images, rejecting empty ones.
 */
export function prepareImages(images: Buffer[]): Buffer[] {
  return images.map((image, i) => {
    if (image.length === 0) {
      throw validationError(`User image ${i + 1} is empty`, { index: i });
    }
    return Buffer.from(image);
  });
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function failureEnvelope(
  question: string,
  error: unknown,
  timings: SolutionFailure['stage_timings_ms'],
  requestId: string
): SolutionFailure {
  let stage: StageName | null = null;
  let cause: unknown = error;
  if (error instanceof StageFailure) {
    stage = error.stage;
    cause = error.cause;
  }
  const mcpError = MCPError.fromUnknown(cause);
  return {
    success: false,
    question,
    error: mcpError.message,
    error_category: mcpError.category,
    failed_stage: stage,
    stage_timings_ms: timings,
    request_id: requestId,
  };
}

export async function solveProblem(
  request: SolveRequest,
  deps: OrchestratorDeps
): Promise<SolutionEnvelope> {
  const requestId = deps.createRequestId?.() ?? uuidv4();
  const spans = new SpanRecorder(requestId);
  const startTime = Date.now();
  let pageIndex: PageIndex | null = null;

  console.error(`[Orchestrator] [${requestId}] Solving: ${request.question.substring(0, 100)}`);

  try {
    const userImages = await spans.withSpan('prepare_images', async () =>
      prepareImages(request.userImages ?? [])
    );

    // Indexing starts before endpoint resolution and is joined exactly once
    const indexing = spans.withSpan('index_document', () => deps.retrieval.index(request.document));
    const resolving = spans.withSpan('resolve_endpoints', () => deps.resolveEndpoints());
    const [indexed, resolved] = await Promise.allSettled([indexing, resolving]);

    if (indexed.status === 'fulfilled') pageIndex = indexed.value;
    if (indexed.status === 'rejected') throw indexed.reason;
    if (resolved.status === 'rejected') throw resolved.reason;
    const index = indexed.value;
    const endpoints = resolved.value;

    const k = request.topK ?? deps.config.retrieval.topKPages;
    const relevant = await spans.withSpan('retrieve_pages', () =>
      deps.retrieval.topK(request.question, index, k)
    );

    const solution = await spans.withSpan('reasoning', () =>
      deps.reasoning.analyze(
        endpoints.reasoning,
        request.question,
        userImages,
        relevant.map((r) => r.page)
      )
    );

    const code = await spans.withSpan('code_generation', () =>
      deps.codegen.generateDiagramCode(endpoints.codegen, request.question, solution)
    );

    const diagram = await spans.withSpan('diagram_compile', () => deps.compiler.compile(code));
    if (!diagram.success) {
      console.error(`[Orchestrator] [${requestId}] Diagram failed (non-fatal): ${diagram.error}`);
    }

    const totalMs = Date.now() - startTime;
    console.error(`[Orchestrator] [${requestId}] Done in ${formatSeconds(totalMs)}`);

    return {
      success: true,
      question: request.question,
      textual_solution: solution,
      circuit_diagram: diagram,
      metadata: {
        num_relevant_pages: relevant.length,
        num_document_pages: index.size,
        has_user_images: userImages.length > 0,
        generated_code: code,
        total_processing_time: formatSeconds(totalMs),
        total_processing_ms: totalMs,
        stage_timings_ms: spans.snapshot(),
        request_id: requestId,
      },
    };
  } catch (error) {
    const envelope = failureEnvelope(request.question, error, spans.snapshot(), requestId);
    console.error(
      `[Orchestrator] [${requestId}] Failed at ${envelope.failed_stage ?? 'unknown stage'} ` +
        `(${envelope.error_category}): ${envelope.error}`
    );
    return envelope;
  } finally {
    if (pageIndex) {
      await pageIndex.release().catch((error: unknown) => {
        console.error(
          `[Orchestrator] [${requestId}] Failed to remove page files: ${errorMessage(error)}`
        );
      });
    }
  }
}
