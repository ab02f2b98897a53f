/**
 * Response envelope returned by the orchestrator
 *
 * Field names are snake_case because the envelope is serialized as-is into
 * MCP tool responses.
 */

import type { ErrorCategory } from '../server/errors.js';

/**
 * Pipeline stages, in execution order. `index_document` and
 * `resolve_endpoints` overlap.
 */
export const STAGE_NAMES = [
  'prepare_images',
  'index_document',
  'resolve_endpoints',
  'retrieve_pages',
  'reasoning',
  'code_generation',
  'diagram_compile',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type StageTimings = Partial<Record<StageName, number>>;

export interface DiagramSuccess {
  success: true;
  image_base64: string;
  stdout: string;
  stderr: string;
  diagram_code: string;
}

export interface DiagramFailure {
  success: false;
  error: string;
  traceback: string;
  /** Whatever the program printed before it failed */
  stdout: string;
  stderr: string;
  diagram_code: string;
}

export type DiagramResult = DiagramSuccess | DiagramFailure;

export interface SolutionMetadata {
  num_relevant_pages: number;
  num_document_pages: number;
  has_user_images: boolean;
  generated_code: string;
  /** Seconds, formatted like "12.34s" */
  total_processing_time: string;
  total_processing_ms: number;
  stage_timings_ms: StageTimings;
  request_id: string;
}

export interface SolutionSuccess {
  success: true;
  question: string;
  textual_solution: string;
  circuit_diagram: DiagramResult;
  metadata: SolutionMetadata;
}

export interface SolutionFailure {
  success: false;
  question: string;
  error: string;
  error_category: ErrorCategory;
  failed_stage: StageName | null;
  stage_timings_ms: StageTimings;
  request_id: string;
}

export type SolutionEnvelope = SolutionSuccess | SolutionFailure;
