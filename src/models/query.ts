/**
 * Request-side models
 */

/**
 * A student's question plus any images they attached
 */
export interface TutorQuery {
  question: string;
  userImages: Buffer[];
}

/**
 * Input to one orchestration run
 */
export interface SolveRequest {
  question: string;
  /** Raw bytes of the textbook PDF */
  document: Buffer;
  userImages?: Buffer[];
  /** Overrides the configured number of retrieved pages */
  topK?: number;
}
