/**
 * Stage spans: timing and logging around each pipeline stage.
 *
 * @module services/pipeline/spans
 */

import type { StageName, StageTimings } from '../../models/envelope.js';
import { errorMessage } from '../errors.js';

/**
 * A stage threw. Carries the stage name so the failure envelope can say
 * where the pipeline stopped; `cause` is the original error.
 */
export class StageFailure extends Error {
  constructor(
    public readonly stage: StageName,
    cause: unknown
  ) {
    super(`Stage ${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StageFailure';
  }
}

export class SpanRecorder {
  private readonly timings: StageTimings = {};

  constructor(private readonly requestId: string) {}

  /**
   * Run `fn` as stage `stage`: log start and outcome, record elapsed ms.
   *
   * @throws StageFailure wrapping whatever `fn` threw
   */
  async withSpan<T>(stage: StageName, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    console.error(`[Orchestrator] [${this.requestId}] ${stage} started`);
    try {
      const result = await fn();
      const elapsed = this.record(stage, startTime);
      console.error(`[Orchestrator] [${this.requestId}] ${stage} finished in ${elapsed}ms`);
      return result;
    } catch (error) {
      const elapsed = this.record(stage, startTime);
      console.error(
        `[Orchestrator] [${this.requestId}] ${stage} failed after ${elapsed}ms: ${errorMessage(error)}`
      );
      throw new StageFailure(stage, error);
    }
  }

  /** Copy of the timings recorded so far */
  snapshot(): StageTimings {
    return { ...this.timings };
  }

  private record(stage: StageName, startTime: number): number {
    const elapsed = Date.now() - startTime;
    this.timings[stage] = elapsed;
    return elapsed;
  }
}
