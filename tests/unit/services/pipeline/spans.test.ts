/**
 * Unit tests for stage spans
 *
 * @module tests/unit/services/pipeline/spans
 */

import { describe, it, expect } from 'vitest';
import { SpanRecorder, StageFailure } from '../../../../src/services/pipeline/spans.js';

describe('SpanRecorder', () => {
  it('returns the stage result and records its timing', async () => {
    const spans = new SpanRecorder('req-1');

    await expect(spans.withSpan('reasoning', async () => 'answer')).resolves.toBe('answer');

    const timings = spans.snapshot();
    expect(Object.keys(timings)).toEqual(['reasoning']);
    expect(timings.reasoning).toBeGreaterThanOrEqual(0);
  });

  it('wraps a failure with the stage name and keeps the cause', async () => {
    const spans = new SpanRecorder('req-2');
    const cause = new Error('model crashed');

    const error = await spans
      .withSpan('code_generation', async () => {
        throw cause;
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageFailure);
    if (!(error instanceof StageFailure)) return;
    expect(error.stage).toBe('code_generation');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Stage code_generation failed: model crashed');
    expect(spans.snapshot()).toHaveProperty('code_generation');
  });

  it('returns a copy from snapshot()', async () => {
    const spans = new SpanRecorder('req-3');
    const before = spans.snapshot();

    await spans.withSpan('prepare_images', async () => undefined);

    expect(before).toEqual({});
  });
});
