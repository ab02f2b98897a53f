/**
 * Unit tests for the reasoning stage
 *
 * @module tests/unit/services/reasoning/service
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CONTEXT_PAGES_HEADER,
  ReasoningService,
  buildReasoningMessages,
} from '../../../../src/services/reasoning/service.js';
import { UpstreamError } from '../../../../src/services/errors.js';
import type { PageImage } from '../../../../src/models/document.js';

const PAGE: PageImage = { pageNumber: 4, png: Buffer.from('page-4'), path: '/tmp/page-4.png' };
const USER_IMAGE = Buffer.from([0xff, 0xd8, 0xff, 0x00]);

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildReasoningMessages', () => {
  it('puts instructions, question, user images then pages in one user message', () => {
    const messages = buildReasoningMessages('Be precise.', 'What is V?', [USER_IMAGE], [PAGE]);

    expect(messages).toHaveLength(1);
    expect(messages[0].role).toBe('user');
    expect(messages[0].content).toEqual([
      { type: 'text', text: 'Be precise.\n\nQuestion: What is V?' },
      { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${USER_IMAGE.toString('base64')}` } },
      { type: 'text', text: CONTEXT_PAGES_HEADER },
      { type: 'image_url', image_url: { url: `data:image/png;base64,${PAGE.png.toString('base64')}` } },
    ]);
  });

  it('omits the pages header when there are no pages', () => {
    const messages = buildReasoningMessages('Be precise.', 'What is V?', [], []);

    expect(messages[0].content).toEqual([{ type: 'text', text: 'Be precise.\n\nQuestion: What is V?' }]);
  });
});

describe('ReasoningService.analyze', () => {
  const options = {
    completion: { model: 'vision-model', maxTokens: 256, temperature: 0.1, requestTimeoutMs: 1000 },
    readiness: { maxAttempts: 1, timeoutMs: 100, intervalMs: 0 },
    instructions: 'Solve it.',
  };

  it('returns the model text verbatim', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(new Response('ok', { status: 200 }))
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ choices: [{ message: { content: '  I = 2 A\n' } }] }), { status: 200 })
        )
    );

    const text = await new ReasoningService(options).analyze('http://r.test', 'q', [], [PAGE]);

    expect(text).toBe('  I = 2 A\n');
  });

  it('propagates an upstream failure', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(new Response('ok', { status: 200 }))
        .mockResolvedValueOnce(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }))
    );

    await expect(new ReasoningService(options).analyze('http://r.test', 'q', [], [])).rejects.toBeInstanceOf(
      UpstreamError
    );
  });
});
