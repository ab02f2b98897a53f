/**
 * OpenAI-compatible chat-completion client
 *
 * Talks to a model server (vLLM or anything exposing /v1/chat/completions).
 * No retries: a failed generation surfaces as UpstreamError and the
 * pipeline fails. Readiness is the caller's job (see readiness.ts).
 *
 * @module services/inference/chat-client
 */

import { z } from 'zod';
import { UpstreamError, errorMessage } from '../errors.js';

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string | ChatContentPart[];
}

export interface ChatCompletionOptions {
  /** Served model name */
  model: string;
  maxTokens: number;
  temperature: number;
  /** Whole-request timeout in ms */
  requestTimeoutMs: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatCompletionResult {
  text: string;
  model: string;
  usage: TokenUsage;
  processingTimeMs: number;
}

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1, 'response has no choices'),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .partial()
    .optional(),
});

/** Image MIME types recognised from magic bytes */
type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

/**
 * Sniff an image MIME type from its first bytes. Unknown formats are
 * sent as PNG, which is what page renders and most uploads are.
 */
export function detectImageMimeType(data: Buffer): ImageMimeType {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (data.length >= 6 && data.subarray(0, 3).toString('ascii') === 'GIF') {
    return 'image/gif';
  }
  if (
    data.length >= 12 &&
    data.subarray(0, 4).toString('ascii') === 'RIFF' &&
    data.subarray(8, 12).toString('ascii') === 'WEBP'
  ) {
    return 'image/webp';
  }
  return 'image/png';
}

/**
 * Build an inline image content part (base64 data URL)
 */
export function imagePart(data: Buffer): ChatContentPart {
  const mimeType = detectImageMimeType(data);
  return {
    type: 'image_url',
    image_url: { url: `data:${mimeType};base64,${data.toString('base64')}` },
  };
}

export class ChatCompletionClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly options: ChatCompletionOptions
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Send one chat-completion request and return the first choice's text.
   *
   * @throws UpstreamError on transport failure, timeout, non-2xx status,
   *   non-JSON body, or a body without choices[0].message.content
   */
  async complete(messages: ChatMessage[]): Promise<ChatCompletionResult> {
    const url = `${this.baseUrl}/v1/chat/completions`;
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    let rawResponse: Response;
    let bodyText: string;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          messages,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
        }),
        signal: controller.signal,
      });
      bodyText = await rawResponse.text();
    } catch (error) {
      const message = controller.signal.aborted
        ? `Chat completion timed out after ${this.options.requestTimeoutMs}ms`
        : `Chat completion request failed: ${errorMessage(error)}`;
      throw new UpstreamError(message, null, { url, model: this.options.model }, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      throw new UpstreamError(
        `Model server error ${rawResponse.status}: ${rawResponse.statusText}. ${bodyText.slice(0, 200)}`.trim(),
        rawResponse.status,
        { url, model: this.options.model }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch (error) {
      throw new UpstreamError(
        `Model server returned a non-JSON body: ${bodyText.slice(0, 200)}`,
        rawResponse.status,
        { url },
        { cause: error }
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map((e) => `${e.path.length > 0 ? `${e.path.join('.')}: ` : ''}${e.message}`)
        .join('; ');
      throw new UpstreamError(
        `Malformed chat completion response: ${issues}`,
        rawResponse.status,
        { url, body: bodyText.slice(0, 500) }
      );
    }

    const data = parsed.data;
    const inputTokens = data.usage?.prompt_tokens ?? 0;
    const outputTokens = data.usage?.completion_tokens ?? 0;

    return {
      text: data.choices[0].message.content,
      model: data.model ?? this.options.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: data.usage?.total_tokens ?? inputTokens + outputTokens,
      },
      processingTimeMs: Date.now() - startTime,
    };
  }
}
