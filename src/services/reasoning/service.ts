/**
 * Reasoning Stage
 *
 * Sends the question, the student's images and the retrieved textbook pages
 * to the vision-language model and returns its worked solution verbatim.
 *
 * @module services/reasoning/service
 */

import type { PageImage } from '../../models/document.js';
import type { TutorConfig } from '../../server/config.js';
import {
  ChatCompletionClient,
  imagePart,
  type ChatCompletionOptions,
  type ChatContentPart,
  type ChatMessage,
} from '../inference/chat-client.js';
import { awaitReady, type ReadinessOptions } from '../inference/readiness.js';
import { REASONING_INSTRUCTIONS_FILE, loadPrompt } from '../prompts.js';

export const CONTEXT_PAGES_HEADER = '\n\nRelevant textbook pages for reference:';

export interface ReasoningServiceOptions {
  completion: ChatCompletionOptions;
  readiness: ReadinessOptions;
  /** Instruction preamble; read from config/reasoning_instructions.txt when omitted */
  instructions?: string;
}

/**
 * Build the single user message: instructions and question, the student's
 * images, then (when there are any) the context pages under a header.
 */
export function buildReasoningMessages(
  instructions: string,
  question: string,
  userImages: Buffer[],
  contextPages: PageImage[]
): ChatMessage[] {
  const content: ChatContentPart[] = [
    { type: 'text', text: `${instructions}\n\nQuestion: ${question}` },
    ...userImages.map(imagePart),
  ];

  if (contextPages.length > 0) {
    content.push({ type: 'text', text: CONTEXT_PAGES_HEADER });
    content.push(...contextPages.map((p) => imagePart(p.png)));
  }

  return [{ role: 'user', content }];
}

export class ReasoningService {
  constructor(private readonly options: ReasoningServiceOptions) {}

  static fromConfig(config: TutorConfig): ReasoningService {
    return new ReasoningService({
      completion: {
        model: config.reasoning.model,
        maxTokens: config.generation.maxTokens,
        temperature: config.generation.temperature,
        requestTimeoutMs: config.generation.requestTimeoutMs,
      },
      readiness: { ...config.health, serviceName: 'reasoning' },
    });
  }

  /**
   * @throws ServiceUnavailableError if the model server never becomes ready
   * @throws UpstreamError if the completion call fails
   */
  async analyze(
    endpoint: string,
    question: string,
    userImages: Buffer[],
    contextPages: PageImage[]
  ): Promise<string> {
    await awaitReady(endpoint, this.options.readiness);

    const instructions = this.options.instructions ?? loadPrompt(REASONING_INSTRUCTIONS_FILE);
    const messages = buildReasoningMessages(instructions, question, userImages, contextPages);
    const client = new ChatCompletionClient(endpoint, this.options.completion);

    console.error(
      `[Reasoning] Sending question with ${userImages.length} user images and ${contextPages.length} context pages`
    );
    const result = await client.complete(messages);
    console.error(
      `[Reasoning] Solution received: ${result.text.length} chars, ${result.usage.outputTokens} tokens in ${result.processingTimeMs}ms`
    );
    return result.text;
  }
}
