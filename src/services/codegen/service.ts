/**
 * Code-Generation Stage
 *
 * Asks the code model for a diagram program, given the question and the
 * reasoning stage's solution, and pulls the program out of its reply.
 * The extracted code is not validated; the compiler reports any problem.
 *
 * @module services/codegen/service
 */

import type { TutorConfig } from '../../server/config.js';
import {
  ChatCompletionClient,
  type ChatCompletionOptions,
  type ChatMessage,
} from '../inference/chat-client.js';
import { awaitReady, type ReadinessOptions } from '../inference/readiness.js';
import { DIAGRAM_PROMPT_FILE, loadPrompt, renderTemplate } from '../prompts.js';
import { DEFAULT_EXTRACTORS, extractCode, type CodeExtractor } from './extractors.js';

export const CODEGEN_SYSTEM_PROMPT =
  'You are a JavaScript expert. Return ONLY valid JSON with a "code" field containing JavaScript code that uses the schematic library.';

export interface CodeGenerationServiceOptions {
  completion: ChatCompletionOptions;
  readiness: ReadinessOptions;
  /** Few-shot template with {question} and {solution}; read from config/diagram_prompt.txt when omitted */
  template?: string;
  /** Extraction chain (default: json field, tagged fence, any fence, raw) */
  extractors?: readonly CodeExtractor[];
}

export function buildCodegenMessages(template: string, question: string, solution: string): ChatMessage[] {
  return [
    { role: 'system', content: CODEGEN_SYSTEM_PROMPT },
    { role: 'user', content: renderTemplate(template, { question, solution }) },
  ];
}

export class CodeGenerationService {
  private readonly extractors: readonly CodeExtractor[];

  constructor(private readonly options: CodeGenerationServiceOptions) {
    this.extractors = options.extractors ?? DEFAULT_EXTRACTORS;
  }

  static fromConfig(config: TutorConfig): CodeGenerationService {
    return new CodeGenerationService({
      completion: {
        model: config.codegen.model,
        maxTokens: config.generation.maxTokens,
        temperature: config.generation.temperature,
        requestTimeoutMs: config.generation.requestTimeoutMs,
      },
      readiness: { ...config.health, serviceName: 'codegen' },
    });
  }

  /**
   * @returns Diagram program text (possibly empty)
   * @throws ServiceUnavailableError if the model server never becomes ready
   * @throws UpstreamError if the completion call fails
   */
  async generateDiagramCode(endpoint: string, question: string, solution: string): Promise<string> {
    await awaitReady(endpoint, this.options.readiness);

    const template = this.options.template ?? loadPrompt(DIAGRAM_PROMPT_FILE);
    const client = new ChatCompletionClient(endpoint, this.options.completion);
    const result = await client.complete(buildCodegenMessages(template, question, solution));

    const extracted = extractCode(result.text, this.extractors);
    if (!extracted) {
      // Custom chains without a catch-all can come up empty
      console.error('[CodeGen] No extractor matched; passing the raw response through');
      return result.text;
    }

    console.error(
      `[CodeGen] Extracted ${extracted.code.length} chars of diagram code via ${extracted.strategy}`
    );
    return extracted.code;
  }
}
