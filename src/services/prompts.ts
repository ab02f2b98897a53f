/**
 * Prompt templates, read from config/*.txt on first use.
 *
 * @module services/prompts
 */

import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const PROMPTS_DIR = path.resolve(__dirname, '../../config');

export const REASONING_INSTRUCTIONS_FILE = 'reasoning_instructions.txt';
export const DIAGRAM_PROMPT_FILE = 'diagram_prompt.txt';

const cache = new Map<string, string>();

/**
 * Read a prompt file (trimmed). Cached per process.
 *
 * @throws Error if the file cannot be read
 */
export function loadPrompt(fileName: string, dir: string = PROMPTS_DIR): string {
  const filePath = path.join(dir, fileName);
  const cached = cache.get(filePath);
  if (cached !== undefined) return cached;

  const text = readFileSync(filePath, 'utf-8').trim();
  cache.set(filePath, text);
  return text;
}

/**
 * Replace every `{name}` placeholder with its value. Values are inserted
 * verbatim; braces inside them are never re-expanded.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match
  );
}

/** Drop cached prompt text (for testing) */
export function clearPromptCache(): void {
  cache.clear();
}
