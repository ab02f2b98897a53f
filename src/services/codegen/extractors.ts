/**
 * Code extraction from model responses
 *
 * An ordered chain of strategies; the first one that returns a string wins.
 * Each strategy returns null for "no match". Callers extend the chain by
 * appending strategies, which never changes the priority of existing ones.
 *
 * @module services/codegen/extractors
 */

export interface CodeExtractor {
  readonly name: string;
  extract(response: string): string | null;
}

export interface ExtractionResult {
  code: string;
  /** Name of the strategy that matched */
  strategy: string;
}

const FENCE = '```';

/** Language tags accepted by taggedFence() when none are given */
export const DEFAULT_FENCE_TAGS: readonly string[] = ['javascript', 'js'];

/** A bare info-string line (e.g. "python") right after an opening fence */
const INFO_STRING_LINE = /^[A-Za-z0-9_+-]+\r?\n/;

/**
 * (a) The trimmed response is a JSON object with a `code` field. A string is
 * returned as is; any other value is returned as its JSON text, which then
 * fails to compile with an error the model can be shown.
 */
export const jsonCodeField: CodeExtractor = {
  name: 'json_code_field',
  extract(response) {
    const trimmed = response.trim();
    if (!trimmed.startsWith('{')) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      return null;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
    if (!('code' in parsed)) return null;
    return typeof parsed.code === 'string' ? parsed.code : JSON.stringify(parsed.code);
  },
};

/**
 * (b) A fence tagged for the diagram language: the text after the first
 * such marker up to the last fence in the response, trimmed.
 */
export function taggedFence(tags: readonly string[] = DEFAULT_FENCE_TAGS): CodeExtractor {
  return {
    name: 'tagged_fence',
    extract(response) {
      for (const tag of tags) {
        const marker = FENCE + tag;
        const markerIdx = response.indexOf(marker);
        if (markerIdx === -1) continue;

        const codeStart = markerIdx + marker.length;
        // "```js" must not match "```json"
        const next = response.charAt(codeStart);
        if (next !== '' && /[A-Za-z0-9_+-]/.test(next)) continue;

        const codeEnd = response.lastIndexOf(FENCE);
        if (codeEnd > codeStart) {
          return response.substring(codeStart, codeEnd).trim();
        }
      }
      return null;
    },
  };
}

/**
 * (c) Any fence: the text between the first and last fence markers, with a
 * bare info-string line after the opening fence dropped, trimmed.
 */
export const anyFence: CodeExtractor = {
  name: 'any_fence',
  extract(response) {
    const first = response.indexOf(FENCE);
    const last = response.lastIndexOf(FENCE);
    if (first === -1 || last <= first) return null;

    const inner = response.substring(first + FENCE.length, last);
    return inner.replace(INFO_STRING_LINE, '').trim();
  },
};

/**
 * (d) The response as-is.
 */
export const rawText: CodeExtractor = {
  name: 'raw_text',
  extract(response) {
    return response;
  },
};

export const DEFAULT_EXTRACTORS: readonly CodeExtractor[] = [
  jsonCodeField,
  taggedFence(),
  anyFence,
  rawText,
];

/**
 * Run `chain` in order and return the first match. With the default chain
 * this always succeeds (rawText matches everything).
 */
export function extractCode(
  response: string,
  chain: readonly CodeExtractor[] = DEFAULT_EXTRACTORS
): ExtractionResult | null {
  for (const extractor of chain) {
    const code = extractor.extract(response);
    if (code !== null) {
      return { code, strategy: extractor.name };
    }
  }
  return null;
}
