/**
 * Unit tests for the code extraction chain
 *
 * @module tests/unit/services/codegen/extractors
 */

import { describe, it, expect } from 'vitest';
import {
  anyFence,
  extractCode,
  jsonCodeField,
  rawText,
  taggedFence,
  type CodeExtractor,
} from '../../../../src/services/codegen/extractors.js';

describe('jsonCodeField', () => {
  it('returns the code field of a JSON object', () => {
    expect(jsonCodeField.extract('  {"code": "d.draw();"}\n')).toBe('d.draw();');
  });

  it('does not match JSON without a code field', () => {
    expect(jsonCodeField.extract('{"program": "x"}')).toBeNull();
    expect(jsonCodeField.extract('[{"code": "x"}]')).toBeNull();
  });

  it('returns a non-string code field as its JSON text', () => {
    expect(jsonCodeField.extract('{"code": 42}')).toBe('42');
    expect(jsonCodeField.extract('{"code": null}')).toBe('null');
    expect(jsonCodeField.extract('{"code": ["d.draw();"]}')).toBe('["d.draw();"]');
  });

  it('stops the chain at a non-string code field', () => {
    expect(extractCode('{"code": 42}', [jsonCodeField, rawText])).toEqual({
      code: '42',
      strategy: 'json_code_field',
    });
  });

  it('does not match malformed JSON', () => {
    expect(jsonCodeField.extract('{"code": "x"')).toBeNull();
  });
});

describe('taggedFence', () => {
  it('takes the text after the tag up to the last fence', () => {
    const response = 'Here you go:\n```javascript\nconst d = new schematic.Drawing();\n```\nDone.';
    expect(taggedFence().extract(response)).toBe('const d = new schematic.Drawing();');
  });

  it('accepts the short js tag', () => {
    expect(taggedFence().extract('```js\nx = 1\n```')).toBe('x = 1');
  });

  it('does not treat a json fence as js', () => {
    expect(taggedFence().extract('```json\n{"code": "x"}\n```')).toBeNull();
  });

  it('uses custom tags', () => {
    expect(taggedFence(['ts']).extract('```ts\nlet a = 1;\n```')).toBe('let a = 1;');
  });

  it('needs a closing fence', () => {
    expect(taggedFence().extract('```javascript\nunterminated')).toBeNull();
  });
});

describe('anyFence', () => {
  it('drops the info string of an untagged-language fence', () => {
    expect(anyFence.extract('```python\nx=1\n```')).toBe('x=1');
  });

  it('handles a fence without an info string', () => {
    expect(anyFence.extract('```\nd.draw();\n```')).toBe('d.draw();');
  });

  it('does not match a single fence', () => {
    expect(anyFence.extract('``` only one')).toBeNull();
  });
});

describe('extractCode', () => {
  it('prefers the JSON code field', () => {
    expect(extractCode('{"code": "x=1"}')).toEqual({ code: 'x=1', strategy: 'json_code_field' });
  });

  it('falls through to any_fence for other languages', () => {
    expect(extractCode('```python\nx=1\n```')).toEqual({ code: 'x=1', strategy: 'any_fence' });
  });

  it('falls back to the raw text', () => {
    expect(extractCode('x=1')).toEqual({ code: 'x=1', strategy: 'raw_text' });
  });

  it('returns null when a custom chain has no catch-all', () => {
    expect(extractCode('x=1', [jsonCodeField, anyFence])).toBeNull();
  });

  it('runs appended strategies only after the built-in ones', () => {
    const shout: CodeExtractor = { name: 'shout', extract: (r) => r.toUpperCase() };

    expect(extractCode('{"code": "a"}', [jsonCodeField, shout])).toEqual({
      code: 'a',
      strategy: 'json_code_field',
    });
    expect(extractCode('plain', [jsonCodeField, shout, rawText])).toEqual({
      code: 'PLAIN',
      strategy: 'shout',
    });
  });
});
