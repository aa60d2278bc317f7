import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractFirstObject, findBlockEnd } from '../extract.js';

describe('extractFirstObject', () => {
  it('extracts an object wrapped in prose and reports the discarded text', () => {
    const result = extractFirstObject('Sure! Here\'s the result: {"intent": "ambiguous"} Hope this helps!');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { intent: 'ambiguous' });
      assert.equal(result.discardedText, "Sure! Here's the result: Hope this helps!");
      assert.equal(result.discardedText.length, 41);
      assert.deepEqual(result.fixesApplied, []);
    }
  });

  it('ignores markdown fences', () => {
    const result = extractFirstObject('```json\n{"sql": "SELECT 1"}\n```');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { sql: 'SELECT 1' });
      assert.equal(result.discardedText, '```json ```');
    }
  });

  it('does not count braces inside strings', () => {
    const result = extractFirstObject('{"a": "x } y", "b": {"c": 1}} trailing');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { a: 'x } y', b: { c: 1 } });
      assert.equal(result.discardedText, 'trailing');
    }
  });

  it('classifies empty output', () => {
    for (const raw of ['', '   \n ']) {
      const result = extractFirstObject(raw);
      assert.equal(result.ok, false);
      if (!result.ok) assert.equal(result.failure.category, 'empty_response');
    }
  });

  it('classifies provider error text without an object', () => {
    const result = extractFirstObject('Error: Rate limit exceeded for model. Try again later.');
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.failure.category, 'provider_failure');
  });

  it('classifies plain prose as invalid_format', () => {
    const result = extractFirstObject('I cannot answer that question.');
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.failure.category, 'invalid_format');
  });

  it('classifies an unclosed object as truncated_output', () => {
    const result = extractFirstObject('Here: {"intent": "DATA_QUERY", "plan": {"relevant_tables": [');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.failure.category, 'truncated_output');
      assert.equal(result.failure.code, 'REASONING_PARSE_FAILED');
    }
  });

  it('moves past a block that does not parse', () => {
    const result = extractFirstObject('{not json} then {"ok": true}');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { ok: true });
      assert.equal(result.discardedText, '{not json} then');
    }
  });

  it('reports invalid_format when no block parses', () => {
    const result = extractFirstObject('{not json} and {also not}');
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.failure.category, 'invalid_format');
  });

  it('survives extract, stringify and extract again without losing keys', () => {
    const original = {
      intent: 'DATA_QUERY',
      plan: { relevant_tables: ['Customer'], needs_data_context: false },
      note: 'braces { } and "quotes" in text',
    };
    const first = extractFirstObject(`Result:\n${JSON.stringify(original)}\nDone.`);
    assert.equal(first.ok, true);
    if (!first.ok) return;
    assert.deepEqual(first.value, original);

    const second = extractFirstObject(JSON.stringify(first.value));
    assert.equal(second.ok, true);
    if (second.ok) {
      assert.deepEqual(second.value, original);
      assert.equal(second.discardedText, '');
    }
  });
});

describe('extractFirstObject auto-fix', () => {
  it('removes trailing commas', () => {
    const result = extractFirstObject('{"a": 1, "b": [1, 2,],}');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { a: 1, b: [1, 2] });
      assert.deepEqual(result.fixesApplied, ['trailing_commas']);
    }
  });

  it('strips comments outside strings', () => {
    const result = extractFirstObject('{"url": "http://x", "a": 1 // note\n}');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { url: 'http://x', a: 1 });
      assert.deepEqual(result.fixesApplied, ['strip_comments']);
    }
  });

  it('converts single quotes when the block has no double quotes', () => {
    const result = extractFirstObject("{'intent': 'META_QUERY'}");
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { intent: 'META_QUERY' });
      assert.deepEqual(result.fixesApplied, ['single_quotes']);
    }
  });

  it('applies fixes cumulatively', () => {
    const result = extractFirstObject("{'a': 1, /* why */ 'b': 2,}");
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.deepEqual(result.value, { a: 1, b: 2 });
      assert.deepEqual(result.fixesApplied, ['strip_comments', 'trailing_commas', 'single_quotes']);
    }
  });
});

describe('findBlockEnd', () => {
  it('returns the index after the matching brace', () => {
    assert.equal(findBlockEnd('x{"a":{"b":1}}y', 1), 14);
  });

  it('returns -1 for an unclosed block', () => {
    assert.equal(findBlockEnd('{"a": {', 0), -1);
  });
});
