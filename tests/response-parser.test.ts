import test from 'node:test';
import assert from 'node:assert/strict';
import { parseAgentResponse } from '../src/gauntlet/response-parser';
import { compareAnswers } from '../src/gauntlet/comparator';
import { ResponseParseError } from '../src/errors';

test('parses a bare JSON array', () => {
  const parsed = parseAgentResponse('["2026-03-01T07:00:00+00:00", "2026-03-08T07:00:00+00:00"]');
  assert.deepEqual(parsed, ['2026-03-01T07:00:00+00:00', '2026-03-08T07:00:00+00:00']);
});

test('recovers the array from a fenced block between prose', () => {
  const raw = 'Here you go:\n```json\n["2026-03-01T07:00:00Z"]\n```\nHope that helps!';
  assert.deepEqual(parseAgentResponse(raw), ['2026-03-01T07:00:00Z']);
});

test('fenced answer with Z suffix grades as correct against +00:00 ground truth', () => {
  const raw = 'Here you go:\n```json\n["2026-03-01T07:00:00Z"]\n```\nHope that helps!';
  const verdict = compareAnswers(['2026-03-01T07:00:00+00:00'], parseAgentResponse(raw));
  assert.equal(verdict.correct, true);
});

test('only the first fenced block is used', () => {
  const raw = [
    'Answer:',
    '```',
    '["2026-01-01T00:00:00+00:00"]',
    '```',
    'Scratch work:',
    '```',
    '["1999-01-01T00:00:00+00:00"]',
    '```',
  ].join('\n');
  assert.deepEqual(parseAgentResponse(raw), ['2026-01-01T00:00:00+00:00']);
});

test('prose around an unfenced array is sliced away', () => {
  const raw = 'The occurrences are ["2026-01-06T01:00:00+00:00", "2026-01-08T01:00:00+00:00"] as requested.';
  assert.deepEqual(parseAgentResponse(raw), ['2026-01-06T01:00:00+00:00', '2026-01-08T01:00:00+00:00']);
});

test('an empty array is a valid answer', () => {
  assert.deepEqual(parseAgentResponse('  []  '), []);
});

test('text without any brackets fails with ResponseParseError', () => {
  assert.throws(
    () => parseAgentResponse('I cannot compute these dates.'),
    (err: unknown) => err instanceof ResponseParseError && err.code === 'RESPONSE_PARSE',
  );
});

test('an array containing non-strings fails with ResponseParseError', () => {
  assert.throws(() => parseAgentResponse('[1, 2, 3]'), ResponseParseError);
});

test('a JSON object instead of an array fails with ResponseParseError', () => {
  assert.throws(() => parseAgentResponse('{"answer": "2026-01-01T00:00:00+00:00"}'), ResponseParseError);
});
