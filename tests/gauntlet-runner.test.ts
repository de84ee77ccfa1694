import test from 'node:test';
import assert from 'node:assert/strict';
import { GauntletRunner } from '../src/gauntlet/gauntlet-runner';
import { GroundTruthResolver } from '../src/gauntlet/ground-truth';
import { SYSTEM_PROMPT } from '../src/gauntlet/prompt-builder';
import { EvaluationResult } from '../src/gauntlet/gauntlet-types';
import { AgentInvocationError } from '../src/errors';
import { StubAgent, StubTruthEngine, makeChallenge } from './helpers/stubs';

const OPTIONS = { provider: 'openai' as const, model: 'test-model' };

test('a batch whose second resolution fails still yields three rows', async () => {
  const engine = new StubTruthEngine({
    'RULE-A': ['2026-01-01T09:00:00+00:00'],
    'RULE-B': new Error('unknown timezone'),
    'RULE-C': ['2026-01-03T09:00:00+00:00'],
  });
  const agent = new StubAgent({
    'Alpha': '["2026-01-01T09:00:00Z"]',
    'Charlie': '["2026-01-03T09:00:00+00:00"]',
  });
  const runner = new GauntletRunner(new GroundTruthResolver(engine), agent);

  const report = await runner.run([
    makeChallenge({ id: 'a', name: 'Alpha', rrule: 'RULE-A' }),
    makeChallenge({ id: 'b', name: 'Bravo', rrule: 'RULE-B' }),
    makeChallenge({ id: 'c', name: 'Charlie', rrule: 'RULE-C' }),
  ], OPTIONS);

  assert.equal(report.results.length, 3);
  assert.deepEqual(report.results.map(r => r.outcome), ['success', 'resolution_failure', 'success']);
  assert.equal(report.results[1].rawResponse, 'ERROR: unknown timezone');
  assert.deepEqual(report.results[1].expected, []);
  assert.equal(report.results[0].correct, true);
  assert.equal(report.results[2].correct, true);
  assert.equal(report.passed, 2);
  assert.equal(report.total, 3);
  assert.equal(report.score, '2/3');
  // 标准答案缺失的题目不会调用模型
  assert.equal(agent.requests.length, 2);
});

test('agent invocation failures are recorded with the full expected set missing', async () => {
  const expected = ['2026-03-01T07:00:00+00:00', '2026-03-08T07:00:00+00:00'];
  const agent = new StubAgent({ 'Weekly Sunday': new AgentInvocationError('API错误 (401): invalid key', 401) });
  const runner = new GauntletRunner(new GroundTruthResolver(new StubTruthEngine({})), agent);

  const report = await runner.run([
    makeChallenge({ resolution: { mode: 'precomputed', answer: expected } }),
  ], OPTIONS);

  const expectedRow: EvaluationResult = {
    id: 'weekly-sunday',
    name: 'Weekly Sunday',
    difficulty: 'Easy',
    outcome: 'invocation_failure',
    expected,
    actual: [],
    rawResponse: 'ERROR: API错误 (401): invalid key',
    correct: false,
    expectedCount: 2,
    actualCount: 0,
    matching: 0,
    missing: expected,
    extra: [],
  };
  assert.deepEqual(report.results, [expectedRow]);
  assert.equal(report.score, '0/1');
});

test('unparseable agent output is recorded as a parse failure', async () => {
  const agent = new StubAgent({ 'Weekly Sunday': 'Sorry, I am not able to do calendar math.' });
  const runner = new GauntletRunner(new GroundTruthResolver(new StubTruthEngine({})), agent);

  const report = await runner.run([
    makeChallenge({ resolution: { mode: 'precomputed', answer: ['2026-03-01T09:00:00+00:00'] } }),
  ], OPTIONS);

  const [row] = report.results;
  assert.equal(row.outcome, 'parse_failure');
  assert.equal(row.correct, false);
  assert.equal(row.matching, 0);
  assert.deepEqual(row.actual, []);
  assert.deepEqual(row.missing, ['2026-03-01T09:00:00+00:00']);
  assert.ok(row.rawResponse.startsWith('ERROR: '));
});

test('wrong but parseable answers keep the raw response and diagnostics', async () => {
  const raw = '["A", "C"]';
  const agent = new StubAgent({ 'Weekly Sunday': raw });
  const runner = new GauntletRunner(new GroundTruthResolver(new StubTruthEngine({})), agent);

  const report = await runner.run([
    makeChallenge({ resolution: { mode: 'precomputed', answer: ['A', 'B', 'C'] } }),
  ], OPTIONS);

  const [row] = report.results;
  assert.equal(row.outcome, 'success');
  assert.equal(row.rawResponse, raw);
  assert.equal(row.correct, false);
  assert.equal(row.matching, 1);
  assert.deepEqual(row.missing, ['B']);
  assert.deepEqual(row.extra, []);
});

test('the agent receives the fixed system prompt, provider and model', async () => {
  const agent = new StubAgent({ 'Weekly Sunday': '[]' });
  const runner = new GauntletRunner(new GroundTruthResolver(new StubTruthEngine({})), agent);

  await runner.run([
    makeChallenge({ resolution: { mode: 'precomputed', answer: [] } }),
  ], { provider: 'anthropic', model: 'test-model' });

  assert.equal(agent.requests.length, 1);
  const [request] = agent.requests;
  assert.equal(request.system, SYSTEM_PROMPT);
  assert.equal(request.provider, 'anthropic');
  assert.equal(request.model, 'test-model');
  assert.ok(request.prompt.startsWith('Challenge: Weekly Sunday\n'));
});

test('callbacks fire once per challenge in order', async () => {
  const agent = new StubAgent({ 'First': '[]', 'Second': '[]' });
  const runner = new GauntletRunner(new GroundTruthResolver(new StubTruthEngine({})), agent);
  const events: string[] = [];

  await runner.run([
    makeChallenge({ id: 'first', name: 'First', resolution: { mode: 'precomputed', answer: [] } }),
    makeChallenge({ id: 'second', name: 'Second', resolution: { mode: 'precomputed', answer: [] } }),
  ], OPTIONS, {
    onChallengeStart: (ch, index, total) => events.push(`start:${ch.id}:${index}/${total}`),
    onChallengeEnd: (ch, result) => events.push(`end:${ch.id}:${result.correct}`),
  });

  assert.deepEqual(events, ['start:first:0/2', 'end:first:true', 'start:second:1/2', 'end:second:true']);
});
