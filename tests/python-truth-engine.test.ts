import test from 'node:test';
import assert from 'node:assert/strict';
import * as path from 'path';
import { PythonTruthEngine } from '../src/truth-engine/python-truth-engine';
import { ExpansionRequest } from '../src/truth-engine/truth-engine';

// 用 node 运行假脚本代替 Python 解释器
const FAKE_SCRIPT = path.join(__dirname, 'fixtures', 'fake-truth-engine.js');

function makeEngine(timeoutSeconds = 10): PythonTruthEngine {
  return new PythonTruthEngine({ python: process.execPath, scriptPath: FAKE_SCRIPT, timeoutSeconds });
}

function request(overrides: Partial<ExpansionRequest> = {}): ExpansionRequest {
  return {
    rrule: 'FREQ=DAILY;COUNT=3',
    dtstart: '2026-01-01T09:00:00',
    durationMinutes: 30,
    timezone: 'UTC',
    ...overrides,
  };
}

test('successful expansion returns events in engine order', async () => {
  const events = await makeEngine().expand(request({ maxCount: 3 }));
  assert.deepEqual(events, [
    { start: '2026-01-01T09:00:00+00:00', end: '2026-01-01T09:30:00+00:00' },
    { start: '2026-01-02T09:00:00+00:00', end: '2026-01-02T09:30:00+00:00' },
    { start: '2026-01-03T09:00:00+00:00', end: '2026-01-03T09:30:00+00:00' },
  ]);
});

test('request is sent on stdin with snake_case keys and null optionals', async () => {
  const [event] = await makeEngine().expand(request({ rrule: 'ECHO', timezone: 'Europe/London' }));
  assert.deepEqual(JSON.parse(event.start), {
    rrule: 'ECHO',
    dtstart: '2026-01-01T09:00:00',
    duration_minutes: 30,
    timezone: 'Europe/London',
    until: null,
    max_count: null,
  });
});

test('engine-reported errors reject with the engine message', async () => {
  await assert.rejects(
    makeEngine().expand(request({ timezone: 'Mars/Olympus_Mons' })),
    { message: 'unknown timezone: Mars/Olympus_Mons' },
  );
});

test('non-JSON output rejects', async () => {
  await assert.rejects(
    makeEngine().expand(request({ rrule: 'GARBAGE' })),
    { message: 'Truth Engine 输出不是 JSON: not json at all' },
  );
});

test('a process that exits without output rejects with its exit code', async () => {
  await assert.rejects(
    makeEngine().expand(request({ rrule: 'CRASH' })),
    { message: 'Truth Engine 无输出（exit code: 3）' },
  );
});

test('a hanging process is killed after the timeout', async () => {
  await assert.rejects(
    makeEngine(0.2).expand(request({ rrule: 'HANG' })),
    { message: 'Truth Engine 执行超时（0.2s）' },
  );
});

test('a missing interpreter rejects with a start-up error', async () => {
  const engine = new PythonTruthEngine({
    python: path.join(__dirname, 'fixtures', 'no-such-interpreter'),
    scriptPath: FAKE_SCRIPT,
  });
  await assert.rejects(engine.expand(request()), /Truth Engine 启动失败/);
});
