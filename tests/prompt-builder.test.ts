import test from 'node:test';
import assert from 'node:assert/strict';
import { SYSTEM_PROMPT, buildPrompt } from '../src/gauntlet/prompt-builder';
import { makeChallenge } from './helpers/stubs';

test('prompt without optional fields lists only the required technical details', () => {
  const prompt = buildPrompt(makeChallenge());
  assert.equal(prompt, [
    'Challenge: Weekly Sunday',
    '',
    'List the first two Sundays.',
    '',
    'Technical details:',
    '  RRULE: FREQ=WEEKLY;BYDAY=SU;COUNT=2',
    '  DTSTART: 2026-03-01T02:00:00 (local time in the specified timezone)',
    '  Timezone: America/Denver',
    '  Duration: 60 minutes',
    '',
    'Return ONLY the JSON array of UTC start times.',
  ].join('\n'));
});

test('UNTIL and EXDATE lines appear only when the challenge has them', () => {
  const prompt = buildPrompt(makeChallenge({
    until: '2026-03-31T23:59:59',
    exdates: ['2026-03-08T02:00:00', '2026-03-15T02:00:00'],
  }));
  const lines = prompt.split('\n');
  assert.equal(lines[9], '  UNTIL: 2026-03-31T23:59:59 (local time in the specified timezone)');
  assert.equal(lines[10], '  EXDATE: 2026-03-08T02:00:00, 2026-03-15T02:00:00');
});

test('an empty exclusion list produces no EXDATE line', () => {
  const prompt = buildPrompt(makeChallenge({ exdates: [] }));
  assert.equal(prompt.includes('EXDATE'), false);
});

test('prompt building is deterministic', () => {
  const challenge = makeChallenge({ until: '2026-04-01T00:00:00' });
  assert.equal(buildPrompt(challenge), buildPrompt(challenge));
});

test('system prompt fixes the +00:00 JSON array output contract', () => {
  assert.ok(SYSTEM_PROMPT.includes('Output ONLY a JSON array of UTC datetime strings in RFC 3339 format.'));
  assert.ok(SYSTEM_PROMPT.includes('Use the +00:00 suffix (not Z).'));
});
