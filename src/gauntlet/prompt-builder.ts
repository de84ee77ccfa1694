import { Challenge } from './gauntlet-types';

/**
 * 固定的系统提示词：约束模型只输出 +00:00 形式的 UTC 时间数组
 */
export const SYSTEM_PROMPT = [
  'You are a calendar computation expert. You will be given recurrence rule',
  '(RRULE) challenges per RFC 5545. For each challenge, compute the exact',
  'UTC start times of the specified recurring events.',
  '',
  'Rules:',
  '- Output ONLY a JSON array of UTC datetime strings in RFC 3339 format.',
  '- Use the +00:00 suffix (not Z).',
  '- Account for DST transitions, leap years, and timezone offsets.',
  '- Double-check your work: count the occurrences carefully.',
  '',
  'Example output format:',
  '["2026-03-01T07:00:00+00:00", "2026-03-08T07:00:00+00:00"]',
  '',
].join('\n');

/**
 * 构建单个题目的用户提示词
 * UNTIL / EXDATE 仅在题目中存在时输出
 */
export function buildPrompt(challenge: Challenge): string {
  const parts = [
    `Challenge: ${challenge.name}`,
    '',
    challenge.question,
    '',
    'Technical details:',
    `  RRULE: ${challenge.rrule}`,
    `  DTSTART: ${challenge.dtstart} (local time in the specified timezone)`,
    `  Timezone: ${challenge.timezone}`,
    `  Duration: ${challenge.durationMinutes} minutes`,
  ];

  if (challenge.until) {
    parts.push(`  UNTIL: ${challenge.until} (local time in the specified timezone)`);
  }
  if (challenge.exdates && challenge.exdates.length > 0) {
    parts.push(`  EXDATE: ${challenge.exdates.join(', ')}`);
  }

  parts.push('', 'Return ONLY the JSON array of UTC start times.');
  return parts.join('\n');
}
