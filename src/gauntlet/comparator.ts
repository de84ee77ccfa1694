import { ComparisonVerdict } from './gauntlet-types';

/**
 * 标准化时间字符串：去掉首尾空白，Z 后缀改写为 +00:00
 */
export function normalizeDatetime(value: string): string {
  const trimmed = value.trim();
  if (trimmed.endsWith('Z')) {
    return trimmed.slice(0, -1) + '+00:00';
  }
  return trimmed;
}

/**
 * 比较标准答案与模型答案
 *
 * correct 按位置严格相等（顺序错误即判错），
 * missing / extra 按成员关系计算，与顺序无关。
 * 不要改成集合相等：打乱顺序的答案不应通过。
 */
export function compareAnswers(expected: readonly string[], actual: readonly string[]): ComparisonVerdict {
  const normExpected = expected.map(normalizeDatetime);
  const normActual = actual.map(normalizeDatetime);

  const shorter = Math.min(normExpected.length, normActual.length);
  let matching = 0;
  for (let i = 0; i < shorter; i++) {
    if (normExpected[i] === normActual[i]) matching++;
  }

  const actualSet = new Set(normActual);
  const expectedSet = new Set(normExpected);
  const missing = normExpected.filter(e => !actualSet.has(e));
  const extra = normActual.filter(a => !expectedSet.has(a));

  const correct = normExpected.length === normActual.length && matching === normExpected.length;

  return {
    correct,
    expectedCount: normExpected.length,
    actualCount: normActual.length,
    matching,
    missing,
    extra,
  };
}
