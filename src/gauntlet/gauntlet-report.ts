import { styles, theme } from '../theme/colors';
import { DIFFICULTIES, EvaluationResult, RunArtifact, RunReport } from './gauntlet-types';
import { ResolutionOutcome } from './ground-truth';

const INDENT = '        ';

/**
 * verify 命令的单行结果
 */
export function formatVerification(outcome: ResolutionOutcome, verbose = false): string[] {
  if (!outcome.ok) {
    return [`  [${styles.err()}] ${outcome.challenge.name}: ERROR: ${outcome.error.message}`];
  }

  const mode = outcome.source === 'precomputed' ? 'hardcoded' : 'engine';
  const lines = [`  [${styles.ok()}] ${outcome.challenge.name}: ${outcome.answer.length} events (${mode})`];
  if (verbose) {
    for (const dt of outcome.answer) lines.push(`           ${dt}`);
  }
  return lines;
}

/**
 * 单题评测结果；失败或 verbose 时附带诊断信息
 */
export function formatChallengeResult(
  result: EvaluationResult,
  options: { verbose?: boolean; whyLlmsFail?: string } = {},
): string[] {
  const status = result.correct ? styles.pass() : styles.fail();
  const lines = [
    `  [${status}] ${result.name} ${theme.dim('(')}${styles.difficulty(result.difficulty)}${theme.dim(')')}`,
  ];

  if (!result.correct || options.verbose) {
    lines.push(`${INDENT}Expected ${result.expectedCount} events, got ${result.actualCount}`);
    lines.push(`${INDENT}Matching: ${result.matching}/${result.expectedCount}`);
    if (result.missing.length > 0) {
      lines.push(theme.error(`${INDENT}Missing: ${JSON.stringify(result.missing)}`));
    }
    if (result.extra.length > 0) {
      lines.push(theme.warning(`${INDENT}Extra:   ${JSON.stringify(result.extra)}`));
    }
    if (result.outcome !== 'success') {
      lines.push(theme.error(`${INDENT}${result.rawResponse}`));
    }
  }

  if (!result.correct && options.whyLlmsFail) {
    lines.push(theme.dim(`${INDENT}Why: ${options.whyLlmsFail}`));
  }

  return lines;
}

export function scoreVerdict(passed: number, total: number): string {
  const pct = total > 0 ? (passed / total) * 100 : 0;
  if (pct === 100) return 'Perfect score! This model handles calendar math correctly.';
  if (pct >= 70) return 'Good but not reliable for production calendar operations.';
  if (pct >= 40) return 'Significant gaps in calendar reasoning.';
  return 'This model should not be trusted with calendar math.';
}

/**
 * 总分与评语
 */
export function formatSummary(passed: number, total: number): string[] {
  const pct = total > 0 ? (passed / total) * 100 : 0;
  const color = pct === 100 ? theme.success : pct >= 50 ? theme.warning : theme.error;
  const verdictColor = pct === 100 ? theme.success : pct >= 70 ? theme.warning : theme.error;

  return [
    styles.title(`  Score: ${color(`${passed}/${total} (${pct.toFixed(0)}%)`)}`),
    `  ${verdictColor(scoreVerdict(passed, total))}`,
  ];
}

/**
 * 转换为持久化格式
 */
export function toRunArtifact(report: RunReport): RunArtifact {
  return {
    model: report.model,
    provider: report.provider,
    timestamp: report.timestamp,
    score: report.score,
    challenges: report.results.map(r => ({
      id: r.id,
      name: r.name,
      difficulty: r.difficulty,
      outcome: r.outcome,
      expected: r.expected,
      actual: r.actual,
      raw_response: r.rawResponse,
      correct: r.correct,
      expected_count: r.expectedCount,
      actual_count: r.actualCount,
      matching: r.matching,
      missing: r.missing,
      extra: r.extra,
    })),
  };
}

export function generateMarkdownReport(report: RunReport): string {
  const lines: string[] = [
    `# RRULE Gauntlet 报告: ${report.model} (${report.provider})`,
    '',
    `评估时间: ${report.timestamp}`,
    `得分: ${report.score}`,
    '',
    '| 题目 | 难度 | 结果 | 匹配 | 缺失 | 多余 |',
    '|---|---|---|---|---|---|',
  ];

  for (const r of report.results) {
    const status = r.correct ? '✅' : r.outcome === 'success' ? '❌' : '⚠️';
    lines.push(
      `| ${r.name} | ${r.difficulty} | ${status} | ${r.matching}/${r.expectedCount} | ${r.missing.length} | ${r.extra.length} |`
    );
  }
  lines.push('');

  // 失败题目详情
  const failures = report.results.filter(r => !r.correct);
  if (failures.length > 0) {
    lines.push('## 失败详情', '');
    for (const r of failures) {
      lines.push(`### ${r.name}`, '');
      lines.push(`- 结果类型: \`${r.outcome}\``);
      lines.push(`- 期望 ${r.expectedCount} 个，实际 ${r.actualCount} 个`);
      if (r.missing.length > 0) lines.push(`- 缺失: ${r.missing.map(m => `\`${m}\``).join(', ')}`);
      if (r.extra.length > 0) lines.push(`- 多余: ${r.extra.map(e => `\`${e}\``).join(', ')}`);
      if (r.outcome !== 'success') lines.push(`- 错误: ${r.rawResponse}`);
      lines.push('');
    }
  }

  // 按难度统计
  lines.push('## 统计', '');
  for (const level of DIFFICULTIES) {
    const group = report.results.filter(r => r.difficulty === level);
    if (group.length === 0) continue;
    const ok = group.filter(r => r.correct).length;
    lines.push(`- ${level}: ${ok}/${group.length}`);
  }

  return lines.join('\n');
}
