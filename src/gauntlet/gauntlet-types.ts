export const DIFFICULTIES = ['Easy', 'Medium', 'Hard'] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

/**
 * 标准答案来源
 * - precomputed: 题库中写死的答案（例如 EXDATE 题，Truth Engine 不接受排除日期）
 * - computed: 交给 Truth Engine 展开，cachedAnswer 是上次 verify 持久化的结果；
 *   declared 表示记录里显式写了 verification_mode: engine
 */
export type Resolution =
  | { mode: 'precomputed'; answer: readonly string[] }
  | { mode: 'computed'; cachedAnswer?: readonly string[]; declared?: true };

export interface Challenge {
  readonly id: string;
  readonly name: string;
  readonly question: string;
  readonly rrule: string;
  /** 本地时间，不带偏移量，例如 2026-03-01T02:30:00 */
  readonly dtstart: string;
  readonly timezone: string;
  readonly durationMinutes: number;
  readonly until?: string;
  readonly exdates?: readonly string[];
  readonly maxCount?: number;
  readonly difficulty: Difficulty;
  readonly whyLlmsFail?: string;
  readonly resolution: Resolution;
}

/** 题库 JSON 中的原始记录 */
export interface ChallengeDefinition {
  id: string;
  name: string;
  question: string;
  rrule: string;
  dtstart: string;
  timezone: string;
  duration_minutes: number;
  until?: string;
  exdates?: string[];
  max_count?: number;
  difficulty: Difficulty;
  why_llms_fail?: string;
  verification_mode?: 'engine' | 'hardcoded';
  correct_answer?: string[];
}

export interface ComparisonVerdict {
  correct: boolean;
  expectedCount: number;
  actualCount: number;
  matching: number;
  missing: string[];
  extra: string[];
}

export type OutcomeKind = 'success' | 'resolution_failure' | 'invocation_failure' | 'parse_failure';

export interface EvaluationResult extends ComparisonVerdict {
  id: string;
  name: string;
  difficulty: Difficulty;
  outcome: OutcomeKind;
  expected: string[];
  actual: string[];
  /** 模型原始输出；失败行为 `ERROR: <原因>` */
  rawResponse: string;
}

export interface RunReport {
  model: string;
  provider: string;
  timestamp: string;
  passed: number;
  total: number;
  score: string;
  results: EvaluationResult[];
}

export interface RunArtifactEntry {
  id: string;
  name: string;
  difficulty: Difficulty;
  outcome: OutcomeKind;
  expected: string[];
  actual: string[];
  raw_response: string;
  correct: boolean;
  expected_count: number;
  actual_count: number;
  matching: number;
  missing: string[];
  extra: string[];
}

/** 持久化到磁盘的运行结果 */
export interface RunArtifact {
  model: string;
  provider: string;
  timestamp: string;
  score: string;
  challenges: RunArtifactEntry[];
}
