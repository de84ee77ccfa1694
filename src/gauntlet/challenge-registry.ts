import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, RegistryLoadError, errorMessage } from '../errors';
import { Challenge, ChallengeDefinition, DIFFICULTIES, Resolution } from './gauntlet-types';

export const DEFAULT_CHALLENGES_PATH = path.resolve(__dirname, '../../challenges/challenges.json');

const MAX_REPORTED_ISSUES = 3;

const challengeDefinitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    question: z.string().min(1),
    rrule: z.string().min(1),
    dtstart: z.string().min(1),
    timezone: z.string().min(1),
    duration_minutes: z.number().int().nonnegative(),
    until: z.string().min(1).optional(),
    exdates: z.array(z.string()).optional(),
    max_count: z.number().int().positive().optional(),
    difficulty: z.enum(DIFFICULTIES),
    why_llms_fail: z.string().optional(),
    verification_mode: z.enum(['engine', 'hardcoded']).optional(),
    correct_answer: z.array(z.string()).optional(),
  })
  .refine(def => def.verification_mode !== 'hardcoded' || def.correct_answer !== undefined, {
    message: 'verification_mode 为 hardcoded 时必须提供 correct_answer',
    path: ['correct_answer'],
  });

const definitionsSchema = z.array(challengeDefinitionSchema);

function toResolution(def: ChallengeDefinition): Resolution {
  if (def.verification_mode === 'hardcoded' && def.correct_answer) {
    return { mode: 'precomputed', answer: [...def.correct_answer] };
  }
  const cachedAnswer = def.correct_answer ? [...def.correct_answer] : undefined;
  return def.verification_mode === 'engine'
    ? { mode: 'computed', cachedAnswer, declared: true }
    : { mode: 'computed', cachedAnswer };
}

function toChallenge(def: ChallengeDefinition): Challenge {
  const resolution = toResolution(def);

  return Object.freeze({
    id: def.id,
    name: def.name,
    question: def.question,
    rrule: def.rrule,
    dtstart: def.dtstart,
    timezone: def.timezone,
    durationMinutes: def.duration_minutes,
    until: def.until,
    exdates: def.exdates ? [...def.exdates] : undefined,
    maxCount: def.max_count,
    difficulty: def.difficulty,
    whyLlmsFail: def.why_llms_fail,
    resolution,
  });
}

function toDefinition(challenge: Challenge, answer?: readonly string[]): ChallengeDefinition {
  const def: ChallengeDefinition = {
    id: challenge.id,
    name: challenge.name,
    question: challenge.question,
    rrule: challenge.rrule,
    dtstart: challenge.dtstart,
    timezone: challenge.timezone,
    duration_minutes: challenge.durationMinutes,
    difficulty: challenge.difficulty,
  };

  if (challenge.until !== undefined) def.until = challenge.until;
  if (challenge.exdates !== undefined) def.exdates = [...challenge.exdates];
  if (challenge.maxCount !== undefined) def.max_count = challenge.maxCount;
  if (challenge.whyLlmsFail !== undefined) def.why_llms_fail = challenge.whyLlmsFail;

  const { resolution } = challenge;
  if (resolution.mode === 'precomputed') {
    def.verification_mode = 'hardcoded';
    def.correct_answer = [...(answer ?? resolution.answer)];
  } else {
    if (resolution.declared) def.verification_mode = 'engine';
    const stored = answer ?? resolution.cachedAnswer;
    if (stored) def.correct_answer = [...stored];
  }

  return def;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, MAX_REPORTED_ISSUES)
    .map(issue => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * 题库
 * 从单一 JSON 文件加载，加载后只读
 */
export class ChallengeRegistry {
  private filePath: string;
  private challenges: readonly Challenge[] | null = null;

  constructor(filePath: string = DEFAULT_CHALLENGES_PATH) {
    this.filePath = filePath;
  }

  load(): readonly Challenge[] {
    if (this.challenges) return this.challenges;

    if (!fs.existsSync(this.filePath)) {
      throw new RegistryLoadError(`未找到题库文件: ${this.filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new RegistryLoadError(`题库文件不是合法 JSON (${this.filePath}): ${errorMessage(error)}`);
    }

    const parsed = definitionsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RegistryLoadError(`题库格式错误 (${this.filePath}): ${formatIssues(parsed.error)}`);
    }

    const seen = new Set<string>();
    for (const def of parsed.data) {
      if (seen.has(def.id)) {
        throw new RegistryLoadError(`题目 id 重复: ${def.id}`);
      }
      seen.add(def.id);
    }

    this.challenges = Object.freeze(parsed.data.map(toChallenge));
    return this.challenges;
  }

  /**
   * 选择题目：不传 id 返回全部，id 不存在时抛出 ConfigurationError
   */
  select(id?: string): readonly Challenge[] {
    const all = this.load();
    if (!id) return all;

    const found = all.filter(ch => ch.id === id);
    if (found.length === 0) {
      throw new ConfigurationError(
        `题目 '${id}' 不存在。可用: ${all.map(ch => ch.id).join(', ')}`
      );
    }
    return found;
  }

  /**
   * 生成可写回磁盘的题库记录，answers 中的答案覆盖原 correct_answer
   */
  toDefinitions(answers: ReadonlyMap<string, readonly string[]> = new Map()): ChallengeDefinition[] {
    return this.load().map(ch => toDefinition(ch, answers.get(ch.id)));
  }
}
