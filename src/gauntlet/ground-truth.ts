import { TruthResolutionError, errorMessage } from '../errors';
import { TruthEngine } from '../truth-engine/truth-engine';
import { Challenge } from './gauntlet-types';

export type AnswerSource = 'precomputed' | 'engine' | 'cached';

export type ResolutionOutcome =
  | { challenge: Challenge; ok: true; answer: string[]; source: AnswerSource }
  | { challenge: Challenge; ok: false; error: TruthResolutionError };

/**
 * 标准答案解析器
 */
export class GroundTruthResolver {
  private engine: TruthEngine;

  constructor(engine: TruthEngine) {
    this.engine = engine;
  }

  /**
   * 获取标准答案：precomputed 题直接返回题库答案，其余交给 Truth Engine
   * 引擎的任何失败都包装为 TruthResolutionError
   */
  async resolve(challenge: Challenge): Promise<string[]> {
    const { resolution } = challenge;
    if (resolution.mode === 'precomputed') {
      return [...resolution.answer];
    }

    try {
      const events = await this.engine.expand({
        rrule: challenge.rrule,
        dtstart: challenge.dtstart,
        durationMinutes: challenge.durationMinutes,
        timezone: challenge.timezone,
        until: challenge.until,
        maxCount: challenge.maxCount,
      });
      return events.map(e => e.start);
    } catch (error) {
      throw new TruthResolutionError(challenge.id, errorMessage(error));
    }
  }

  /**
   * 逐题解析，单题失败不影响其他题目
   */
  async resolveAll(challenges: readonly Challenge[]): Promise<ResolutionOutcome[]> {
    const outcomes: ResolutionOutcome[] = [];
    for (const challenge of challenges) {
      try {
        const answer = await this.resolve(challenge);
        const source: AnswerSource = challenge.resolution.mode === 'precomputed' ? 'precomputed' : 'engine';
        outcomes.push({ challenge, ok: true, answer, source });
      } catch (error) {
        const wrapped = error instanceof TruthResolutionError
          ? error
          : new TruthResolutionError(challenge.id, errorMessage(error));
        outcomes.push({ challenge, ok: false, error: wrapped });
      }
    }
    return outcomes;
  }

  /**
   * 运行前确保有答案：题库答案 → verify 缓存 → 现场解析
   */
  async ensureAnswer(challenge: Challenge): Promise<{ answer: string[]; source: AnswerSource }> {
    const { resolution } = challenge;
    if (resolution.mode === 'precomputed') {
      return { answer: [...resolution.answer], source: 'precomputed' };
    }
    if (resolution.cachedAnswer && resolution.cachedAnswer.length > 0) {
      return { answer: [...resolution.cachedAnswer], source: 'cached' };
    }
    return { answer: await this.resolve(challenge), source: 'engine' };
  }
}
