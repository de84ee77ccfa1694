import { errorMessage } from '../errors';
import { ProviderKind, ReasoningAgent } from '../types';
import { compareAnswers } from './comparator';
import { Challenge, EvaluationResult, OutcomeKind, RunReport } from './gauntlet-types';
import { GroundTruthResolver } from './ground-truth';
import { SYSTEM_PROMPT, buildPrompt } from './prompt-builder';
import { parseAgentResponse } from './response-parser';

export interface RunOptions {
  provider: ProviderKind;
  model: string;
}

export interface RunCallbacks {
  onChallengeStart?: (challenge: Challenge, index: number, total: number) => void;
  onChallengeEnd?: (challenge: Challenge, result: EvaluationResult) => void;
}

export function formatScore(passed: number, total: number): string {
  return `${passed}/${total}`;
}

function failedResult(
  challenge: Challenge,
  outcome: Exclude<OutcomeKind, 'success'>,
  expected: string[],
  cause: string,
): EvaluationResult {
  return {
    id: challenge.id,
    name: challenge.name,
    difficulty: challenge.difficulty,
    outcome,
    expected,
    actual: [],
    rawResponse: `ERROR: ${cause}`,
    correct: false,
    expectedCount: expected.length,
    actualCount: 0,
    matching: 0,
    missing: [...expected],
    extra: [],
  };
}

/**
 * Gauntlet 评测主循环
 *
 * 逐题串行：解析标准答案 → 构建提示词 → 调用模型 → 解析输出 → 比较。
 * 任何单题失败都记为失败行，不会中断整批评测。
 */
export class GauntletRunner {
  private resolver: GroundTruthResolver;
  private agent: ReasoningAgent;

  constructor(resolver: GroundTruthResolver, agent: ReasoningAgent) {
    this.resolver = resolver;
    this.agent = agent;
  }

  async run(
    challenges: readonly Challenge[],
    options: RunOptions,
    callbacks: RunCallbacks = {},
  ): Promise<RunReport> {
    const results: EvaluationResult[] = [];
    let passed = 0;

    for (const [index, challenge] of challenges.entries()) {
      callbacks.onChallengeStart?.(challenge, index, challenges.length);

      const result = await this.evaluate(challenge, options);
      if (result.correct) passed++;
      results.push(result);

      callbacks.onChallengeEnd?.(challenge, result);
    }

    return {
      model: options.model,
      provider: options.provider,
      timestamp: new Date().toISOString(),
      passed,
      total: challenges.length,
      score: formatScore(passed, challenges.length),
      results,
    };
  }

  private async evaluate(challenge: Challenge, options: RunOptions): Promise<EvaluationResult> {
    let expected: string[];
    try {
      expected = (await this.resolver.ensureAnswer(challenge)).answer;
    } catch (error) {
      return failedResult(challenge, 'resolution_failure', [], errorMessage(error));
    }

    let rawResponse: string;
    try {
      rawResponse = await this.agent.invoke({
        system: SYSTEM_PROMPT,
        prompt: buildPrompt(challenge),
        provider: options.provider,
        model: options.model,
      });
    } catch (error) {
      return failedResult(challenge, 'invocation_failure', expected, errorMessage(error));
    }

    let actual: string[];
    try {
      actual = parseAgentResponse(rawResponse);
    } catch (error) {
      return failedResult(challenge, 'parse_failure', expected, errorMessage(error));
    }

    return {
      id: challenge.id,
      name: challenge.name,
      difficulty: challenge.difficulty,
      outcome: 'success',
      expected,
      actual,
      rawResponse,
      ...compareAnswers(expected, actual),
    };
  }
}
