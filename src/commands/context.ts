import * as fs from 'fs';
import * as path from 'path';
import { ChallengeRegistry, DEFAULT_CHALLENGES_PATH } from '../gauntlet/challenge-registry';
import { GroundTruthResolver } from '../gauntlet/ground-truth';
import { PythonTruthEngine } from '../truth-engine/python-truth-engine';
import { GauntletConfig } from '../types';

/**
 * 题库路径优先级：命令行参数 → GAUNTLET_CHALLENGES → 内置题库
 */
export function createRegistry(config: GauntletConfig, challengesOption?: string): ChallengeRegistry {
  const filePath = challengesOption || config.challengesPath;
  return new ChallengeRegistry(filePath ? path.resolve(filePath) : DEFAULT_CHALLENGES_PATH);
}

export function createResolver(config: GauntletConfig): GroundTruthResolver {
  return new GroundTruthResolver(new PythonTruthEngine({
    python: config.truthEngine.python,
    scriptPath: config.truthEngine.scriptPath,
    timeoutSeconds: config.truthEngine.timeoutSeconds,
  }));
}

export function writeJsonFile(filePath: string, data: unknown): string {
  const target = path.resolve(filePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return target;
}
