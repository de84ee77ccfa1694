import { Logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import { formatVerification } from '../gauntlet/gauntlet-report';
import { createRegistry, createResolver, writeJsonFile } from './context';

export interface VerifyOptions {
  verbose?: boolean;
  output?: string;
  challenges?: string;
}

/**
 * CLI 命令：rrule-gauntlet verify
 * 用 Truth Engine 重新计算所有题目的标准答案
 */
export async function verifyCommand(options: VerifyOptions): Promise<void> {
  const config = ConfigManager.getConfig();
  const registry = createRegistry(config, options.challenges);
  const challenges = registry.load();
  const resolver = createResolver(config);

  Logger.brand();
  Logger.highlight('  Verifying challenges against Truth Engine...\n');

  const outcomes = await resolver.resolveAll(challenges);
  const answers = new Map<string, string[]>();
  let errors = 0;

  for (const outcome of outcomes) {
    for (const line of formatVerification(outcome, options.verbose)) {
      Logger.text(line);
    }
    if (outcome.ok) {
      answers.set(outcome.challenge.id, outcome.answer);
    } else {
      errors++;
    }
  }

  if (errors > 0) {
    Logger.error(`${errors} challenge(s) failed verification.`);
    process.exitCode = 1;
    return;
  }

  if (options.output) {
    const target = writeJsonFile(options.output, registry.toDefinitions(answers));
    Logger.success(`Written to ${target}`);
  }
}
