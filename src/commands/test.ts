import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../utils/logger';
import { ConfigManager, parseProviderKind } from '../utils/config';
import { AIService } from '../utils/ai-service';
import { GauntletRunner } from '../gauntlet/gauntlet-runner';
import { RunReport } from '../gauntlet/gauntlet-types';
import {
  formatChallengeResult,
  formatSummary,
  generateMarkdownReport,
  toRunArtifact,
} from '../gauntlet/gauntlet-report';
import { createRegistry, createResolver, writeJsonFile } from './context';

export interface TestOptions {
  model: string;
  provider: string;
  challenge?: string;
  challenges?: string;
  output?: string;
  markdown?: string;
  verbose?: boolean;
}

/**
 * CLI 命令：rrule-gauntlet test
 * 让模型逐题作答并打分
 */
export async function testCommand(options: TestOptions): Promise<void> {
  // 配置错误在评测开始前抛出
  const provider = parseProviderKind(options.provider);
  const config = ConfigManager.getConfig();
  const agent = new AIService(config);
  agent.ensureConfigured(provider);

  const registry = createRegistry(config, options.challenges);
  const target = registry.select(options.challenge);
  const whyById = new Map(target.map(ch => [ch.id, ch.whyLlmsFail]));

  Logger.openLogFile('test', options.model);
  Logger.brand();
  Logger.highlight(`  Model: ${options.model} (${provider})`);
  Logger.highlight(`  Challenges: ${target.length}\n`);

  const runner = new GauntletRunner(createResolver(config), agent);

  let report: RunReport;
  try {
    report = await runner.run(target, { provider, model: options.model }, {
      onChallengeStart: (ch, index, total) => {
        Logger.startProgress(`[${index + 1}/${total}] ${ch.name} ...`);
      },
      onChallengeEnd: (ch, result) => {
        Logger.stopProgress();
        const lines = formatChallengeResult(result, {
          verbose: options.verbose,
          whyLlmsFail: whyById.get(ch.id),
        });
        for (const line of lines) Logger.text(line);
        Logger.debug(`[${ch.id}] raw response: ${result.rawResponse}`);
      },
    });
  } finally {
    Logger.stopProgress();
  }

  Logger.text('');
  for (const line of formatSummary(report.passed, report.total)) {
    Logger.text(line);
  }
  Logger.text('');

  if (options.output) {
    const savedPath = writeJsonFile(options.output, toRunArtifact(report));
    Logger.success(`Results saved to ${savedPath}`);
  }

  if (options.markdown) {
    const mdPath = path.resolve(options.markdown);
    fs.mkdirSync(path.dirname(mdPath), { recursive: true });
    fs.writeFileSync(mdPath, generateMarkdownReport(report), 'utf-8');
    Logger.success(`Markdown: ${mdPath}`);
  }

  const logPath = Logger.getLogFilePath();
  if (logPath) Logger.info(`Log: ${logPath}`);
  Logger.closeLogFile();

  // 标准答案都无法获得的题目说明题库本身有问题
  const unresolved = report.results.filter(r => r.outcome === 'resolution_failure').length;
  if (unresolved > 0) {
    Logger.error(`${unresolved} challenge(s) failed verification.`);
    process.exitCode = 1;
  }
}
