#!/usr/bin/env node

import { Command } from 'commander';
import { Logger } from './utils/logger';
import { GauntletError } from './errors';
import { verifyCommand } from './commands/verify';
import { promptCommand } from './commands/prompt';
import { testCommand } from './commands/test';

async function main() {
  const program = new Command();

  program
    .name('rrule-gauntlet')
    .description('RRULE Gauntlet - 用日历递归规则难题评测大模型')
    .version('0.1.0');

  // 校验题库
  program
    .command('verify')
    .description('用 Truth Engine 校验所有题目的标准答案')
    .option('-v, --verbose', '输出每个事件的 UTC 时间')
    .option('-o, --output <file>', '校验通过后写出带答案的题库')
    .option('--challenges <file>', '题库 JSON 路径')
    .action(verifyCommand);

  // 打印提示词
  program
    .command('prompt')
    .description('打印题目的提示词')
    .option('--challenge <id>', '指定题目 id')
    .option('--challenges <file>', '题库 JSON 路径')
    .option('--system', '同时打印系统提示词')
    .action(promptCommand);

  // 模型评测
  program
    .command('test')
    .description('让模型挑战 Gauntlet')
    .option('-m, --model <model>', '模型名称', 'gpt-4o')
    .option('-p, --provider <provider>', 'openai 或 anthropic', 'openai')
    .option('--challenge <id>', '指定题目 id')
    .option('--challenges <file>', '题库 JSON 路径')
    .option('-o, --output <file>', '保存 JSON 结果')
    .option('--markdown <file>', '保存 Markdown 报告')
    .option('-v, --verbose', '通过的题目也输出诊断信息')
    .action(testCommand);

  await program.parseAsync();
}

main().catch((err: unknown) => {
  Logger.stopProgress();
  if (err instanceof GauntletError) {
    Logger.error(`[${err.code}] ${err.message}`);
  } else {
    Logger.error(`运行失败: ${err instanceof Error ? err.stack || err.message : String(err)}`);
  }
  Logger.closeLogFile();
  process.exit(1);
});
