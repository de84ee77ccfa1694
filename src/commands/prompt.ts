import { Logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import { SYSTEM_PROMPT, buildPrompt } from '../gauntlet/prompt-builder';
import { createRegistry } from './context';

export interface PromptOptions {
  challenge?: string;
  challenges?: string;
  system?: boolean;
}

/**
 * CLI 命令：rrule-gauntlet prompt
 * 打印题目提示词，方便手动粘贴到任意聊天界面
 */
export function promptCommand(options: PromptOptions): void {
  const config = ConfigManager.getConfig();
  const registry = createRegistry(config, options.challenges);
  const target = registry.select(options.challenge);

  const rule = '='.repeat(60);

  if (options.system) {
    Logger.text(`\n${rule}\nSystem prompt\n${rule}`);
    Logger.text(SYSTEM_PROMPT);
  }

  for (const ch of target) {
    Logger.text(`\n${rule}`);
    Logger.text(`Challenge: ${ch.name} (difficulty: ${ch.difficulty})`);
    Logger.text(rule);
    Logger.text(buildPrompt(ch));
  }
}
