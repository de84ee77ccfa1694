import chalk from 'chalk';
import { Difficulty } from '../gauntlet/gauntlet-types';

export const theme = {
  // 功能色
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.dim,
};

// 样式组合
export const styles = {
  title: (text: string) => chalk.bold(text),

  subtitle: (text: string) => theme.dim(text),

  text: (text: string) => text,

  highlight: (text: string) => theme.info(text),

  success: (text: string) => theme.success(`✓ ${text}`),

  error: (text: string) => theme.error(`✗ ${text}`),

  warning: (text: string) => theme.warning(`⚠ ${text}`),

  info: (text: string) => theme.info(`ℹ ${text}`),

  // 结果标签
  pass: () => theme.success('PASS'),
  fail: () => theme.error('FAIL'),
  ok: () => theme.success(' OK '),
  err: () => theme.error('ERR '),

  // 难度配色
  difficulty: (level: Difficulty) => {
    if (level === 'Easy') return theme.success(level);
    if (level === 'Medium') return theme.warning(level);
    return theme.error(level);
  },
};
