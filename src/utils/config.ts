import * as dotenv from 'dotenv';
import { ConfigurationError } from '../errors';
import { GauntletConfig, PROVIDER_KINDS, ProviderKind } from '../types';

// 加载环境变量（静默模式）
dotenv.config({ quiet: true });

const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1/chat/completions';
const DEFAULT_ANTHROPIC_URL = 'https://api.anthropic.com';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TRUTH_TIMEOUT_SECONDS = 30;

function readPositiveInt(name: string, fallback: number): number {
  const raw = (process.env[name] || '').trim();
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    throw new ConfigurationError(`${name}=${raw} 不是正整数`);
  }
  return value;
}

function readOptional(name: string): string | undefined {
  const value = (process.env[name] || '').trim();
  return value || undefined;
}

function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some(kind => kind === value);
}

/**
 * 解析 provider 标识，未知标识属于配置错误
 */
export function parseProviderKind(raw: string): ProviderKind {
  const normalized = raw.trim().toLowerCase();
  if (!isProviderKind(normalized)) {
    throw new ConfigurationError(`未知 provider: ${raw}，仅支持 ${PROVIDER_KINDS.join('/')}`);
  }
  return normalized;
}

export class ConfigManager {
  static getConfig(): GauntletConfig {
    return {
      providers: {
        openai: {
          apiKey: readOptional('OPENAI_API_KEY'),
          apiUrl: readOptional('OPENAI_API_BASE') || DEFAULT_OPENAI_URL,
        },
        anthropic: {
          apiKey: readOptional('ANTHROPIC_API_KEY'),
          apiUrl: readOptional('ANTHROPIC_BASE_URL') || DEFAULT_ANTHROPIC_URL,
        },
      },
      temperature: 0,
      maxTokens: readPositiveInt('GAUNTLET_MAX_TOKENS', DEFAULT_MAX_TOKENS),
      truthEngine: {
        python: readOptional('GAUNTLET_PYTHON') || 'python3',
        scriptPath: readOptional('GAUNTLET_TRUTH_SCRIPT'),
        timeoutSeconds: readPositiveInt('GAUNTLET_TRUTH_TIMEOUT', DEFAULT_TRUTH_TIMEOUT_SECONDS),
      },
      challengesPath: readOptional('GAUNTLET_CHALLENGES'),
    };
  }
}
