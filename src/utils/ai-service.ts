import Anthropic from '@anthropic-ai/sdk';
import axios from 'axios';
import { AgentInvocationError, ConfigurationError, errorMessage } from '../errors';
import { AgentRequest, ChatConfig, ChatResponse, GauntletConfig, ProviderKind, ReasoningAgent } from '../types';
import { AIProvider } from '../providers/provider';
import { AnthropicProvider } from '../providers/anthropic-provider';
import { OpenAIProvider } from '../providers/openai-provider';
import { ConfigManager } from './config';
import { Logger } from './logger';

/** 可重试的 HTTP 状态码 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504, 529]);
const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'ENOTFOUND', 'EAI_AGAIN'];
const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export type ProviderFactory = (kind: ProviderKind, config: ChatConfig) => AIProvider;

export interface AIServiceOptions {
  providerFactory?: ProviderFactory;
  maxRetries?: number;
  baseDelayMs?: number;
}

function defaultProviderFactory(kind: ProviderKind, config: ChatConfig): AIProvider {
  if (kind === 'anthropic') {
    return new AnthropicProvider(config);
  }
  return new OpenAIProvider(config);
}

/**
 * 从错误中提取 HTTP 状态码
 */
export function extractStatus(error: unknown): number | null {
  if (axios.isAxiosError(error)) {
    return error.response?.status ?? null;
  }
  if (error instanceof Anthropic.APIError) {
    return typeof error.status === 'number' ? error.status : null;
  }
  return null;
}

/**
 * 判断错误是否可重试
 */
export function isRetryable(error: unknown): boolean {
  const status = extractStatus(error);
  if (status && RETRYABLE_STATUS_CODES.has(status)) {
    return true;
  }

  if (axios.isAxiosError(error)) {
    const code = String(error.code || '').toUpperCase();
    if (RETRYABLE_NETWORK_CODES.includes(code)) {
      return true;
    }
  }

  if (error instanceof Anthropic.APIConnectionError) {
    return true;
  }

  return /timeout|timed out|socket hang up|network error|fetch failed|premature close|ECONNREFUSED/i
    .test(errorMessage(error));
}

/**
 * 从错误中提取 Retry-After 头（秒）
 */
function getRetryAfter(error: unknown): number | null {
  let raw: unknown;
  if (axios.isAxiosError(error)) {
    raw = error.response?.headers?.['retry-after'];
  } else if (error instanceof Anthropic.APIError) {
    raw = error.headers?.['retry-after'];
  }
  if (typeof raw === 'string') {
    const seconds = parseInt(raw, 10);
    if (!isNaN(seconds)) return seconds;
  }
  return null;
}

/**
 * 服务商原始错误信息
 */
function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (data && typeof data === 'object' && 'error' in data) {
      const inner: unknown = data.error;
      if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
      }
    }
  }
  return errorMessage(error);
}

/**
 * AI 服务 - 推理 Agent 的统一调用入口
 * 内部委托给对应的 Provider 实现，带指数退避重试
 */
export class AIService implements ReasoningAgent {
  private config: GauntletConfig;
  private providerFactory: ProviderFactory;
  private providers = new Map<string, AIProvider>();
  private maxRetries: number;
  private baseDelayMs: number;

  constructor(config: GauntletConfig = ConfigManager.getConfig(), options: AIServiceOptions = {}) {
    this.config = config;
    this.providerFactory = options.providerFactory ?? defaultProviderFactory;
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  }

  /**
   * 运行前检查：provider 的 API 密钥必须已配置
   */
  ensureConfigured(kind: ProviderKind): void {
    if (!this.config.providers[kind].apiKey) {
      const envName = kind === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
      throw new ConfigurationError(`${kind} 的 API密钥未配置。请设置环境变量 ${envName}`);
    }
  }

  private getProvider(kind: ProviderKind, model: string): AIProvider {
    const key = `${kind}/${model}`;
    const cached = this.providers.get(key);
    if (cached) return cached;

    this.ensureConfigured(kind);
    const settings = this.config.providers[kind];
    const provider = this.providerFactory(kind, {
      apiKey: settings.apiKey || '',
      apiUrl: settings.apiUrl,
      model,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });
    this.providers.set(key, provider);
    return provider;
  }

  async invoke(request: AgentRequest): Promise<string> {
    const provider = this.getProvider(request.provider, request.model);

    let response: ChatResponse;
    try {
      response = await this.withRetry(
        () => provider.chat([
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ]),
        request,
      );
    } catch (error) {
      throw this.wrapError(error, request);
    }

    if (!response.content) {
      throw new AgentInvocationError(`模型返回空内容 | Provider: ${request.provider} | Model: ${request.model}`);
    }
    return response.content;
  }

  /**
   * 统一错误处理
   */
  private wrapError(error: unknown, request: AgentRequest): AgentInvocationError {
    Logger.debug(`API调用失败 | Provider: ${request.provider} | Model: ${request.model}`);

    const status = extractStatus(error);
    const message = describeError(error);
    if (status) {
      return new AgentInvocationError(`API错误 (${status}): ${message}`, status);
    }
    return new AgentInvocationError(`请求失败: ${message}`);
  }

  /**
   * 带指数退避的重试包装器
   */
  private async withRetry<T>(fn: () => Promise<T>, request: AgentRequest): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.maxRetries || !isRetryable(error)) {
          throw error;
        }

        // 计算等待时间：优先用 Retry-After，否则指数退避
        const retryAfter = getRetryAfter(error);
        const delay = retryAfter
          ? retryAfter * 1000
          : this.baseDelayMs * Math.pow(2, attempt) + Math.random() * (this.baseDelayMs / 2);

        const status = extractStatus(error) ?? 'network';
        Logger.warning(
          `API 调用失败 (${status})，${delay.toFixed(0)}ms 后重试 (${attempt + 1}/${this.maxRetries})... `
          + `[${request.provider}/${request.model}]`
        );

        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }
}
