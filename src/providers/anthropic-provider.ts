import Anthropic from '@anthropic-ai/sdk';
import { Message, ChatConfig, ChatResponse } from '../types';
import { AIProvider } from './provider';

/**
 * Anthropic Provider
 * 使用官方 SDK
 */
export class AnthropicProvider implements AIProvider {
  private client: Anthropic;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(config: ChatConfig) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: this.normalizeBaseURL(config.apiUrl),
      // 重试由 AIService 统一处理
      maxRetries: 0,
    });
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
  }

  /**
   * 标准化 base URL（去掉末尾的 /v1/messages 等路径）
   */
  private normalizeBaseURL(url: string): string {
    return url.replace(/\/v1\/messages\/?$/, '').replace(/\/v1\/?$/, '');
  }

  /**
   * system 消息合并为顶层 system 参数
   */
  private transformMessages(messages: Message[]): { system?: string; messages: Anthropic.MessageParam[] } {
    const systemPrompt = messages
      .filter(msg => msg.role === 'system')
      .map(msg => msg.content || '')
      .join('\n\n');

    const transformed: Anthropic.MessageParam[] = [];
    for (const msg of messages) {
      if (msg.role === 'user' || msg.role === 'assistant') {
        transformed.push({ role: msg.role, content: msg.content || '' });
      }
    }

    return {
      system: systemPrompt || undefined,
      messages: transformed,
    };
  }

  private parseResponse(response: Anthropic.Message): ChatResponse {
    const texts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') texts.push(block.text);
    }

    return { content: texts.length > 0 ? texts.join('') : null };
  }

  async chat(messages: Message[]): Promise<ChatResponse> {
    const { system, messages: transformed } = this.transformMessages(messages);

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      messages: transformed,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    };

    if (system) params.system = system;

    const response = await this.client.messages.create(params);
    return this.parseResponse(response);
  }
}
