import axios from 'axios';
import { Message, ChatConfig, ChatResponse } from '../types';
import { AIProvider } from './provider';

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * OpenAI Provider
 * 兼容所有 OpenAI Chat Completions 格式的服务（OpenAI、本地 LLM 等）
 */
export class OpenAIProvider implements AIProvider {
  private apiUrl: string;
  private apiKey: string;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(config: ChatConfig) {
    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
  }

  private buildRequestBody(messages: Message[]) {
    return {
      model: this.model,
      messages: messages.map(message => ({
        role: message.role,
        content: message.content ?? '',
      })),
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };
  }

  private get headers() {
    return {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${this.apiKey}`,
    };
  }

  async chat(messages: Message[]): Promise<ChatResponse> {
    const response = await axios.post<ChatCompletionResponse>(
      this.apiUrl,
      this.buildRequestBody(messages),
      { headers: this.headers },
    );
    const message = response.data.choices?.[0]?.message;
    return { content: message?.content || null };
  }
}
