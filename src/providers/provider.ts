import { Message, ChatResponse } from '../types';

/**
 * AI Provider 统一接口
 * 抽象不同 AI 服务商的调用差异
 */
export interface AIProvider {
  /** 普通（非流式）调用 */
  chat(messages: Message[]): Promise<ChatResponse>;
}
