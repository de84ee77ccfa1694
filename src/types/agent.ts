import { ProviderKind } from './index';

/**
 * 一次推理调用
 */
export interface AgentRequest {
  system: string;
  prompt: string;
  provider: ProviderKind;
  model: string;
}

/**
 * 被评测的推理 Agent
 * 返回模型原始文本，失败时 reject（AgentInvocationError）
 */
export interface ReasoningAgent {
  invoke(request: AgentRequest): Promise<string>;
}
