export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string | null;
}

export const PROVIDER_KINDS = ['openai', 'anthropic'] as const;

export type ProviderKind = (typeof PROVIDER_KINDS)[number];

/**
 * 单个 Provider 的调用参数
 */
export interface ChatConfig {
  apiKey: string;
  apiUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface ChatResponse {
  content: string | null;
}

export interface ProviderSettings {
  apiKey?: string;
  apiUrl: string;
}

export interface GauntletConfig {
  providers: Record<ProviderKind, ProviderSettings>;
  /** 评测固定 0，保证结果可复现 */
  temperature: number;
  maxTokens: number;
  truthEngine: {
    python: string;
    /** 展开脚本路径，未设置时使用内置脚本 */
    scriptPath?: string;
    timeoutSeconds: number;
  };
  challengesPath?: string;
}

// 导出 Agent 相关类型
export * from './agent';
