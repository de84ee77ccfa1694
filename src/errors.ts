/**
 * Gauntlet 错误体系
 * 所有错误继承 GauntletError，携带类型化的错误码
 *
 * 只有 REGISTRY_LOAD 与 CONFIGURATION 会中断整个运行，
 * 其余错误按题目捕获并转为失败结果行
 */

export const GauntletErrorCode = {
  REGISTRY_LOAD: 'REGISTRY_LOAD',
  TRUTH_RESOLUTION: 'TRUTH_RESOLUTION',
  AGENT_INVOCATION: 'AGENT_INVOCATION',
  RESPONSE_PARSE: 'RESPONSE_PARSE',
  CONFIGURATION: 'CONFIGURATION',
} as const;

export type GauntletErrorCode = (typeof GauntletErrorCode)[keyof typeof GauntletErrorCode];

export class GauntletError extends Error {
  readonly code: GauntletErrorCode;

  constructor(code: GauntletErrorCode, message: string) {
    super(message);
    this.name = 'GauntletError';
    this.code = code;
  }
}

/** 题库文件缺失或格式错误 */
export class RegistryLoadError extends GauntletError {
  constructor(message: string) {
    super(GauntletErrorCode.REGISTRY_LOAD, message);
    this.name = 'RegistryLoadError';
  }
}

/** Truth Engine 展开失败（规则非法、语法不支持、时区错误等） */
export class TruthResolutionError extends GauntletError {
  readonly challengeId: string;

  constructor(challengeId: string, cause: string) {
    super(GauntletErrorCode.TRUTH_RESOLUTION, cause);
    this.name = 'TruthResolutionError';
    this.challengeId = challengeId;
  }
}

/** 模型调用失败（网络、鉴权、服务商错误） */
export class AgentInvocationError extends GauntletError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(GauntletErrorCode.AGENT_INVOCATION, message);
    this.name = 'AgentInvocationError';
    this.status = status;
  }
}

/** 模型输出中无法恢复出字符串数组 */
export class ResponseParseError extends GauntletError {
  constructor(message: string) {
    super(GauntletErrorCode.RESPONSE_PARSE, message);
    this.name = 'ResponseParseError';
  }
}

/** 未知 provider、未知题目 id、缺少 API 密钥 */
export class ConfigurationError extends GauntletError {
  constructor(message: string) {
    super(GauntletErrorCode.CONFIGURATION, message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
