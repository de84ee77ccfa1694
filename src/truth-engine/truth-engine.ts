/**
 * Truth Engine 展开请求
 * dtstart / until 为题目时区下的本地时间
 */
export interface ExpansionRequest {
  rrule: string;
  dtstart: string;
  durationMinutes: number;
  timezone: string;
  until?: string;
  maxCount?: number;
}

export interface ExpandedEvent {
  /** UTC 开始时间 */
  start: string;
  end?: string;
}

/**
 * Truth Engine 能力接口
 * 按时间顺序返回展开后的事件，失败时 reject
 */
export interface TruthEngine {
  expand(request: ExpansionRequest): Promise<ExpandedEvent[]>;
}
