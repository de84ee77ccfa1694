import { spawn } from 'child_process';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { ExpandedEvent, ExpansionRequest, TruthEngine } from './truth-engine';

export const DEFAULT_EXPAND_SCRIPT = path.resolve(__dirname, '../../scripts/expand_rrule.py');

const DEFAULT_TIMEOUT_SECONDS = 30;

const engineOutputSchema = z.discriminatedUnion('success', [
  z.object({
    success: z.literal(true),
    data: z.array(z.object({ start: z.string(), end: z.string().optional() }).passthrough()),
  }),
  z.object({
    success: z.literal(false),
    error: z.string().optional(),
  }),
]);

export interface PythonTruthEngineOptions {
  /** 解释器路径，默认 python3 */
  python?: string;
  scriptPath?: string;
  timeoutSeconds?: number;
}

/**
 * 通过子进程调用 Python 版 Truth Engine
 *
 * 流程：请求 JSON 写入 stdin → 读取 stdout → 解析 { success, data | error }
 */
export class PythonTruthEngine implements TruthEngine {
  private python: string;
  private scriptPath: string;
  private timeoutMs: number;

  constructor(options: PythonTruthEngineOptions = {}) {
    this.python = options.python || 'python3';
    this.scriptPath = options.scriptPath || DEFAULT_EXPAND_SCRIPT;
    this.timeoutMs = (options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
  }

  expand(request: ExpansionRequest): Promise<ExpandedEvent[]> {
    const inputJson = JSON.stringify({
      rrule: request.rrule,
      dtstart: request.dtstart,
      duration_minutes: request.durationMinutes,
      timezone: request.timezone,
      until: request.until ?? null,
      max_count: request.maxCount ?? null,
    });

    return new Promise<ExpandedEvent[]>((resolve, reject) => {
      const child = spawn(this.python, [this.scriptPath], {
        env: { ...process.env, PYTHONIOENCODING: 'utf-8' },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (error: Error | null, events?: ExpandedEvent[]) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) reject(error);
        else resolve(events ?? []);
      };

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString('utf-8');
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString('utf-8');
      });

      const timer = setTimeout(() => {
        child.kill('SIGTERM');
        finish(new Error(`Truth Engine 执行超时（${this.timeoutMs / 1000}s）`));
      }, this.timeoutMs);

      child.on('close', (code) => {
        if (stderr) {
          Logger.debug(`[TruthEngine] stderr: ${stderr.substring(0, 500)}`);
        }

        if (!stdout.trim()) {
          finish(new Error(`Truth Engine 无输出（exit code: ${code}）`));
          return;
        }

        let output: unknown;
        try {
          output = JSON.parse(stdout);
        } catch {
          finish(new Error(`Truth Engine 输出不是 JSON: ${stdout.trim().substring(0, 200)}`));
          return;
        }

        const parsed = engineOutputSchema.safeParse(output);
        if (!parsed.success) {
          finish(new Error(`Truth Engine 输出格式错误: ${parsed.error.issues[0]?.message ?? 'unknown'}`));
          return;
        }

        if (parsed.data.success) {
          finish(null, parsed.data.data.map(e => ({ start: e.start, end: e.end })));
        } else {
          finish(new Error(parsed.data.error || '未知错误'));
        }
      });

      child.on('error', (err) => {
        finish(new Error(`Truth Engine 启动失败: ${err.message}`));
      });

      // 子进程提前退出时写入 stdin 会 EPIPE，结果以 close 事件为准
      child.stdin.on('error', (err) => {
        Logger.debug(`[TruthEngine] stdin: ${err.message}`);
      });
      child.stdin.write(inputJson);
      child.stdin.end();
    });
  }
}
