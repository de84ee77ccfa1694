import * as fs from 'fs';
import * as path from 'path';
import { styles } from '../theme/colors';
import ora, { Ora } from 'ora';

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export class Logger {
  private static spinner: Ora | null = null;
  private static logStream: fs.WriteStream | null = null;
  private static logFilePath: string | null = null;

  private static writeToFile(level: string, message: string): void {
    if (!this.logStream) return;
    const now = new Date();
    const ts = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} `
      + `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
    this.logStream.write(`[${ts}] [${level}] ${stripAnsi(message)}\n`);
  }

  /**
   * 打开运行日志：logs/<日期>/<时分秒>_<类型>[_<key>].log
   */
  static openLogFile(sessionType: string, sessionKey?: string): string {
    const now = new Date();
    const dateDir = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
    const safeKey = sessionKey ? sessionKey.replace(/[^A-Za-z0-9._-]/g, '_') : '';
    const suffix = safeKey ? `${sessionType}_${safeKey}` : sessionType;
    const fileName = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}_${suffix}.log`;

    const dir = path.resolve('logs', dateDir);
    fs.mkdirSync(dir, { recursive: true });

    this.logFilePath = path.join(dir, fileName);
    this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
    return this.logFilePath;
  }

  static closeLogFile(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
      this.logFilePath = null;
    }
  }

  static getLogFilePath(): string | null {
    return this.logFilePath;
  }

  static success(message: string): void {
    this.writeToFile('SUCCESS', message);
    console.log(styles.success(message));
  }

  static error(message: string): void {
    this.writeToFile('ERROR', message);
    console.error(styles.error(message));
  }

  static warning(message: string): void {
    this.writeToFile('WARN', message);
    console.warn(styles.warning(message));
  }

  static info(message: string): void {
    this.writeToFile('INFO', message);
    console.log(styles.info(message));
  }

  /**
   * 只写日志文件；设置 GAUNTLET_DEBUG=true 时同时输出到终端
   */
  static debug(message: string): void {
    this.writeToFile('DEBUG', message);
    if (process.env.GAUNTLET_DEBUG === 'true') {
      console.log(styles.subtitle(message));
    }
  }

  static text(message: string): void {
    this.writeToFile('TEXT', message);
    console.log(styles.text(message));
  }

  static highlight(message: string): void {
    this.writeToFile('TEXT', message);
    console.log(styles.highlight(message));
  }

  /**
   * 启动进度指示器
   */
  static startProgress(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
    }
    this.spinner = ora(styles.text(message)).start();
  }

  /**
   * 停止进度指示器（不输出最终消息，结果行由调用方打印）
   */
  static stopProgress(): void {
    if (!this.spinner) {
      return;
    }
    this.spinner.stop();
    this.spinner = null;
  }

  /**
   * Gauntlet 标题横幅
   */
  static brand(): void {
    const rule = '='.repeat(60);
    console.log('\n' + styles.title(rule));
    console.log(styles.title('  THE RRULE GAUNTLET'));
    console.log(styles.subtitle('  Recurrence-rule challenges that break LLMs on calendar math'));
    console.log(styles.title(rule) + '\n');
  }
}
