export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

let defaultLevel: LogLevel = 'info';

/**
 * 結構化 JSON logger
 *
 * 一律寫到 stderr：hook 模式下 stdout 保留給回應物件，
 * 背景分析時 stderr 已被導向該 session 的 log 檔。
 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  /** 設定未指定 minLevel 的 logger 所使用的等級（composition root 呼叫一次） */
  static setDefaultLevel(level: LogLevel): void {
    defaultLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? defaultLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 將未知錯誤轉為可記錄的訊息字串 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
