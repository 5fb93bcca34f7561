import { spawn } from 'node:child_process';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { DetachedRunOptions, ProcessLauncherPort } from '../../domain/ports/ProcessLauncherPort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

export interface DetachedProcessLauncherOptions {
  /** CLI 進入點，預設為目前程序的 argv[1] */
  cliPath?: string;
  /** 子程序的 node 執行檔，預設為 process.execPath */
  execPath?: string;
  /** 傳給 node 的額外參數（例如 --import tsx），預設為 process.execArgv */
  execArgv?: string[];
  /** 傳給子程序的 --config-dir，讓它讀同一份設定並釋放同一個 locks 目錄下的 lock */
  configDir?: string;
}

/**
 * 啟動背景分析程序
 *
 * 子程序脫離父程序群組、stdin 關閉、stdout/stderr 附加到 `<logsDir>/analyze-<id>.log`。
 * 父程序不等待結果；啟動失敗只記錄，不拋出。
 */
export class DetachedProcessLauncher implements ProcessLauncherPort {
  private readonly logger = new Logger('DetachedProcessLauncher');

  constructor(
    private readonly logsDir: string,
    private readonly options: DetachedProcessLauncherOptions = {},
  ) {}

  logPath(sessionId: string): string {
    return path.join(this.logsDir, `analyze-${encodeURIComponent(sessionId)}.log`);
  }

  buildArgs(sessionId: string, run: DetachedRunOptions = {}): string[] {
    const cliPath = this.options.cliPath ?? process.argv[1] ?? '';
    const args = [
      ...(this.options.execArgv ?? process.execArgv),
      cliPath,
      'analyze',
      '--session-id',
      sessionId,
      '--background',
    ];
    if (run.snapshot) args.push('--snapshot');
    if (run.cwd) args.push('--cwd', run.cwd);
    if (this.options.configDir) args.push('--config-dir', this.options.configDir);
    return args;
  }

  spawnDetached(sessionId: string, run: DetachedRunOptions = {}): void {
    const logFile = this.logPath(sessionId);
    let fd: number | undefined;

    try {
      fs.mkdirSync(this.logsDir, { recursive: true });
      fd = fs.openSync(logFile, 'a');

      const child = spawn(this.options.execPath ?? process.execPath, this.buildArgs(sessionId, run), {
        detached: true,
        stdio: ['ignore', fd, fd],
        cwd: os.homedir(),
        env: process.env,
      });
      child.on('error', (err) => {
        this.logger.error('Background analysis failed to start', { sessionId, error: errorMessage(err) });
      });
      child.unref();

      this.logger.info('Background analysis started', { sessionId, pid: child.pid, logFile });
    } catch (err) {
      this.logger.error('Cannot launch background analysis', { sessionId, error: errorMessage(err) });
    } finally {
      if (fd !== undefined) this.closeQuietly(fd);
    }
  }

  private closeQuietly(fd: number): void {
    try {
      fs.closeSync(fd);
    } catch (err) {
      this.logger.debug('Log descriptor close failed', { error: errorMessage(err) });
    }
  }
}
