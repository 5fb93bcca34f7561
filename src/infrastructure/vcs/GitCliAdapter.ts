import { execFile } from 'node:child_process';
import type { VersionControlPort } from '../../domain/ports/VersionControlPort.js';
import { VersionControlUnavailableError } from '../../domain/errors/DomainErrors.js';

export interface GitCliConfig {
  timeoutMs: number;
  /** git 執行檔，預設 'git' */
  binary?: string;
  /** stdout 上限（bytes） */
  maxBufferBytes?: number;
}

interface GitResult {
  exitCode: number;
  stdout: string;
}

/**
 * 以子程序呼叫 git CLI
 *
 * 只消費 git 的文字輸出，不自行實作任何版本控制邏輯。
 * 無法啟動、逾時、輸出過大 → VersionControlUnavailableError；非零結束碼 → 交由呼叫端判斷。
 */
export class GitCliAdapter implements VersionControlPort {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly maxBufferBytes: number;

  constructor(config: GitCliConfig) {
    this.binary = config.binary ?? 'git';
    this.timeoutMs = config.timeoutMs;
    this.maxBufferBytes = config.maxBufferBytes ?? 64 * 1024 * 1024;
  }

  async isWorkTree(cwd: string): Promise<boolean> {
    const result = await this.run(cwd, ['rev-parse', '--is-inside-work-tree']);
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async diff(cwd: string, ref: string): Promise<string> {
    const result = await this.run(cwd, ['diff', '--no-color', '--no-ext-diff', ref]);
    return result.exitCode === 0 ? result.stdout : '';
  }

  async status(cwd: string): Promise<string> {
    const result = await this.run(cwd, ['status', '--porcelain', '--untracked-files=all']);
    return result.exitCode === 0 ? result.stdout : '';
  }

  private run(cwd: string, args: string[]): Promise<GitResult> {
    return new Promise((resolve, reject) => {
      execFile(
        this.binary,
        args,
        {
          cwd,
          timeout: this.timeoutMs,
          maxBuffer: this.maxBufferBytes,
          encoding: 'utf-8',
          windowsHide: true,
          env: { ...process.env, GIT_TERMINAL_PROMPT: '0', GIT_OPTIONAL_LOCKS: '0' },
        },
        (error, stdout) => {
          if (!error) {
            resolve({ exitCode: 0, stdout });
            return;
          }
          if (typeof error.code === 'number') {
            resolve({ exitCode: error.code, stdout });
            return;
          }
          // 逾時會以 signal 結束（code 為 null）
          if (error.code == null && (error.killed || error.signal)) {
            reject(new VersionControlUnavailableError(
              `git ${args[0]} timed out after ${this.timeoutMs}ms`, { cause: error },
            ));
            return;
          }
          // ENOENT（git 不存在）、ENOTDIR、maxBuffer 超出等
          reject(new VersionControlUnavailableError(
            `git ${args[0]} failed: ${error.message}`, { cause: error },
          ));
        },
      );
    });
  }
}
