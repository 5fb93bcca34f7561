import fs from 'node:fs';
import path from 'node:path';
import type { LockStorePort } from '../../domain/ports/LockStorePort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

export const LOCK_SUFFIX = '.lock';
export const DEFAULT_LOCK_MAX_AGE_SEC = 60;
export const DEFAULT_STALE_AFTER_SEC = 300;

export interface FileLockStoreOptions {
  maxAgeSec?: number;
  staleAfterSec?: number;
  /** 毫秒時鐘，測試時可注入 */
  now?: () => number;
}

/**
 * 以 marker 檔實作的 session lock
 *
 * `<locksDir>/<id>.lock` 內容為建立時的 epoch 秒數。
 * best-effort：檢查與建立之間沒有原子性，兩個 hook 幾乎同時觸發時可能都取得 lock。
 */
export class FileLockStore implements LockStorePort {
  private readonly logger = new Logger('FileLockStore');
  private readonly maxAgeSec: number;
  private readonly staleAfterSec: number;
  private readonly now: () => number;

  constructor(
    private readonly locksDir: string,
    options: FileLockStoreOptions = {},
  ) {
    this.maxAgeSec = options.maxAgeSec ?? DEFAULT_LOCK_MAX_AGE_SEC;
    this.staleAfterSec = options.staleAfterSec ?? DEFAULT_STALE_AFTER_SEC;
    this.now = options.now ?? Date.now;
  }

  lockPath(sessionId: string): string {
    return path.join(this.locksDir, `${encodeURIComponent(sessionId)}${LOCK_SUFFIX}`);
  }

  isLocked(sessionId: string, maxAgeSec: number = this.maxAgeSec): boolean {
    const createdAt = this.readTimestamp(this.lockPath(sessionId));
    if (createdAt === undefined) return false;
    return this.nowSec() - createdAt < maxAgeSec;
  }

  createLock(sessionId: string): void {
    fs.mkdirSync(this.locksDir, { recursive: true });
    fs.writeFileSync(this.lockPath(sessionId), String(this.nowSec()), 'utf-8');
  }

  removeLock(sessionId: string): void {
    try {
      fs.rmSync(this.lockPath(sessionId), { force: true });
    } catch (err) {
      this.logger.debug('Lock removal failed', { sessionId, error: errorMessage(err) });
    }
  }

  sweepStale(maxAgeSec: number = this.staleAfterSec): number {
    let names: string[];
    try {
      names = fs.readdirSync(this.locksDir);
    } catch (err) {
      this.logger.debug('No lock directory to sweep', { error: errorMessage(err) });
      return 0;
    }

    const now = this.nowSec();
    let removed = 0;
    for (const name of names) {
      if (!name.endsWith(LOCK_SUFFIX)) continue;
      const filePath = path.join(this.locksDir, name);
      const createdAt = this.readTimestamp(filePath);
      if (createdAt !== undefined && now - createdAt <= maxAgeSec) continue;

      try {
        fs.rmSync(filePath, { force: true });
        removed++;
      } catch (err) {
        this.logger.debug('Stale lock removal failed', { filePath, error: errorMessage(err) });
      }
    }

    if (removed > 0) this.logger.info('Swept stale locks', { removed });
    return removed;
  }

  private nowSec(): number {
    return this.now() / 1000;
  }

  /** 無法讀取或內容不是數字時回傳 undefined */
  private readTimestamp(filePath: string): number | undefined {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch {
      return undefined;
    }
    const value = Number.parseFloat(content.trim());
    return Number.isFinite(value) ? value : undefined;
  }
}
