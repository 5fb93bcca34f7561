import type { LockStorePort } from '../domain/ports/LockStorePort.js';
import type { ProcessLauncherPort } from '../domain/ports/ProcessLauncherPort.js';
import type { HookPayload } from './dto/HookPayload.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export type TriggerOutcome = 'no-session' | 'locked' | 'spawned' | 'failed';

export interface TriggerOptions {
  maxAgeSec: number;
  staleAfterSec: number;
}

/**
 * 觸發端：session 回合結束（stop）與 context 壓縮前（pre-compact）
 *
 * 只做 lock 判斷與背景程序啟動，必須在極短時間內返回。
 * 任何錯誤都吸收並回報為 'failed'。
 */
export class TriggerUseCase {
  private readonly logger = new Logger('TriggerUseCase');

  constructor(
    private readonly locks: LockStorePort,
    private readonly launcher: ProcessLauncherPort,
    private readonly options: TriggerOptions,
  ) {}

  /** 同一 session 在 maxAgeSec 內只啟動一次分析 */
  onStop(payload: HookPayload | undefined): TriggerOutcome {
    const sessionId = payload?.session_id;
    if (!sessionId) return 'no-session';

    try {
      this.locks.sweepStale(this.options.staleAfterSec);
      if (this.locks.isLocked(sessionId, this.options.maxAgeSec)) {
        this.logger.debug('Analysis already running', { sessionId });
        return 'locked';
      }
      this.locks.createLock(sessionId);
      this.launcher.spawnDetached(sessionId, { cwd: payload?.cwd });
      return 'spawned';
    } catch (err) {
      this.logger.error('Stop trigger failed', { sessionId, error: errorMessage(err) });
      return 'failed';
    }
  }

  /** 不做去重，每次壓縮前都留一份快照 */
  onPreCompact(payload: HookPayload | undefined): TriggerOutcome {
    const sessionId = payload?.session_id;
    if (!sessionId) return 'no-session';

    try {
      this.launcher.spawnDetached(sessionId, { snapshot: true, cwd: payload?.cwd });
      return 'spawned';
    } catch (err) {
      this.logger.error('Pre-compact trigger failed', { sessionId, error: errorMessage(err) });
      return 'failed';
    }
  }
}
