/**
 * 每個 session 最多一個進行中的分析（best-effort）
 *
 * 狀態：unlocked → createLock → locked → 超過 maxAge → 殘留 marker → sweep / 下次取得 → unlocked
 * 所有操作皆同步，hook 進入點需在極短時間內結束。
 */
export interface LockStorePort {
  /** marker 存在且未超過 maxAgeSec；無法讀取或格式錯誤視為未鎖定 */
  isLocked(sessionId: string, maxAgeSec?: number): boolean;
  /** 寫入（或覆寫）目前時間 */
  createLock(sessionId: string): void;
  /** 不存在也不拋錯 */
  removeLock(sessionId: string): void;
  /** 移除所有過期或無法讀取的 marker，回傳移除數量 */
  sweepStale(maxAgeSec?: number): number;
}
