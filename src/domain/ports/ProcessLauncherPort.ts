export interface DetachedRunOptions {
  /** pre-compact 快照模式 */
  snapshot?: boolean;
  /** 觸發事件帶來的工作目錄提示 */
  cwd?: string;
}

/** 以獨立程序啟動背景分析，呼叫端不等待 */
export interface ProcessLauncherPort {
  spawnDetached(sessionId: string, options?: DetachedRunOptions): void;
}
