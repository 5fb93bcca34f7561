import type { LogLevel } from '../shared/Logger.js';

/** 資料路徑設定（相對路徑以設定目錄為基準，`~/` 展開為 home） */
export interface PathsConfig {
  /** session 紀錄來源：每個專案一個子目錄，內含 sessions-index.json 與 JSONL */
  projectsDir: string;
  briefingsDir: string;
  insightsDir: string;
  locksDir: string;
  logsDir: string;
}

/** 併發防護設定 */
export interface LockConfig {
  /** lock 在此秒數內視為有效 */
  maxAgeSec: number;
  /** 超過此秒數的 lock 會被清掃 */
  staleAfterSec: number;
}

/** 版本控制設定 */
export interface GitConfig {
  /** 單次 git 呼叫的逾時 */
  timeoutMs: number;
  /** diff 文字總量上限 */
  maxDiffChars: number;
}

/** 摘要服務設定 */
export interface SummarizerConfig {
  /** 'openai-compatible' 呼叫遠端 API；'none' 停用 */
  provider: 'openai-compatible' | 'none';
  baseUrl: string;
  apiKey?: string;
  model: string;
  /** 回應無法解析時的總嘗試次數 */
  maxAttempts: number;
  /** 送出訊息的字元上限 */
  maxInputChars: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface SessbriefConfig {
  version: number;
  paths: PathsConfig;
  lock: LockConfig;
  git: GitConfig;
  summarizer: SummarizerConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof SessbriefConfig]?: SessbriefConfig[K] extends object
    ? Partial<SessbriefConfig[K]>
    : SessbriefConfig[K];
};
