import type { Message } from '../entities/Message.js';
import type { SessionInfo } from '../entities/SessionInfo.js';

/** session 紀錄來源 */
export interface TranscriptSourcePort {
  /** 依 modified 由新到舊；來源目錄不存在時回傳空陣列 */
  list(projectFilter?: string): Promise<SessionInfo[]>;
  /** 最近修改的 session；沒有任何 session 時拋出 SessionNotFoundError */
  latest(projectFilter?: string): Promise<SessionInfo>;
  /** 找不到時拋出 SessionNotFoundError */
  get(sessionId: string, projectFilter?: string): Promise<SessionInfo>;
  /** 讀取並解析 session 的完整 transcript */
  read(session: SessionInfo): Promise<Message[]>;
}
