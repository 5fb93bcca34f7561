import type { SessionBriefing, BriefingListing } from '../entities/Briefing.js';

export interface SavedBriefingPaths {
  jsonPath: string;
  markdownPath: string;
}

export interface BriefingSaveOptions {
  /** 檔名加上 UTC 時間後綴，不覆蓋既有 briefing */
  snapshot?: boolean;
}

export interface BriefingStorePort {
  /** 寫出結構化 JSON 與 Markdown；失敗時拋出 PersistenceError */
  save(briefing: SessionBriefing, options?: BriefingSaveOptions): Promise<SavedBriefingPaths>;
  load(sessionId: string): Promise<SessionBriefing | undefined>;
  /** 依 createdAt 由新到舊 */
  list(): Promise<BriefingListing[]>;
}
