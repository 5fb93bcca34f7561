import type { SessionBriefing } from '../entities/Briefing.js';

export interface SummaryRequest {
  sessionId: string;
  projectPath: string;
  /** 過濾後的對話文字 */
  conversationText: string;
  /** 格式化後的 change set 文字 */
  changeSetText: string;
}

/**
 * 外部摘要服務
 * 失敗時拋出 SummarizerError 家族的 typed error
 */
export interface SummarizerPort {
  readonly providerId: string;
  summarize(request: SummaryRequest): Promise<SessionBriefing>;
}
