import type { AccumulatedInsight } from '../entities/AccumulatedInsight.js';
import type { SessionBriefing } from '../entities/Briefing.js';

export interface InsightStorePort {
  /** 將 briefing 合併進所屬專案的洞察紀錄並寫回 */
  merge(briefing: SessionBriefing): Promise<AccumulatedInsight>;
  list(): Promise<AccumulatedInsight[]>;
}
