import type { TranscriptSourcePort } from '../domain/ports/TranscriptSourcePort.js';
import type { BriefingStorePort } from '../domain/ports/BriefingStorePort.js';
import type { InsightStorePort } from '../domain/ports/InsightStorePort.js';
import type { AccumulatedInsight } from '../domain/entities/AccumulatedInsight.js';

export interface StatusReport {
  totalSessions: number;
  totalBriefings: number;
  /** 出現過的專案路徑（去重、排序） */
  projects: string[];
  insights: AccumulatedInsight[];
}

/** 彙整 session、briefing 與洞察的數量 */
export class StatusUseCase {
  constructor(
    private readonly source: TranscriptSourcePort,
    private readonly briefings: BriefingStorePort,
    private readonly insights: InsightStorePort,
  ) {}

  async execute(): Promise<StatusReport> {
    const [sessions, briefings, insights] = await Promise.all([
      this.source.list(),
      this.briefings.list(),
      this.insights.list(),
    ]);

    const projects = [...new Set(sessions.map((s) => s.projectPath).filter(Boolean))].sort();
    return {
      totalSessions: sessions.length,
      totalBriefings: briefings.length,
      projects,
      insights,
    };
  }
}
