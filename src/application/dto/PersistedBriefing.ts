import type { SessionBriefing } from '../../domain/entities/Briefing.js';
import type { AccumulatedInsight } from '../../domain/entities/AccumulatedInsight.js';
import type { FilterStatistics } from '../../domain/entities/FilteredTranscript.js';
import type { ChangeSetProvenance } from '../../domain/entities/ChangeSet.js';

/** 一次分析的結果 */
export interface PersistedBriefing {
  briefing: SessionBriefing;
  jsonPath: string;
  markdownPath: string;
  stats: FilterStatistics;
  changeSet: {
    provenance: ChangeSetProvenance;
    files: number;
    totalAdditions: number;
    totalDeletions: number;
    truncated: boolean;
  };
  /** snapshot 模式不更新洞察 */
  insight?: AccumulatedInsight;
}
