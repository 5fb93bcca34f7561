/**
 * 跨 session 累積的專案洞察
 * 只透過 merge-on-write 更新；併發寫入採 last-writer-wins
 */
export interface AccumulatedInsight {
  projectPath: string;
  recurringPatterns: string[];
  knownIssues: string[];
  architectureNotes: string[];
  /** ISO datetime */
  lastUpdated: string;
  briefingCount: number;
}
