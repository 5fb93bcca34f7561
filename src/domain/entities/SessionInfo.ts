/** sessions-index.json 中單一 session 的中繼資料 */
export interface SessionInfo {
  sessionId: string;
  /** JSONL 檔完整路徑 */
  fullPath: string;
  firstPrompt: string;
  summary: string;
  messageCount: number;
  /** ISO datetime */
  created: string;
  /** ISO datetime，list 依此排序 */
  modified: string;
  gitBranch: string;
  projectPath: string;
}
