/**
 * 版本控制協作者
 *
 * 實作以外部程序呼叫 git，只讀取其文字輸出。
 * 程序無法啟動或逾時時拋出 VersionControlUnavailableError；
 * 命令以非零狀態結束時回傳空字串。
 */
export interface VersionControlPort {
  isWorkTree(cwd: string): Promise<boolean>;
  /** `git diff <ref>` 的 unified diff 文字 */
  diff(cwd: string, ref: string): Promise<string>;
  /** `git status --porcelain` 的文字 */
  status(cwd: string): Promise<string>;
}
