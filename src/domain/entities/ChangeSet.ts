export type FileChangeStatus = 'added' | 'modified' | 'deleted' | 'renamed';

/** version-control：來自 git；reconstructed：由 transcript 的工具呼叫重建 */
export type ChangeSetProvenance = 'version-control' | 'reconstructed';

export interface FileChange {
  path: string;
  status: FileChangeStatus;
  additions: number;
  deletions: number;
  diffText?: string;
}

/**
 * 一次 session 的程式碼變更
 * 不變式：totalAdditions / totalDeletions 等於各 FileChange 之和
 */
export interface ChangeSet {
  files: FileChange[];
  totalAdditions: number;
  totalDeletions: number;
  truncated: boolean;
  provenance: ChangeSetProvenance;
}

/** 由 FileChange 清單建構 ChangeSet，totals 一律重新加總 */
export function buildChangeSet(
  files: FileChange[],
  provenance: ChangeSetProvenance,
  truncated = false,
): ChangeSet {
  let totalAdditions = 0;
  let totalDeletions = 0;
  for (const f of files) {
    totalAdditions += f.additions;
    totalDeletions += f.deletions;
  }
  return { files, totalAdditions, totalDeletions, truncated, provenance };
}
