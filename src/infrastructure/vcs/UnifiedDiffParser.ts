import type { FileChange, FileChangeStatus } from '../../domain/entities/ChangeSet.js';

const FILE_HEADER = /^diff --git a\/(.+) b\/(.+)$/;

/**
 * 解析 git unified diff 為 FileChange 清單
 * 格式：
 *   diff --git a/path b/path
 *   new file mode 100644 | deleted file mode | rename from/to
 *   --- a/path
 *   +++ b/path
 *   @@ -1,2 +1,3 @@
 *   +added / -removed / context
 */
export class UnifiedDiffParser {
  parse(diffText: string): FileChange[] {
    if (!diffText.trim()) return [];

    const files: FileChange[] = [];
    let currentPath: string | null = null;
    let currentLines: string[] = [];

    for (const line of diffText.split('\n')) {
      if (line.startsWith('diff --git ')) {
        if (currentPath !== null) files.push(this.buildFileChange(currentPath, currentLines));
        currentPath = FILE_HEADER.exec(line)?.[2] ?? 'unknown';
        currentLines = [line];
      } else if (currentPath !== null) {
        currentLines.push(line);
      }
    }

    if (currentPath !== null) files.push(this.buildFileChange(currentPath, currentLines));
    return files;
  }

  private buildFileChange(filePath: string, lines: string[]): FileChange {
    let additions = 0;
    let deletions = 0;
    let status: FileChangeStatus = 'modified';

    for (const line of lines) {
      if (line.startsWith('new file')) {
        status = 'added';
      } else if (line.startsWith('deleted file')) {
        status = 'deleted';
      } else if (line.startsWith('rename ')) {
        status = 'renamed';
      } else if (line.startsWith('+') && !line.startsWith('+++')) {
        additions++;
      } else if (line.startsWith('-') && !line.startsWith('---')) {
        deletions++;
      }
    }

    // 去掉尾端因結尾換行產生的空行
    while (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();

    return { path: filePath, status, additions, deletions, diffText: lines.join('\n') };
  }
}
