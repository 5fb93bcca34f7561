import type { FileChangeStatus } from '../../domain/entities/ChangeSet.js';

export interface StatusEntry {
  /** 兩字元狀態碼，例如 '??'、' M'、'A '、'R ' */
  code: string;
  path: string;
  status: FileChangeStatus;
}

/**
 * 解析 `git status --porcelain` (v1)
 * 格式：XY<space>path，rename 為 XY<space>old -> new
 */
export class PorcelainStatusParser {
  parse(output: string): StatusEntry[] {
    const entries: StatusEntry[] = [];

    for (const line of output.split('\n')) {
      if (line.length < 4) continue;

      const code = line.slice(0, 2);
      let filePath = line.slice(3).trim();
      const arrow = filePath.indexOf(' -> ');
      if (arrow !== -1) filePath = filePath.slice(arrow + 4);

      entries.push({ code, path: unquote(filePath), status: classify(code) });
    }

    return entries;
  }
}

function classify(code: string): FileChangeStatus {
  const trimmed = code.trim();
  if (trimmed === '??' || trimmed === 'A') return 'added';
  if (code.includes('D')) return 'deleted';
  if (code.includes('R')) return 'renamed';
  return 'modified';
}

/** git 對含特殊字元的路徑加上雙引號 */
function unquote(filePath: string): string {
  if (filePath.length >= 2 && filePath.startsWith('"') && filePath.endsWith('"')) {
    return filePath.slice(1, -1).replace(/\\(["\\])/g, '$1');
  }
  return filePath;
}
