import fs from 'node:fs/promises';
import path from 'node:path';
import type { Message } from '../domain/entities/Message.js';
import { stringParam } from '../domain/entities/Message.js';
import type {
  ChangeSet,
  ChangeSetProvenance,
  FileChange,
  FileChangeStatus,
} from '../domain/entities/ChangeSet.js';
import { buildChangeSet } from '../domain/entities/ChangeSet.js';
import type { VersionControlPort } from '../domain/ports/VersionControlPort.js';
import { VersionControlUnavailableError } from '../domain/errors/DomainErrors.js';
import { UnifiedDiffParser } from '../infrastructure/vcs/UnifiedDiffParser.js';
import { PorcelainStatusParser } from '../infrastructure/vcs/PorcelainStatusParser.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export const DEFAULT_MAX_DIFF_CHARS = 32000;

export interface ExtractionContext {
  projectPath: string;
  transcript?: readonly Message[];
  /** 工作樹檢查結果，由第一個 version-control 策略填入 */
  workTree?: Promise<void>;
}

/**
 * 單一還原策略
 * 回傳 null 表示「不適用」，交給下一個策略；拋錯則視為該類協作者不可用。
 */
export interface ChangeSetStrategy {
  readonly name: string;
  readonly provenance: ChangeSetProvenance;
  attempt(ctx: ExtractionContext): Promise<ChangeSet | null>;
}

/**
 * Change set 還原用例
 *
 * 依序嘗試：
 * 1. committed-diff：`git diff HEAD~1`
 * 2. working-tree-diff：`git diff HEAD`
 * 3. status-snapshot：`git status --porcelain`，未提交檔案以全文當作新增
 * 4. transcript：從 Write/Edit 工具呼叫重建檔案清單
 *
 * 任一 version-control 策略拋錯後，其餘 version-control 策略全部略過。
 * 最後套用全域 diff 字元上限。extract 本身永不拋錯。
 */
export class ChangeSetExtractor {
  private readonly logger = new Logger('ChangeSetExtractor');
  private readonly strategies: readonly ChangeSetStrategy[];

  constructor(
    private readonly vcs: VersionControlPort,
    private readonly maxDiffChars: number = DEFAULT_MAX_DIFF_CHARS,
    strategies?: readonly ChangeSetStrategy[],
  ) {
    this.strategies = strategies ?? createDefaultStrategies(vcs, maxDiffChars);
  }

  async extract(projectPath: string, transcript?: readonly Message[]): Promise<ChangeSet> {
    const ctx: ExtractionContext = { projectPath, transcript };
    let vcsUsable = true;

    for (const strategy of this.strategies) {
      if (strategy.provenance === 'version-control' && !vcsUsable) continue;

      try {
        const result = await strategy.attempt(ctx);
        if (result) {
          this.logger.debug('Change set resolved', {
            strategy: strategy.name,
            files: result.files.length,
          });
          return applyDiffBudget(result, this.maxDiffChars);
        }
      } catch (err) {
        if (strategy.provenance === 'version-control') vcsUsable = false;
        this.logger.info('Change set strategy unavailable, falling back', {
          strategy: strategy.name,
          error: errorMessage(err),
        });
      }
    }

    return buildChangeSet([], 'reconstructed');
  }
}

/** 預設策略順序 */
export function createDefaultStrategies(
  vcs: VersionControlPort,
  maxDiffChars: number = DEFAULT_MAX_DIFF_CHARS,
): ChangeSetStrategy[] {
  const diffParser = new UnifiedDiffParser();
  const statusParser = new PorcelainStatusParser();

  const diffStrategy = (name: string, ref: string): ChangeSetStrategy => ({
    name,
    provenance: 'version-control',
    async attempt(ctx) {
      await requireWorkTree(vcs, ctx);
      const diffText = await vcs.diff(ctx.projectPath, ref);
      if (!diffText.trim()) return null;
      return buildChangeSet(diffParser.parse(diffText), 'version-control');
    },
  });

  return [
    diffStrategy('committed-diff', 'HEAD~1'),
    diffStrategy('working-tree-diff', 'HEAD'),
    {
      name: 'status-snapshot',
      provenance: 'version-control',
      async attempt(ctx) {
        await requireWorkTree(vcs, ctx);
        const output = await vcs.status(ctx.projectPath);
        // 工作樹乾淨：沒有可回報的變更，但 git 本身可用
        if (!output.trim()) return buildChangeSet([], 'version-control');
        return synthesizeFromStatus(ctx.projectPath, statusParser.parse(output), maxDiffChars);
      },
    },
    {
      name: 'transcript',
      provenance: 'reconstructed',
      async attempt(ctx) {
        return reconstructFromTranscript(ctx.transcript ?? []);
      },
    },
  ];
}

/** 確認 projectPath 是 git 工作樹；結果在同一次 extract 內共用 */
function requireWorkTree(vcs: VersionControlPort, ctx: ExtractionContext): Promise<void> {
  ctx.workTree ??= (async () => {
    if (!ctx.projectPath) {
      throw new VersionControlUnavailableError('No project path');
    }
    const stat = await fs.stat(ctx.projectPath).catch(() => undefined);
    if (!stat?.isDirectory()) {
      throw new VersionControlUnavailableError(`Not a directory: ${ctx.projectPath}`);
    }
    if (!(await vcs.isWorkTree(ctx.projectPath))) {
      throw new VersionControlUnavailableError(`Not a git work tree: ${ctx.projectPath}`);
    }
  })();
  return ctx.workTree;
}

/** 去掉結尾換行後依行切分，空字串為 0 行 */
function splitLines(content: string): string[] {
  if (!content) return [];
  return content.replace(/\r?\n$/, '').split(/\r?\n/);
}

/**
 * 將 porcelain 狀態轉為 ChangeSet
 * added/modified 檔案在預算內讀入全文，每行都算新增；讀不到的檔案保留但不計數
 */
export async function synthesizeFromStatus(
  projectPath: string,
  entries: ReadonlyArray<{ path: string; status: FileChangeStatus }>,
  maxDiffChars: number,
): Promise<ChangeSet> {
  const files: FileChange[] = [];
  let consumed = 0;
  let skippedForBudget = false;

  for (const entry of entries) {
    const change: FileChange = { path: entry.path, status: entry.status, additions: 0, deletions: 0 };

    if (entry.status === 'added' || entry.status === 'modified') {
      if (consumed >= maxDiffChars) {
        skippedForBudget = true;
      } else {
        const content = await fs.readFile(path.join(projectPath, entry.path), 'utf-8').catch(() => undefined);
        if (content !== undefined) {
          const lines = splitLines(content);
          change.additions = lines.length;
          change.diffText = [
            `diff --git a/${entry.path} b/${entry.path}`,
            'new file',
            '--- /dev/null',
            `+++ b/${entry.path}`,
            ...lines.map((l) => `+${l}`),
          ].join('\n');
          consumed += change.diffText.length;
        }
      }
    }

    files.push(change);
  }

  return buildChangeSet(files, 'version-control', skippedForBudget);
}

/**
 * 從 transcript 的工具呼叫重建變更清單
 * 首次 Write → added；未見過的路徑被 Edit → modified；之後的操作不改變分類
 */
export function reconstructFromTranscript(messages: readonly Message[]): ChangeSet {
  const seen = new Map<string, FileChangeStatus>();

  for (const msg of messages) {
    if (msg.role !== 'assistant') continue;
    for (const block of msg.content) {
      if (block.kind !== 'tool_invocation') continue;

      const filePath = stringParam(block, 'file_path');
      if (!filePath || seen.has(filePath)) continue;

      if (block.name === 'Write') {
        seen.set(filePath, 'added');
      } else if (block.name === 'Edit' || block.name === 'MultiEdit') {
        seen.set(filePath, 'modified');
      }
    }
  }

  const files: FileChange[] = [...seen].map(([filePath, status]) => ({
    path: filePath,
    status,
    additions: 0,
    deletions: 0,
  }));
  return buildChangeSet(files, 'reconstructed');
}

/**
 * 套用 diff 文字總量上限
 * 跨過上限的檔案保留前段，之後的檔案失去 diff 本文；計數不變，totals 仍等於各檔之和
 */
export function applyDiffBudget(changeSet: ChangeSet, maxDiffChars: number): ChangeSet {
  let remaining = maxDiffChars;
  let truncated = changeSet.truncated;

  const files = changeSet.files.map((file): FileChange => {
    if (file.diffText === undefined) return file;
    if (file.diffText.length <= remaining) {
      remaining -= file.diffText.length;
      return file;
    }
    truncated = true;
    const kept = file.diffText.slice(0, remaining);
    remaining = 0;
    const { diffText: _dropped, ...rest } = file;
    return kept ? { ...rest, diffText: kept } : rest;
  });

  return buildChangeSet(files, changeSet.provenance, truncated);
}
