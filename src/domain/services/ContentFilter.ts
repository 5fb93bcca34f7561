/**
 * ContentFilter：以固定規則縮減 transcript，保留高訊號內容
 *
 * 規則（依優先順序）：
 * 1. progress / file-history-snapshot：整筆移除並計數
 * 2. summary：原樣保留
 * 3. user：原樣保留，不論長度
 * 4. assistant：逐 block 縮減後做存活判斷
 * 5. 其他：移除（不計數）
 *
 * 純函式：同樣的輸入永遠得到同樣的輸出，不修改輸入。
 */

import type {
  ContentBlock,
  Message,
  ToolInvocationBlock,
} from '../entities/Message.js';
import { stringParam } from '../entities/Message.js';
import type { FilteredTranscript, FilterStatistics } from '../entities/FilteredTranscript.js';

/** 超過此長度的 text block 會被截斷（等於不截） */
export const LONG_TEXT_THRESHOLD = 500;
export const TRUNCATE_TO = 300;
export const ELLIPSIS = '...';
/** 只有短文字的 assistant 訊息低於此長度即移除（等於保留） */
export const SHORT_TEXT_THRESHOLD = 50;
export const COMMAND_PREVIEW_LENGTH = 100;

/** 保留 file_path 的檔案類工具 */
export const FILE_TOOLS: ReadonlySet<string> = new Set(['Write', 'Edit', 'MultiEdit', 'Read', 'NotebookEdit']);
export const SHELL_TOOLS: ReadonlySet<string> = new Set(['Bash']);

export function filterTranscript(sessionId: string, messages: readonly Message[]): FilteredTranscript {
  const stats: FilterStatistics = {
    originalCount: messages.length,
    keptCount: 0,
    removedProgress: 0,
    removedFileHistory: 0,
    truncatedMessages: 0,
    strippedToolContent: 0,
  };
  const kept: Message[] = [];

  for (const msg of messages) {
    if (msg.type === 'progress') {
      stats.removedProgress++;
      continue;
    }
    if (msg.type === 'file-history-snapshot') {
      stats.removedFileHistory++;
      continue;
    }

    if (msg.type === 'summary' || msg.role === 'user') {
      kept.push(msg);
      continue;
    }

    if (msg.role === 'assistant') {
      const content = msg.content.map((block) => filterBlock(block, stats));
      if (!survives(content)) continue;

      kept.push({ ...msg, content, raw: {} });
    }
  }

  stats.keptCount = kept.length;
  return { sessionId, messages: kept, stats };
}

/** assistant 訊息存活條件：含任一非 text block，或任一 text block 長度 ≥ 50 */
function survives(content: readonly ContentBlock[]): boolean {
  return content.some((block) =>
    block.kind !== 'text' || codePointLength(block.text) >= SHORT_TEXT_THRESHOLD,
  );
}

/** 長度以 code point 計，surrogate pair 算一個字元 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export function sliceCodePoints(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

function filterBlock(block: ContentBlock, stats: FilterStatistics): ContentBlock {
  switch (block.kind) {
    case 'text':
      if (codePointLength(block.text) > LONG_TEXT_THRESHOLD) {
        stats.truncatedMessages++;
        return { kind: 'text', text: sliceCodePoints(block.text, TRUNCATE_TO) + ELLIPSIS };
      }
      return block;
    case 'tool_invocation':
      stats.strippedToolContent++;
      return stripInvocation(block);
    case 'tool_result':
      return { kind: 'tool_result', referenceId: block.referenceId };
    case 'other':
      return block;
  }
}

function stripInvocation(block: ToolInvocationBlock): ToolInvocationBlock {
  if (FILE_TOOLS.has(block.name)) {
    const filePath = stringParam(block, 'file_path') || stringParam(block, 'notebook_path');
    return { kind: 'tool_invocation', name: block.name, parameters: { file_path: filePath } };
  }
  if (SHELL_TOOLS.has(block.name)) {
    return {
      kind: 'tool_invocation',
      name: block.name,
      parameters: {
        description: stringParam(block, 'description'),
        command_preview: sliceCodePoints(stringParam(block, 'command'), COMMAND_PREVIEW_LENGTH),
      },
    };
  }
  return { kind: 'tool_invocation', name: block.name, parameters: {} };
}
