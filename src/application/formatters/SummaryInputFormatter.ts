import type { Message } from '../../domain/entities/Message.js';
import { stringParam, textOf } from '../../domain/entities/Message.js';
import type { ChangeSet } from '../../domain/entities/ChangeSet.js';

export const DEFAULT_MAX_INPUT_CHARS = 150000;
/** 標題與分隔所保留的字元數 */
const HEADER_RESERVE = 100;
/** 對話可用空間低於此值時，改為 diff 與對話各取一半 */
const MIN_CONVERSATION_CHARS = 10000;

export const CONVERSATION_TRUNCATED = '\n\n[...conversation truncated...]';
export const DIFF_TRUNCATED = '\n\n[...diff truncated...]';

export interface SummaryInput {
  changeSetText: string;
  conversationText: string;
}

/** 送往摘要服務的 user message */
export function renderSummaryInput(input: SummaryInput): string {
  return `## CODEBASE DIFF\n\n${input.changeSetText}\n\n## CONVERSATION\n\n${input.conversationText}`;
}

const SECTION_HEADERS_LENGTH = renderSummaryInput({ changeSetText: '', conversationText: '' }).length;

/**
 * 摘要輸入格式化
 *
 * 將過濾後的對話與 change set 轉成純文字，並控制總長度。
 * 超過上限時優先保留 diff。
 */
export class SummaryInputFormatter {
  constructor(private readonly maxInputChars: number = DEFAULT_MAX_INPUT_CHARS) {}

  format(messages: readonly Message[], changeSet: ChangeSet): SummaryInput {
    return this.fit({
      changeSetText: this.formatChangeSet(changeSet),
      conversationText: this.formatConversation(messages),
    });
  }

  formatConversation(messages: readonly Message[]): string {
    const parts: string[] = [];

    for (const msg of messages) {
      const text = textOf(msg).join(' ');
      if (msg.role === 'user') {
        if (text) parts.push(`USER: ${text}`);
      } else if (msg.role === 'assistant') {
        let line = text ? `ASSISTANT: ${text}` : 'ASSISTANT:';
        const tools = toolLabels(msg);
        if (tools.length > 0) line += `\n  [Tools: ${tools.join(', ')}]`;
        parts.push(line);
      } else if (msg.type === 'summary') {
        if (text) parts.push(`SESSION SUMMARY: ${text}`);
      }
    }

    return parts.join('\n\n');
  }

  formatChangeSet(changeSet: ChangeSet): string {
    if (changeSet.files.length === 0) return '(no diff available)';

    const lines = [
      `Source: ${changeSet.provenance} | +${changeSet.totalAdditions} -${changeSet.totalDeletions} | ${changeSet.files.length} files`,
    ];
    if (changeSet.truncated) lines.push('(diff truncated)');
    lines.push('');

    for (const file of changeSet.files) {
      lines.push(file.diffText ? file.diffText : `  ${file.status}: ${file.path}`);
    }
    return lines.join('\n');
  }

  /** 超過 maxInputChars 時截斷：先截對話，空間不足時兩者各取一半 */
  fit(input: SummaryInput): SummaryInput {
    if (renderSummaryInput(input).length <= this.maxInputChars) return input;

    const availableForConversation = this.maxInputChars - input.changeSetText.length - HEADER_RESERVE;
    if (availableForConversation > MIN_CONVERSATION_CHARS) {
      return {
        changeSetText: input.changeSetText,
        conversationText: input.conversationText.slice(0, availableForConversation) + CONVERSATION_TRUNCATED,
      };
    }

    // 兩半加上標題與兩個截斷標記不得超過上限
    const overhead = SECTION_HEADERS_LENGTH + DIFF_TRUNCATED.length + CONVERSATION_TRUNCATED.length;
    const half = Math.max(0, Math.floor((this.maxInputChars - overhead) / 2));
    return {
      changeSetText: input.changeSetText.slice(0, half) + DIFF_TRUNCATED,
      conversationText: input.conversationText.slice(0, half) + CONVERSATION_TRUNCATED,
    };
  }
}

/** `Name(path)` 或 `Name` */
function toolLabels(message: Message): string[] {
  const labels: string[] = [];
  for (const block of message.content) {
    if (block.kind !== 'tool_invocation') continue;
    const filePath = stringParam(block, 'file_path');
    labels.push(filePath ? `${block.name}(${filePath})` : block.name);
  }
  return labels;
}
