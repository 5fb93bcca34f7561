/**
 * Transcript 訊息模型
 *
 * JSONL 每行一筆紀錄，由 TranscriptParser 轉成不可變的 Message。
 * content 以 tagged union 表示，每種 block 只帶自己需要的欄位。
 */

export type MessageType =
  | 'user'
  | 'assistant'
  | 'summary'
  | 'progress'
  | 'file-history-snapshot'
  | 'other';

export type MessageRole = 'user' | 'assistant' | '';

export interface TextBlock {
  readonly kind: 'text';
  readonly text: string;
}

export interface ToolInvocationBlock {
  readonly kind: 'tool_invocation';
  readonly name: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

export interface ToolResultBlock {
  readonly kind: 'tool_result';
  readonly referenceId: string;
}

/** 未建模的 block（thinking、image 等），原樣保留 */
export interface OtherBlock {
  readonly kind: 'other';
  readonly type: string;
  readonly raw: Readonly<Record<string, unknown>>;
}

export type ContentBlock = TextBlock | ToolInvocationBlock | ToolResultBlock | OtherBlock;

export interface Message {
  readonly type: MessageType;
  /** 原始 type 字串（type 為 'other' 時保留來源值） */
  readonly recordType: string;
  readonly role: MessageRole;
  readonly content: readonly ContentBlock[];
  readonly uuid: string;
  readonly parentUuid: string;
  /** ISO datetime */
  readonly timestamp: string;
  readonly raw: Readonly<Record<string, unknown>>;
}

export interface TranscriptSession {
  sessionId: string;
  messages: readonly Message[];
}

/** 取出 message 中所有 text block 的文字 */
export function textOf(message: Message): string[] {
  const texts: string[] = [];
  for (const block of message.content) {
    if (block.kind === 'text') texts.push(block.text);
  }
  return texts;
}

/** 取出 tool_invocation 參數中的字串值 */
export function stringParam(block: ToolInvocationBlock, key: string): string {
  const value = block.parameters[key];
  return typeof value === 'string' ? value : '';
}
