/**
 * TranscriptParser：解析 JSONL transcript 為有序的 Message 陣列
 *
 * JSONL 格式：每行一個 JSON，包含 type, uuid, parentUuid, timestamp, message, summary, cwd 等欄位。
 * 無法解析的行直接略過，不影響其餘行；順序與來源檔完全一致。
 */

import type {
  ContentBlock,
  Message,
  MessageRole,
  MessageType,
} from '../../domain/entities/Message.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toMessageType(type: string): MessageType {
  switch (type) {
    case 'user':
    case 'assistant':
    case 'summary':
    case 'progress':
    case 'file-history-snapshot':
      return type;
    default:
      return 'other';
  }
}

function toRole(role: string): MessageRole {
  return role === 'user' || role === 'assistant' ? role : '';
}

/** 將單一原始 block 對應到 ContentBlock union */
export function toContentBlock(raw: unknown): ContentBlock {
  if (!isObject(raw)) {
    return { kind: 'other', type: typeof raw, raw: {} };
  }

  const type = str(raw.type);
  switch (type) {
    case 'text':
      return { kind: 'text', text: str(raw.text) };
    case 'tool_use':
      return {
        kind: 'tool_invocation',
        name: str(raw.name),
        parameters: isObject(raw.input) ? raw.input : {},
      };
    case 'tool_result':
      return { kind: 'tool_result', referenceId: str(raw.tool_use_id) };
    default:
      return { kind: 'other', type, raw };
  }
}

/** user/assistant 的 content：字串 → 單一 text block；陣列 → 逐一對應；其他 → 空 */
function normalizeContent(content: unknown): ContentBlock[] {
  if (typeof content === 'string') return [{ kind: 'text', text: content }];
  if (Array.isArray(content)) return content.map(toContentBlock);
  return [];
}

/** 解析單行；非 JSON 物件回傳 undefined */
export function parseRecord(line: string): Message | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isObject(parsed)) return undefined;

  const recordType = str(parsed.type);
  const type = toMessageType(recordType);
  let role: MessageRole = '';
  let content: ContentBlock[] = [];

  if (type === 'user' || type === 'assistant') {
    const inner = isObject(parsed.message) ? parsed.message : {};
    role = toRole(typeof inner.role === 'string' ? inner.role : type);
    content = normalizeContent(inner.content);
  } else if (type === 'summary') {
    content = [{ kind: 'text', text: str(parsed.summary) }];
  }

  return {
    type,
    recordType,
    role,
    content,
    uuid: str(parsed.uuid),
    parentUuid: str(parsed.parentUuid),
    timestamp: str(parsed.timestamp),
    raw: parsed,
  };
}

/**
 * 解析 JSONL transcript
 *
 * @param jsonlContent - 完整 JSONL 文字內容（多行）
 * @returns 依來源順序排列的 Message；沒有有效行時為空陣列
 */
export function parseTranscript(jsonlContent: string): Message[] {
  const messages: Message[] = [];

  for (const rawLine of jsonlContent.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const message = parseRecord(line);
    if (message) messages.push(message);
  }

  return messages;
}

/** 從原始紀錄找第一個 cwd（工作目錄提示） */
export function findWorkingDirectory(messages: readonly Message[]): string {
  for (const msg of messages) {
    const cwd = msg.raw.cwd;
    if (typeof cwd === 'string' && cwd) return cwd;
  }
  return '';
}
