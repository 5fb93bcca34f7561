import { describe, it, expect } from 'vitest';
import {
  filterTranscript,
  COMMAND_PREVIEW_LENGTH,
} from '../../../src/domain/services/ContentFilter.js';
import {
  assistantMessage,
  fileHistoryMessage,
  progressMessage,
  summaryMessage,
  text,
  toolResult,
  toolUse,
  userMessage,
} from '../../helpers/transcript.js';

/**
 * Feature: Transcript 過濾
 *
 * 作為分析管線，我需要把 transcript 縮減成高訊號內容，
 * 再交給摘要服務，以控制輸入長度。
 */
describe('filterTranscript', () => {
  /**
   * Scenario: progress 移除、長文字截斷
   * Given [progress, user("hello"), assistant(600 字)]
   * When 過濾
   * Then 剩 2 則訊息，assistant 文字為 303 字並以 ... 結尾
   */
  it('should drop progress records and truncate long assistant text', () => {
    const result = filterTranscript('s1', [
      progressMessage(),
      userMessage('hello'),
      assistantMessage(text('x'.repeat(600))),
    ]);

    expect(result.messages).toHaveLength(2);
    expect(result.stats.removedProgress).toBe(1);
    expect(result.stats.truncatedMessages).toBe(1);

    const block = result.messages[1]?.content[0];
    expect(block?.kind).toBe('text');
    if (block?.kind === 'text') {
      expect(block.text).toHaveLength(303);
      expect(block.text.endsWith('...')).toBe(true);
    }
  });

  it('should leave a 500-character block unchanged and truncate 501 to 303', () => {
    const exact = 'a'.repeat(500);
    const over = 'b'.repeat(501);

    const result = filterTranscript('s1', [
      assistantMessage(text(exact)),
      assistantMessage(text(over)),
    ]);

    expect(result.messages[0]?.content[0]).toEqual({ kind: 'text', text: exact });
    expect(result.messages[1]?.content[0]).toEqual({ kind: 'text', text: 'b'.repeat(300) + '...' });
    expect(result.stats.truncatedMessages).toBe(1);
  });

  it('should drop a 49-character assistant message and keep a 50-character one', () => {
    const result = filterTranscript('s1', [
      assistantMessage(text('c'.repeat(49))),
      assistantMessage(text('d'.repeat(50))),
    ]);

    expect(result.messages).toHaveLength(1);
    expect(result.messages[0]?.content[0]).toEqual({ kind: 'text', text: 'd'.repeat(50) });
  });

  /**
   * Scenario: 以字元（code point）而非 UTF-16 單位計算長度
   * Given 300 字元但 599 個 UTF-16 單位的文字、501 個 emoji、30 個 emoji
   * When 過濾
   * Then 300 字元不截斷；501 字元截為 300 個完整 emoji 加 ...；30 字元的訊息被移除
   */
  it('should measure and cut text by characters, not UTF-16 units', () => {
    const withinLimit = 'a' + '😀'.repeat(299);
    const overLimit = '😀'.repeat(501);

    const result = filterTranscript('s1', [
      assistantMessage(text(withinLimit)),
      assistantMessage(text(overLimit)),
      assistantMessage(text('😀'.repeat(30))),
    ]);

    expect(result.messages).toHaveLength(2);
    expect(result.messages[0]?.content[0]).toEqual({ kind: 'text', text: withinLimit });
    expect(result.messages[1]?.content[0]).toEqual({ kind: 'text', text: '😀'.repeat(300) + '...' });
    expect(result.stats.truncatedMessages).toBe(1);
  });

  it('should not split a surrogate pair in the command preview', () => {
    const command = 'echo ' + '🚀'.repeat(120);
    const result = filterTranscript('s1', [
      assistantMessage(toolUse('Bash', { command })),
    ]);

    expect(result.messages[0]?.content[0]).toEqual({
      kind: 'tool_invocation',
      name: 'Bash',
      parameters: { description: '', command_preview: 'echo ' + '🚀'.repeat(95) },
    });
  });

  it('should keep a short assistant message that also invokes a tool', () => {
    const result = filterTranscript('s1', [
      assistantMessage(text('ok'), toolUse('Read', { file_path: '/a.ts' })),
    ]);

    expect(result.messages).toHaveLength(1);
  });

  it('should keep user messages of any length untouched', () => {
    const long = 'u'.repeat(2000);
    const result = filterTranscript('s1', [userMessage('hi'), userMessage(long)]);

    expect(result.messages).toHaveLength(2);
    expect(result.messages[1]?.content[0]).toEqual({ kind: 'text', text: long });
    expect(result.stats.truncatedMessages).toBe(0);
  });

  it('should keep summary records verbatim', () => {
    const summary = summaryMessage('Refactored the parser');
    const result = filterTranscript('s1', [summary]);

    expect(result.messages).toEqual([summary]);
  });

  it('should reduce file tool parameters to file_path', () => {
    const result = filterTranscript('s1', [
      assistantMessage(toolUse('Write', { file_path: '/src/a.ts', content: 'export const a = 1;\n'.repeat(100) })),
    ]);

    expect(result.messages[0]?.content[0]).toEqual({
      kind: 'tool_invocation',
      name: 'Write',
      parameters: { file_path: '/src/a.ts' },
    });
    expect(result.stats.strippedToolContent).toBe(1);
  });

  it('should reduce Bash parameters to description and a command preview', () => {
    const command = 'npm run build && ' + 'x'.repeat(200);
    const result = filterTranscript('s1', [
      assistantMessage(toolUse('Bash', { command, description: 'Build the project', timeout: 1000 })),
    ]);

    expect(result.messages[0]?.content[0]).toEqual({
      kind: 'tool_invocation',
      name: 'Bash',
      parameters: {
        description: 'Build the project',
        command_preview: command.slice(0, COMMAND_PREVIEW_LENGTH),
      },
    });
  });

  it('should drop all parameters of other tools', () => {
    const result = filterTranscript('s1', [
      assistantMessage(toolUse('Grep', { pattern: 'TODO', path: '/src' })),
    ]);

    expect(result.messages[0]?.content[0]).toEqual({ kind: 'tool_invocation', name: 'Grep', parameters: {} });
  });

  it('should keep only the reference of tool results', () => {
    const result = filterTranscript('s1', [assistantMessage(toolResult('toolu_1'))]);

    expect(result.messages[0]?.content[0]).toEqual({ kind: 'tool_result', referenceId: 'toolu_1' });
  });

  it('should clear the raw record of surviving assistant messages', () => {
    const original = { ...assistantMessage(text('y'.repeat(80))), raw: { cwd: '/work' } };
    const result = filterTranscript('s1', [original]);

    expect(result.messages[0]?.raw).toEqual({});
    expect(original.raw).toEqual({ cwd: '/work' });
  });

  it('should preserve relative order of surviving messages', () => {
    const u1 = userMessage('first');
    const a1 = assistantMessage(text('z'.repeat(60)));
    const u2 = userMessage('second');

    const result = filterTranscript('s1', [u1, progressMessage(), a1, fileHistoryMessage(), u2]);

    expect(result.messages.map((m) => m.uuid)).toEqual([u1.uuid, a1.uuid, u2.uuid]);
  });

  it('should reconcile counts: kept plus removed never exceeds the original', () => {
    const input = [
      progressMessage(),
      progressMessage(),
      fileHistoryMessage(),
      userMessage('q'),
      assistantMessage(text('short')),
      assistantMessage(text('w'.repeat(70))),
    ];

    const { stats, messages } = filterTranscript('s1', input);

    expect(stats.originalCount).toBe(6);
    expect(stats.keptCount).toBe(messages.length);
    expect(stats.keptCount).toBe(2);
    expect(stats.removedProgress).toBe(2);
    expect(stats.removedFileHistory).toBe(1);
    expect(stats.keptCount + stats.removedProgress + stats.removedFileHistory).toBeLessThanOrEqual(stats.originalCount);
  });

  it('should be deterministic', () => {
    const input = [userMessage('hello'), assistantMessage(text('v'.repeat(700)), toolUse('Edit', { file_path: '/b.ts' }))];

    expect(filterTranscript('s1', input)).toEqual(filterTranscript('s1', input));
  });

  it('should return an empty result for an empty transcript', () => {
    const result = filterTranscript('s1', []);

    expect(result.messages).toEqual([]);
    expect(result.stats.originalCount).toBe(0);
    expect(result.sessionId).toBe('s1');
  });
});
