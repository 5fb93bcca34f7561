import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runHook } from '../../../src/cli/commands/hook.js';
import type { HookIO } from '../../../src/cli/commands/hook.js';

const { mockSpawn } = vi.hoisted(() => {
  const child = { pid: 4242, on: vi.fn(), unref: vi.fn() };
  return { mockSpawn: vi.fn(() => child) };
});

vi.mock('node:child_process', () => ({ spawn: mockSpawn }));

const DONE = '{"continue":true,"suppressOutput":true}';

function fakeIO(input: string | Error): { io: HookIO; written: string[] } {
  const written: string[] = [];
  return {
    io: {
      readInput: async () => {
        if (input instanceof Error) throw input;
        return input;
      },
      writeOutput: (text) => {
        written.push(text);
      },
    },
    written,
  };
}

/**
 * Feature: 觸發端邊界
 *
 * 作為 agent 的 hook，我必須總是收到完成訊號並以 0 結束，
 * 不論設定、輸入或背景啟動是否成功。
 */
describe('runHook', () => {
  let configDir: string;

  beforeEach(() => {
    mockSpawn.mockClear();
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessbrief-hook-'));
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  /**
   * Scenario: stop 事件在自訂設定目錄下觸發
   * Given --config-dir 指向暫存目錄
   * When stdin 傳入帶 session_id 的事件
   * Then lock 建在該目錄的 locks/ 下，背景程序收到同一個 --config-dir
   */
  it('should lock and spawn within the given config directory', async () => {
    const { io, written } = fakeIO('{"session_id":"sess-1","cwd":"/work/demo"}');

    const exitCode = await runHook('stop', { configDir }, io);

    expect(exitCode).toBe(0);
    expect(written).toEqual([DONE]);
    expect(fs.existsSync(path.join(configDir, 'locks', 'sess-1.lock'))).toBe(true);
    expect(mockSpawn).toHaveBeenCalledWith(
      expect.any(String),
      expect.arrayContaining(['--session-id', 'sess-1', '--cwd', '/work/demo', '--config-dir', configDir]),
      expect.objectContaining({ detached: true }),
    );
  });

  it('should spawn a snapshot run without locking on pre-compact', async () => {
    const { io, written } = fakeIO('{"session_id":"sess-1"}');

    expect(await runHook('pre-compact', { configDir }, io)).toBe(0);

    expect(written).toEqual([DONE]);
    expect(fs.existsSync(path.join(configDir, 'locks'))).toBe(false);
    expect(mockSpawn).toHaveBeenCalledWith(
      expect.any(String),
      expect.arrayContaining(['--snapshot', '--config-dir', configDir]),
      expect.anything(),
    );
  });

  /**
   * Scenario: 設定檔損壞
   * Given config.json 不是合法 JSON
   * When stop 事件觸發
   * Then 仍回傳完成訊號、結束碼 0，且不啟動背景程序
   */
  it('should answer and exit 0 when the configuration cannot be loaded', async () => {
    fs.writeFileSync(path.join(configDir, 'config.json'), '{ broken');
    const { io, written } = fakeIO('{"session_id":"sess-1"}');

    expect(await runHook('stop', { configDir }, io)).toBe(0);

    expect(written).toEqual([DONE]);
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should answer and exit 0 when stdin is not JSON', async () => {
    const { io, written } = fakeIO('not json at all');

    expect(await runHook('stop', { configDir }, io)).toBe(0);

    expect(written).toEqual([DONE]);
    expect(mockSpawn).not.toHaveBeenCalled();
    expect(fs.existsSync(path.join(configDir, 'locks'))).toBe(false);
  });

  it('should answer and exit 0 when reading stdin fails', async () => {
    const { io, written } = fakeIO(new Error('EPIPE'));

    expect(await runHook('pre-compact', { configDir }, io)).toBe(0);

    expect(written).toEqual([DONE]);
    expect(mockSpawn).not.toHaveBeenCalled();
  });
});
