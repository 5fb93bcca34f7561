import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TriggerUseCase } from '../../../src/application/TriggerUseCase.js';
import { FileLockStore } from '../../../src/infrastructure/lock/FileLockStore.js';
import type { DetachedRunOptions } from '../../../src/domain/ports/ProcessLauncherPort.js';

/**
 * Feature: 觸發端去重
 *
 * 作為 hook 進入點，我需要在同一 session 短時間內重複觸發時
 * 只啟動一次背景分析。
 */
describe('TriggerUseCase', () => {
  let locksDir: string;
  let nowMs: number;
  let locks: FileLockStore;
  let spawnDetached: Mock<(sessionId: string, options?: DetachedRunOptions) => void>;
  let trigger: TriggerUseCase;

  beforeEach(() => {
    locksDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessbrief-trigger-'));
    nowMs = 1_770_000_000_000;
    locks = new FileLockStore(locksDir, { now: () => nowMs });
    spawnDetached = vi.fn<(sessionId: string, options?: DetachedRunOptions) => void>();
    trigger = new TriggerUseCase(locks, { spawnDetached }, { maxAgeSec: 60, staleAfterSec: 300 });
  });

  afterEach(() => {
    fs.rmSync(locksDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 一秒內兩次 stop
   * Given 同一 session 的 stop 事件相隔 1 秒
   * When 兩次都呼叫 onStop
   * Then 第一次啟動分析，第二次回報 locked，只啟動一個背景程序
   */
  it('should launch once for two stops a second apart', () => {
    const payload = { session_id: 'sess-1', cwd: '/work/demo' };

    expect(trigger.onStop(payload)).toBe('spawned');
    nowMs += 1000;
    expect(trigger.onStop(payload)).toBe('locked');

    expect(spawnDetached).toHaveBeenCalledTimes(1);
    expect(spawnDetached).toHaveBeenCalledWith('sess-1', { cwd: '/work/demo' });
    expect(fs.existsSync(locks.lockPath('sess-1'))).toBe(true);
  });

  it('should launch again once the lock has aged out', () => {
    expect(trigger.onStop({ session_id: 'sess-1' })).toBe('spawned');
    nowMs += 61_000;

    expect(trigger.onStop({ session_id: 'sess-1' })).toBe('spawned');
    expect(spawnDetached).toHaveBeenCalledTimes(2);
  });

  it('should sweep stale locks of other sessions', () => {
    locks.createLock('abandoned');
    nowMs += 301_000;

    trigger.onStop({ session_id: 'sess-2' });

    expect(fs.existsSync(locks.lockPath('abandoned'))).toBe(false);
  });

  it('should do nothing without a session id', () => {
    expect(trigger.onStop(undefined)).toBe('no-session');
    expect(trigger.onStop({ cwd: '/work/demo' })).toBe('no-session');
    expect(spawnDetached).not.toHaveBeenCalled();
  });

  it('should report a launcher failure', () => {
    spawnDetached.mockImplementation(() => {
      throw new Error('spawn failed');
    });

    expect(trigger.onStop({ session_id: 'sess-1' })).toBe('failed');
  });

  /**
   * Scenario: 壓縮前快照
   * Given 同一 session 連續兩次 pre-compact
   * When 呼叫 onPreCompact
   * Then 每次都以快照模式啟動，不建立 lock
   */
  it('should launch a snapshot on every pre-compact', () => {
    const payload = { session_id: 'sess-1', cwd: '/work/demo' };

    expect(trigger.onPreCompact(payload)).toBe('spawned');
    expect(trigger.onPreCompact(payload)).toBe('spawned');

    expect(spawnDetached).toHaveBeenCalledTimes(2);
    expect(spawnDetached).toHaveBeenCalledWith('sess-1', { snapshot: true, cwd: '/work/demo' });
    expect(fs.existsSync(locks.lockPath('sess-1'))).toBe(false);
  });

  it('should ignore a pre-compact without a session id', () => {
    expect(trigger.onPreCompact({})).toBe('no-session');
  });
});
