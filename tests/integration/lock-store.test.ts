import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { FileLockStore } from '../../src/infrastructure/lock/FileLockStore.js';

/**
 * Feature: Session lock 生命週期
 *
 * unlocked → createLock → locked → 超過 maxAge → 殘留 marker → sweep → unlocked
 */
describe('FileLockStore', () => {
  let locksDir: string;
  let nowMs: number;
  let store: FileLockStore;

  beforeEach(() => {
    locksDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'sessbrief-locks-')), 'locks');
    nowMs = 1_770_000_000_000;
    store = new FileLockStore(locksDir, { now: () => nowMs });
  });

  afterEach(() => {
    fs.rmSync(path.dirname(locksDir), { recursive: true, force: true });
  });

  it('should walk through the lock lifecycle', () => {
    expect(store.isLocked('sess-1')).toBe(false);

    store.createLock('sess-1');
    expect(store.isLocked('sess-1')).toBe(true);
    expect(fs.readFileSync(store.lockPath('sess-1'), 'utf-8')).toBe('1770000000');

    nowMs += 61_000;
    expect(store.isLocked('sess-1')).toBe(false);
    expect(fs.existsSync(store.lockPath('sess-1'))).toBe(true);

    store.removeLock('sess-1');
    expect(fs.existsSync(store.lockPath('sess-1'))).toBe(false);
    expect(store.isLocked('sess-1')).toBe(false);
  });

  it('should honour an explicit max age', () => {
    store.createLock('sess-1');
    nowMs += 61_000;

    expect(store.isLocked('sess-1', 120)).toBe(true);
  });

  it('should refresh an existing lock', () => {
    store.createLock('sess-1');
    nowMs += 59_000;
    store.createLock('sess-1');
    nowMs += 59_000;

    expect(store.isLocked('sess-1')).toBe(true);
  });

  it('should treat unreadable content as unlocked', () => {
    fs.mkdirSync(locksDir, { recursive: true });
    fs.writeFileSync(store.lockPath('sess-1'), 'garbage');

    expect(store.isLocked('sess-1')).toBe(false);
  });

  it('should not fail when removing a missing lock', () => {
    expect(() => store.removeLock('never-created')).not.toThrow();
  });

  it('should encode session ids in lock file names', () => {
    expect(path.basename(store.lockPath('../escape'))).toBe('..%2Fescape.lock');
  });

  /**
   * Scenario: 清掃過期 lock
   * Given 一個過期、一個新鮮、一個內容損壞的 lock，以及一個非 lock 檔
   * When 呼叫 sweepStale
   * Then 移除過期與損壞者，保留新鮮 lock 與其他檔案
   */
  it('should sweep stale and unreadable locks only', () => {
    store.createLock('old');
    nowMs += 301_000;
    store.createLock('fresh');
    fs.writeFileSync(path.join(locksDir, 'bad.lock'), '');
    fs.writeFileSync(path.join(locksDir, 'notes.txt'), 'keep me');

    const removed = store.sweepStale();

    expect(removed).toBe(2);
    expect(fs.readdirSync(locksDir).sort()).toEqual(['fresh.lock', 'notes.txt']);
  });

  it('should sweep nothing when the directory is missing', () => {
    expect(store.sweepStale(0)).toBe(0);
  });
});
