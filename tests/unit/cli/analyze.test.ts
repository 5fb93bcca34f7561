import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runBackgroundAnalysis } from '../../../src/cli/commands/analyze.js';
import { FileLockStore } from '../../../src/infrastructure/lock/FileLockStore.js';

describe('runBackgroundAnalysis', () => {
  let configDir: string;
  let locks: FileLockStore;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessbrief-analyze-'));
    locks = new FileLockStore(path.join(configDir, 'locks'));
    locks.createLock('sess-1');
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 背景程序啟動時設定無法載入
   * Given 觸發端已建立 lock，config.json 內容不合法
   * When 執行背景分析
   * Then 不拋出錯誤，且預設 locks 目錄下的 lock 被移除
   */
  it('should release the lock when the configuration is invalid', async () => {
    fs.writeFileSync(path.join(configDir, 'config.json'), '{"lock": {"maxAgeSec": "soon"}}');

    await expect(runBackgroundAnalysis({ sessionId: 'sess-1' }, configDir)).resolves.toBeUndefined();

    expect(fs.existsSync(locks.lockPath('sess-1'))).toBe(false);
  });

  /**
   * Scenario: 找不到 session
   * Given 設定正常但 projects 目錄沒有該 session
   * When 執行背景分析
   * Then 不拋出錯誤，lock 在結束時被移除
   */
  it('should release the lock after a failed analysis', async () => {
    fs.writeFileSync(path.join(configDir, 'config.json'), JSON.stringify({
      paths: { projectsDir: path.join(configDir, 'projects') },
      summarizer: { provider: 'none' },
    }));

    await expect(runBackgroundAnalysis({ sessionId: 'sess-1' }, configDir)).resolves.toBeUndefined();

    expect(fs.existsSync(locks.lockPath('sess-1'))).toBe(false);
  });
});
