import type { SessbriefConfig } from '../config/types.js';
import { defaultPaths, loadConfig, resolveConfigDir } from '../config/ConfigLoader.js';
import { Logger } from '../shared/Logger.js';
import { FileLockStore } from '../infrastructure/lock/FileLockStore.js';
import { DetachedProcessLauncher } from '../infrastructure/process/DetachedProcessLauncher.js';
import { TriggerUseCase } from '../application/TriggerUseCase.js';

// 觸發端的組裝：只有 lock 與背景啟動，不 import openai、MCP SDK 或 gray-matter

export function createLockStore(config: SessbriefConfig): FileLockStore {
  return new FileLockStore(config.paths.locksDir, {
    maxAgeSec: config.lock.maxAgeSec,
    staleAfterSec: config.lock.staleAfterSec,
  });
}

/** 背景程序沿用同一個設定目錄 */
export function createLauncher(config: SessbriefConfig, configDir: string): DetachedProcessLauncher {
  return new DetachedProcessLauncher(config.paths.logsDir, { configDir });
}

export function createTrigger(configDir?: string): TriggerUseCase {
  const dir = resolveConfigDir(configDir);
  const config = loadConfig(dir);
  Logger.setDefaultLevel(config.log.level);
  return new TriggerUseCase(createLockStore(config), createLauncher(config, dir), config.lock);
}

/** 設定無法載入時，以預設 locks 目錄釋放 lock */
export function releaseLockWithDefaults(configDir: string | undefined, sessionId: string): void {
  new FileLockStore(defaultPaths(resolveConfigDir(configDir)).locksDir).removeLock(sessionId);
}
