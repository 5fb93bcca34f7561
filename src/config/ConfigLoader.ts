import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../domain/errors/DomainErrors.js';
import type { SessbriefConfig, PartialConfig, PathsConfig } from './types.js';

export type { SessbriefConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = 'config.json';

/** 設定檔 schema：每個區塊皆可部分指定 */
const configFileSchema = z.object({
  version: z.number().int().optional(),
  paths: z.object({
    projectsDir: z.string(),
    briefingsDir: z.string(),
    insightsDir: z.string(),
    locksDir: z.string(),
    logsDir: z.string(),
  }).partial().optional(),
  lock: z.object({
    maxAgeSec: z.number(),
    staleAfterSec: z.number(),
  }).partial().optional(),
  git: z.object({
    timeoutMs: z.number(),
    maxDiffChars: z.number(),
  }).partial().optional(),
  summarizer: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string(),
    apiKey: z.string(),
    model: z.string(),
    maxAttempts: z.number(),
    maxInputChars: z.number(),
    maxTokens: z.number(),
    timeoutMs: z.number(),
  }).partial().optional(),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).partial().optional(),
});

/** 預設設定目錄：$SESSBRIEF_HOME 或 ~/.config/sessbrief */
export function defaultConfigDir(): string {
  return process.env.SESSBRIEF_HOME ?? path.join(os.homedir(), '.config', 'sessbrief');
}

/** 未指定時使用預設目錄，並轉為絕對路徑 */
export function resolveConfigDir(configDir?: string): string {
  return path.resolve(configDir ?? defaultConfigDir());
}

/** 合併：partial 覆蓋 base（逐區塊淺合併） */
function mergeConfig(base: SessbriefConfig, partial: PartialConfig): SessbriefConfig {
  return {
    version: partial.version ?? base.version,
    paths: { ...base.paths, ...partial.paths },
    lock: { ...base.lock, ...partial.lock },
    git: { ...base.git, ...partial.git },
    summarizer: { ...base.summarizer, ...partial.summarizer },
    log: { ...base.log, ...partial.log },
  };
}

/** 展開 `~/`，相對路徑以 configDir 為基準 */
function resolveDataPath(configDir: string, value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return path.resolve(configDir, value);
}

function resolvePaths(configDir: string, paths: PathsConfig): PathsConfig {
  return {
    projectsDir: resolveDataPath(configDir, paths.projectsDir),
    briefingsDir: resolveDataPath(configDir, paths.briefingsDir),
    insightsDir: resolveDataPath(configDir, paths.insightsDir),
    locksDir: resolveDataPath(configDir, paths.locksDir),
    logsDir: resolveDataPath(configDir, paths.logsDir),
  };
}

/** 不讀設定檔時的資料路徑 */
export function defaultPaths(configDir: string): PathsConfig {
  return resolvePaths(configDir, DEFAULT_CONFIG.paths);
}

/** 環境變數覆蓋：OPENAI_API_KEY、OPENAI_BASE_URL、SESSBRIEF_MODEL */
function applyEnvOverrides(config: SessbriefConfig): void {
  const apiKey = process.env.OPENAI_API_KEY;
  if (apiKey && !config.summarizer.apiKey) config.summarizer.apiKey = apiKey;

  const baseUrl = process.env.OPENAI_BASE_URL;
  if (baseUrl) config.summarizer.baseUrl = baseUrl;

  const model = process.env.SESSBRIEF_MODEL;
  if (model) config.summarizer.model = model;
}

function requirePositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: SessbriefConfig): void {
  requirePositive(config.lock.maxAgeSec, 'lock.maxAgeSec');
  requirePositive(config.lock.staleAfterSec, 'lock.staleAfterSec');
  requirePositive(config.git.timeoutMs, 'git.timeoutMs');
  requirePositive(config.git.maxDiffChars, 'git.maxDiffChars');
  requirePositive(config.summarizer.maxInputChars, 'summarizer.maxInputChars');
  requirePositive(config.summarizer.maxTokens, 'summarizer.maxTokens');
  requirePositive(config.summarizer.timeoutMs, 'summarizer.timeoutMs');

  if (!Number.isInteger(config.summarizer.maxAttempts) || config.summarizer.maxAttempts < 1) {
    throw new ConfigError('summarizer.maxAttempts must be a positive integer');
  }
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${configPath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 {configDir}/config.json（若存在）並合併到預設值上
 * @param configDir - 設定與資料根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  configDir: string = defaultConfigDir(),
  overrides?: PartialConfig,
): SessbriefConfig {
  const fileConfig = readConfigFile(path.join(configDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides
  let merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  applyEnvOverrides(merged);
  validate(merged);

  merged.paths = resolvePaths(configDir, merged.paths);
  return merged;
}
