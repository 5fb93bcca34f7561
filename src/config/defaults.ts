import type { SessbriefConfig } from './types.js';

export const DEFAULT_CONFIG: SessbriefConfig = {
  version: 1,
  paths: {
    projectsDir: '~/.claude/projects',
    briefingsDir: 'briefings',
    insightsDir: 'insights',
    locksDir: 'locks',
    logsDir: 'logs',
  },
  lock: {
    maxAgeSec: 60,
    staleAfterSec: 300,
  },
  git: {
    timeoutMs: 30000,
    maxDiffChars: 32000, // 約 8k tokens
  },
  summarizer: {
    provider: 'openai-compatible',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    maxAttempts: 2,
    maxInputChars: 150000,
    maxTokens: 4096,
    timeoutMs: 120000,
  },
  log: {
    level: 'info',
  },
};
