import type { SessbriefConfig } from '../config/types.js';
import { loadConfig, resolveConfigDir } from '../config/ConfigLoader.js';
import { Logger } from '../shared/Logger.js';
import type { SummarizerPort } from '../domain/ports/SummarizerPort.js';
import { ProjectsDirTranscriptSource } from '../infrastructure/session/ProjectsDirTranscriptSource.js';
import { GitCliAdapter } from '../infrastructure/vcs/GitCliAdapter.js';
import { OpenAISummarizerAdapter } from '../infrastructure/llm/OpenAISummarizerAdapter.js';
import { NullSummarizerAdapter } from '../infrastructure/llm/NullSummarizerAdapter.js';
import { FileBriefingStore } from '../infrastructure/storage/FileBriefingStore.js';
import { FileInsightStore } from '../infrastructure/storage/FileInsightStore.js';
import { createLauncher, createLockStore } from './triggerContainer.js';
import { ChangeSetExtractor } from '../application/ChangeSetExtractor.js';
import { SummaryInputFormatter } from '../application/formatters/SummaryInputFormatter.js';
import { ExtractionUseCase } from '../application/ExtractionUseCase.js';
import { BackgroundExtractionUseCase } from '../application/BackgroundExtractionUseCase.js';
import { TriggerUseCase } from '../application/TriggerUseCase.js';
import { StatusUseCase } from '../application/StatusUseCase.js';

/** 由設定組裝所有 adapter 與用例；CLI 與 MCP 共用 */
export function createContainer(config: SessbriefConfig, configDir: string) {
  const source = new ProjectsDirTranscriptSource(config.paths.projectsDir);
  const briefings = new FileBriefingStore(config.paths.briefingsDir);
  const insights = new FileInsightStore(config.paths.insightsDir);
  const locks = createLockStore(config);
  const launcher = createLauncher(config, configDir);

  const extraction = new ExtractionUseCase({
    source,
    extractor: new ChangeSetExtractor(
      new GitCliAdapter({ timeoutMs: config.git.timeoutMs }),
      config.git.maxDiffChars,
    ),
    formatter: new SummaryInputFormatter(config.summarizer.maxInputChars),
    summarizer: createSummarizer(config),
    briefings,
    insights,
  });

  return {
    source,
    briefings,
    insights,
    locks,
    extraction,
    background: new BackgroundExtractionUseCase(extraction, locks),
    trigger: new TriggerUseCase(locks, launcher, config.lock),
    status: new StatusUseCase(source, briefings, insights),
  };
}

export type Container = ReturnType<typeof createContainer>;

export function createSummarizer(config: SessbriefConfig): SummarizerPort {
  if (config.summarizer.provider === 'openai-compatible') {
    return new OpenAISummarizerAdapter({
      baseUrl: config.summarizer.baseUrl,
      apiKey: config.summarizer.apiKey,
      model: config.summarizer.model,
      maxAttempts: config.summarizer.maxAttempts,
      maxTokens: config.summarizer.maxTokens,
      timeoutMs: config.summarizer.timeoutMs,
    });
  }
  return new NullSummarizerAdapter();
}

/** 載入設定、套用 log 等級並組裝 container */
export function bootstrap(configDir?: string): { config: SessbriefConfig; container: Container } {
  const dir = resolveConfigDir(configDir);
  const config = loadConfig(dir);
  Logger.setDefaultLevel(config.log.level);
  return { config, container: createContainer(config, dir) };
}
