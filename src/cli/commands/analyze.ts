import type { Command } from 'commander';
import path from 'node:path';
import type { ExtractionRequest } from '../../application/ExtractionUseCase.js';
import type { BackgroundExtractionUseCase } from '../../application/BackgroundExtractionUseCase.js';
import { releaseLockWithDefaults } from '../triggerContainer.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

interface AnalyzeOptions {
  configDir?: string;
  sessionId?: string;
  project?: string;
  format: string;
  background?: boolean;
  snapshot?: boolean;
  cwd?: string;
}

/**
 * 背景模式：錯誤只寫入 log，結束碼一律為 0
 *
 * 設定無法載入時，改以預設 locks 目錄釋放觸發端建立的 lock。
 */
export async function runBackgroundAnalysis(request: ExtractionRequest, configDir?: string): Promise<void> {
  const logger = new Logger('analyze');
  let background: BackgroundExtractionUseCase;
  try {
    const { bootstrap } = await import('../container.js');
    background = bootstrap(configDir).container.background;
  } catch (err) {
    logger.error('Background analysis could not start', { sessionId: request.sessionId, error: errorMessage(err) });
    if (request.sessionId) releaseLockWithDefaults(configDir, request.sessionId);
    return;
  }
  await background.run(request);
}

/**
 * 註冊 analyze 指令
 *
 * 用法：
 *   sessbrief analyze [--session-id <id>] [--project <path>] [--format markdown]
 *   sessbrief analyze --session-id <id> --background [--snapshot] [--cwd <dir>]
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Analyze a session and write its briefing')
    .option('--config-dir <path>', 'Configuration and data directory')
    .option('--session-id <id>', 'Session to analyze (default: most recent)')
    .option('--project <path>', 'Project path; also filters session lookup')
    .option('--format <format>', 'Output format: json, markdown or text', 'text')
    .option('--background', 'Run detached: log instead of print, release the session lock, always exit 0')
    .option('--snapshot', 'Keep a timestamped copy and skip the insight update')
    .option('--cwd <dir>', 'Working directory to use when the transcript carries none')
    .action(async (opts: AnalyzeOptions) => {
      const request: ExtractionRequest = {
        sessionId: opts.sessionId,
        projectPath: opts.project ? path.resolve(opts.project) : undefined,
        snapshot: opts.snapshot ?? false,
        cwdHint: opts.cwd,
      };

      if (opts.background) {
        await runBackgroundAnalysis(request, opts.configDir);
        return;
      }

      const { bootstrap } = await import('../container.js');
      const { OutputFormatter, parseOutputFormat } = await import('../formatters/OutputFormatter.js');
      const { toRecord } = await import('../../application/dto/BriefingRecord.js');

      const format = parseOutputFormat(opts.format);
      const { container } = bootstrap(opts.configDir);
      const result = await container.extraction.run(request);

      const formatter = new OutputFormatter();
      if (format === 'json') {
        process.stdout.write(formatter.formatObject({
          briefing: toRecord(result.briefing),
          jsonPath: result.jsonPath,
          markdownPath: result.markdownPath,
          stats: result.stats,
          changeSet: result.changeSet,
        }, 'json') + '\n');
        return;
      }

      process.stdout.write(formatter.formatBriefing(result.briefing, format) + '\n');
      process.stderr.write(`Briefing saved to ${result.markdownPath}\n`);
    });
}
