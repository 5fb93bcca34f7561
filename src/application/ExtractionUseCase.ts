import type { TranscriptSourcePort } from '../domain/ports/TranscriptSourcePort.js';
import type { SummarizerPort } from '../domain/ports/SummarizerPort.js';
import type { BriefingStorePort } from '../domain/ports/BriefingStorePort.js';
import type { InsightStorePort } from '../domain/ports/InsightStorePort.js';
import type { SessionInfo } from '../domain/entities/SessionInfo.js';
import { filterTranscript } from '../domain/services/ContentFilter.js';
import { findWorkingDirectory } from '../infrastructure/session/TranscriptParser.js';
import type { ChangeSetExtractor } from './ChangeSetExtractor.js';
import type { SummaryInputFormatter } from './formatters/SummaryInputFormatter.js';
import type { PersistedBriefing } from './dto/PersistedBriefing.js';
import { Logger } from '../shared/Logger.js';

export interface ExtractionRequest {
  /** 未指定時分析最近修改的 session */
  sessionId?: string;
  /** 專案路徑；同時作為 session 查詢的過濾條件 */
  projectPath?: string;
  /** pre-compact 快照：檔名加時間後綴、不更新洞察 */
  snapshot?: boolean;
  /** transcript 沒有 cwd 時使用的工作目錄 */
  cwdHint?: string;
}

export interface ExtractionDeps {
  source: TranscriptSourcePort;
  extractor: ChangeSetExtractor;
  formatter: SummaryInputFormatter;
  summarizer: SummarizerPort;
  briefings: BriefingStorePort;
  insights: InsightStorePort;
}

/**
 * 分析管線：Reader → Filter → ChangeSetExtractor → Summarizer → 儲存
 *
 * 單次執行，不重試（摘要服務本身的重試除外）。
 * session 找不到、transcript 讀不到、摘要失敗、寫檔失敗皆以 typed error 往外拋。
 */
export class ExtractionUseCase {
  private readonly logger = new Logger('ExtractionUseCase');

  constructor(private readonly deps: ExtractionDeps) {}

  async run(request: ExtractionRequest = {}): Promise<PersistedBriefing> {
    const { source, extractor, formatter, summarizer, briefings, insights } = this.deps;

    const session = await this.resolveSession(request);
    const sessionId = session.sessionId;
    let projectPath = request.projectPath || session.projectPath;

    const messages = await source.read(session);
    if (!projectPath) {
      projectPath = findWorkingDirectory(messages) || request.cwdHint || '';
    }

    const filtered = filterTranscript(sessionId, messages);
    this.logger.info('Transcript filtered', { sessionId, ...filtered.stats });

    const changeSet = await extractor.extract(projectPath, messages);
    this.logger.info('Change set extracted', {
      sessionId,
      provenance: changeSet.provenance,
      files: changeSet.files.length,
      truncated: changeSet.truncated,
    });

    const input = formatter.format(filtered.messages, changeSet);
    const briefing = await summarizer.summarize({ sessionId, projectPath, ...input });

    const saved = await briefings.save(briefing, { snapshot: request.snapshot });
    const insight = request.snapshot ? undefined : await insights.merge(briefing);

    return {
      briefing,
      ...saved,
      stats: filtered.stats,
      changeSet: {
        provenance: changeSet.provenance,
        files: changeSet.files.length,
        totalAdditions: changeSet.totalAdditions,
        totalDeletions: changeSet.totalDeletions,
        truncated: changeSet.truncated,
      },
      insight,
    };
  }

  private resolveSession(request: ExtractionRequest): Promise<SessionInfo> {
    const { source } = this.deps;
    return request.sessionId
      ? source.get(request.sessionId, request.projectPath)
      : source.latest(request.projectPath);
  }
}
