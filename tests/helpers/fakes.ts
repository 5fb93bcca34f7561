import type { Message } from '../../src/domain/entities/Message.js';
import type { SessionInfo } from '../../src/domain/entities/SessionInfo.js';
import type { SessionBriefing, BriefingListing } from '../../src/domain/entities/Briefing.js';
import type { AccumulatedInsight } from '../../src/domain/entities/AccumulatedInsight.js';
import type { TranscriptSourcePort } from '../../src/domain/ports/TranscriptSourcePort.js';
import type { SummarizerPort, SummaryRequest } from '../../src/domain/ports/SummarizerPort.js';
import type {
  BriefingSaveOptions,
  BriefingStorePort,
  SavedBriefingPaths,
} from '../../src/domain/ports/BriefingStorePort.js';
import type { InsightStorePort } from '../../src/domain/ports/InsightStorePort.js';
import type { VersionControlPort } from '../../src/domain/ports/VersionControlPort.js';
import { SessionNotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { sampleBriefing } from './transcript.js';

/** 測試用的 in-process 協作者 */

export function sessionInfo(overrides: Partial<SessionInfo> = {}): SessionInfo {
  return {
    sessionId: 'sess-1',
    fullPath: '/nonexistent/sess-1.jsonl',
    firstPrompt: 'add retries',
    summary: '',
    messageCount: 2,
    created: '2026-03-01T10:00:00.000Z',
    modified: '2026-03-01T11:00:00.000Z',
    gitBranch: 'main',
    projectPath: '/work/demo',
    ...overrides,
  };
}

export interface StoredSession {
  info: SessionInfo;
  messages: Message[];
}

export class InMemoryTranscriptSource implements TranscriptSourcePort {
  constructor(private readonly sessions: StoredSession[] = []) {}

  async list(projectFilter?: string): Promise<SessionInfo[]> {
    return this.sessions
      .map((s) => s.info)
      .filter((info) => !projectFilter || info.projectPath === projectFilter)
      .sort((a, b) => (a.modified < b.modified ? 1 : a.modified > b.modified ? -1 : 0));
  }

  async latest(projectFilter?: string): Promise<SessionInfo> {
    const [first] = await this.list(projectFilter);
    if (!first) throw new SessionNotFoundError('no sessions found');
    return first;
  }

  async get(sessionId: string, projectFilter?: string): Promise<SessionInfo> {
    const found = (await this.list(projectFilter)).find((info) => info.sessionId === sessionId);
    if (!found) throw new SessionNotFoundError(sessionId);
    return found;
  }

  async read(session: SessionInfo): Promise<Message[]> {
    return this.sessions.find((s) => s.info.sessionId === session.sessionId)?.messages ?? [];
  }
}

/** 記錄收到的請求，回傳以 sampleBriefing 為底的 briefing */
export class StubSummarizer implements SummarizerPort {
  readonly providerId = 'stub';
  readonly requests: SummaryRequest[] = [];

  async summarize(request: SummaryRequest): Promise<SessionBriefing> {
    this.requests.push(request);
    return sampleBriefing({ sessionId: request.sessionId, projectPath: request.projectPath });
  }
}

export class InMemoryBriefingStore implements BriefingStorePort {
  readonly saved: Array<{ briefing: SessionBriefing; snapshot: boolean }> = [];

  async save(briefing: SessionBriefing, options: BriefingSaveOptions = {}): Promise<SavedBriefingPaths> {
    const snapshot = options.snapshot ?? false;
    this.saved.push({ briefing, snapshot });
    const stem = snapshot ? `${briefing.sessionId}-snapshot` : briefing.sessionId;
    return { jsonPath: `/briefings/${stem}.json`, markdownPath: `/briefings/${stem}.md` };
  }

  async load(sessionId: string): Promise<SessionBriefing | undefined> {
    return this.saved.filter((s) => !s.snapshot).map((s) => s.briefing).find((b) => b.sessionId === sessionId);
  }

  async list(): Promise<BriefingListing[]> {
    return this.saved
      .filter((s) => !s.snapshot)
      .map(({ briefing }) => ({
        sessionId: briefing.sessionId,
        projectPath: briefing.projectPath,
        sessionSummary: briefing.sessionSummary,
        createdAt: briefing.createdAt,
      }));
  }
}

export class InMemoryInsightStore implements InsightStorePort {
  readonly merged: SessionBriefing[] = [];
  private readonly byProject = new Map<string, AccumulatedInsight>();

  async merge(briefing: SessionBriefing): Promise<AccumulatedInsight> {
    this.merged.push(briefing);
    const previous = this.byProject.get(briefing.projectPath);
    const insight: AccumulatedInsight = {
      projectPath: briefing.projectPath,
      recurringPatterns: briefing.patternsUsed.map((p) => p.pattern),
      knownIssues: briefing.willBiteYou ? [briefing.willBiteYou.issue] : [],
      architectureNotes: [briefing.howPiecesConnect],
      lastUpdated: briefing.createdAt,
      briefingCount: (previous?.briefingCount ?? 0) + 1,
    };
    this.byProject.set(briefing.projectPath, insight);
    return insight;
  }

  async list(): Promise<AccumulatedInsight[]> {
    return [...this.byProject.values()];
  }
}

/** 沒有任何工作樹的版本控制 */
export const noWorkTreeVcs: VersionControlPort = {
  isWorkTree: async () => false,
  diff: async () => '',
  status: async () => '',
};
