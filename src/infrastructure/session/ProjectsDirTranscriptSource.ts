import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Message } from '../../domain/entities/Message.js';
import type { SessionInfo } from '../../domain/entities/SessionInfo.js';
import type { TranscriptSourcePort } from '../../domain/ports/TranscriptSourcePort.js';
import { SessionNotFoundError, SourceUnreadableError } from '../../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../../shared/Logger.js';
import { parseTranscript } from './TranscriptParser.js';

export const SESSION_INDEX_FILE = 'sessions-index.json';

/** sessions-index.json 的單筆 entry：型別不符或缺少的欄位以預設值補上 */
const sessionEntrySchema = z.object({
  sessionId: z.string().catch(''),
  fullPath: z.string().catch(''),
  firstPrompt: z.string().catch(''),
  summary: z.string().catch(''),
  messageCount: z.number().catch(0),
  created: z.string().catch(''),
  modified: z.string().catch(''),
  gitBranch: z.string().catch(''),
  projectPath: z.string().optional().catch(undefined),
}).passthrough();

/** entries 逐筆驗證，單筆損壞不影響同一 index 的其他 session */
const sessionIndexSchema = z.object({
  originalPath: z.string().catch(''),
  entries: z.array(z.unknown()).catch([]),
}).passthrough();

type SessionEntry = z.infer<typeof sessionEntrySchema>;

interface SessionIndex {
  originalPath: string;
  entries: SessionEntry[];
}

/**
 * 從 projects 目錄讀取 session
 *
 * 結構：{projectsDir}/{encoded-project}/sessions-index.json + {sessionId}.jsonl
 * 無法讀取或格式錯誤的 index 會被略過。
 */
export class ProjectsDirTranscriptSource implements TranscriptSourcePort {
  private readonly logger = new Logger('TranscriptSource');

  constructor(private readonly projectsDir: string) {}

  async list(projectFilter?: string): Promise<SessionInfo[]> {
    const projectDirs = await this.listProjectDirs();
    const sessions: SessionInfo[] = [];

    for (const dir of projectDirs) {
      const index = await this.readIndex(path.join(dir, SESSION_INDEX_FILE));
      if (!index) continue;
      if (projectFilter && index.originalPath !== projectFilter) continue;

      for (const entry of index.entries) {
        sessions.push({
          sessionId: entry.sessionId,
          fullPath: entry.fullPath,
          firstPrompt: entry.firstPrompt,
          summary: entry.summary,
          messageCount: entry.messageCount,
          created: entry.created,
          modified: entry.modified,
          gitBranch: entry.gitBranch,
          projectPath: entry.projectPath ?? index.originalPath,
        });
      }
    }

    // ISO 字串可直接比較，最新的在前
    sessions.sort((a, b) => (a.modified < b.modified ? 1 : a.modified > b.modified ? -1 : 0));
    return sessions;
  }

  async latest(projectFilter?: string): Promise<SessionInfo> {
    const sessions = await this.list(projectFilter);
    const first = sessions[0];
    if (!first) {
      throw new SessionNotFoundError(projectFilter ? `no sessions for ${projectFilter}` : 'no sessions found');
    }
    return first;
  }

  async get(sessionId: string, projectFilter?: string): Promise<SessionInfo> {
    const sessions = await this.list(projectFilter);
    const found = sessions.find((s) => s.sessionId === sessionId);
    if (!found) throw new SessionNotFoundError(sessionId);
    return found;
  }

  async read(session: SessionInfo): Promise<Message[]> {
    let content: string;
    try {
      content = await fs.readFile(session.fullPath, 'utf-8');
    } catch (err) {
      throw new SourceUnreadableError(
        session.fullPath,
        errorMessage(err),
        { cause: err },
      );
    }
    return parseTranscript(content);
  }

  private async listProjectDirs(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.projectsDir, { withFileTypes: true });
    } catch {
      // projects 目錄不存在：視為沒有任何 session
      return [];
    }
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => path.join(this.projectsDir, e.name))
      .sort();
  }

  private async readIndex(indexPath: string): Promise<SessionIndex | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(indexPath, 'utf-8');
    } catch {
      return undefined;
    }

    try {
      const parsed = sessionIndexSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return { originalPath: parsed.data.originalPath, entries: this.parseEntries(indexPath, parsed.data.entries) };
      }
      this.logger.warn('Skipping malformed session index', { indexPath, issue: parsed.error.issues[0]?.message });
    } catch (err) {
      this.logger.warn('Skipping unparseable session index', { indexPath, error: errorMessage(err) });
    }
    return undefined;
  }

  private parseEntries(indexPath: string, entries: unknown[]): SessionEntry[] {
    const valid: SessionEntry[] = [];
    for (const entry of entries) {
      const parsed = sessionEntrySchema.safeParse(entry);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        this.logger.debug('Skipping non-object session entry', { indexPath });
      }
    }
    return valid;
  }
}
