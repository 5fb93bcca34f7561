import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  BriefingStorePort,
  BriefingSaveOptions,
  SavedBriefingPaths,
} from '../../domain/ports/BriefingStorePort.js';
import type { SessionBriefing, BriefingListing } from '../../domain/entities/Briefing.js';
import { PersistenceError } from '../../domain/errors/DomainErrors.js';
import { BriefingRecordSchema, fromRecord, toRecord } from '../../application/dto/BriefingRecord.js';
import { renderBriefingMarkdown } from './BriefingMarkdown.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/** UTC `YYYYMMDD-HHMMSS` */
export function snapshotStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').slice(0, 15).replace('T', '-');
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * 檔案式 briefing 儲存
 *
 * 每份 briefing 兩個檔：`<id>.json`（snake_case 紀錄）與 `<id>.md`。
 * 同一 session 重新分析時覆寫；snapshot 模式加上時間後綴另存，不出現在 list()。
 */
export class FileBriefingStore implements BriefingStorePort {
  private readonly logger = new Logger('FileBriefingStore');

  constructor(
    private readonly briefingsDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async save(briefing: SessionBriefing, options: BriefingSaveOptions = {}): Promise<SavedBriefingPaths> {
    let baseName = encodeURIComponent(briefing.sessionId);
    if (options.snapshot) baseName += `-${snapshotStamp(this.now())}`;

    const jsonPath = path.join(this.briefingsDir, `${baseName}.json`);
    const markdownPath = path.join(this.briefingsDir, `${baseName}.md`);

    try {
      await fs.mkdir(this.briefingsDir, { recursive: true });
      await fs.writeFile(jsonPath, JSON.stringify(toRecord(briefing), null, 2), 'utf-8');
      await fs.writeFile(markdownPath, renderBriefingMarkdown(briefing), 'utf-8');
    } catch (err) {
      throw new PersistenceError('briefing', jsonPath, errorMessage(err), { cause: err });
    }

    this.logger.info('Briefing saved', { sessionId: briefing.sessionId, jsonPath });
    return { jsonPath, markdownPath };
  }

  async load(sessionId: string): Promise<SessionBriefing | undefined> {
    const jsonPath = path.join(this.briefingsDir, `${encodeURIComponent(sessionId)}.json`);

    let raw: string;
    try {
      raw = await fs.readFile(jsonPath, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw new PersistenceError('briefing', jsonPath, errorMessage(err), { cause: err });
    }

    try {
      return fromRecord(BriefingRecordSchema.parse(JSON.parse(raw)));
    } catch (err) {
      throw new PersistenceError('briefing', jsonPath, `malformed briefing: ${errorMessage(err)}`, { cause: err });
    }
  }

  async list(): Promise<BriefingListing[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.briefingsDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw new PersistenceError('briefing', this.briefingsDir, errorMessage(err), { cause: err });
    }

    const listings: BriefingListing[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const filePath = path.join(this.briefingsDir, name);
      try {
        const record = BriefingRecordSchema.parse(JSON.parse(await fs.readFile(filePath, 'utf-8')));
        // snapshot 檔名帶時間後綴，不列入
        if (name !== `${encodeURIComponent(record.session_id)}.json`) continue;
        listings.push({
          sessionId: record.session_id,
          projectPath: record.project_path,
          sessionSummary: record.session_summary,
          createdAt: record.created_at,
        });
      } catch (err) {
        this.logger.warn('Skipping unreadable briefing', { filePath, error: errorMessage(err) });
      }
    }

    return listings.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}
