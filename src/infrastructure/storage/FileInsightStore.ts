import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { InsightStorePort } from '../../domain/ports/InsightStorePort.js';
import type { AccumulatedInsight } from '../../domain/entities/AccumulatedInsight.js';
import type { SessionBriefing } from '../../domain/entities/Briefing.js';
import { PersistenceError } from '../../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

const InsightRecordSchema = z.object({
  project_path: z.string().default(''),
  recurring_patterns: z.array(z.string()).default([]),
  known_issues: z.array(z.string()).default([]),
  architecture_notes: z.array(z.string()).default([]),
  last_updated: z.string().default(''),
  briefing_count: z.number().int().nonnegative().default(0),
});

type InsightRecord = z.infer<typeof InsightRecordSchema>;

/** 專案路徑轉檔名：`:`、`/`、`\` 換成 `-`，空路徑為 `_default` */
export function projectSlug(projectPath: string): string {
  return projectPath ? projectPath.replace(/[:/\\]/g, '-') : '_default';
}

function fromRecord(record: InsightRecord): AccumulatedInsight {
  return {
    projectPath: record.project_path,
    recurringPatterns: record.recurring_patterns,
    knownIssues: record.known_issues,
    architectureNotes: record.architecture_notes,
    lastUpdated: record.last_updated,
    briefingCount: record.briefing_count,
  };
}

function toRecord(insight: AccumulatedInsight): InsightRecord {
  return {
    project_path: insight.projectPath,
    recurring_patterns: insight.recurringPatterns,
    known_issues: insight.knownIssues,
    architecture_notes: insight.architectureNotes,
    last_updated: insight.lastUpdated,
    briefing_count: insight.briefingCount,
  };
}

function appendUnique(list: string[], value: string): void {
  if (value && !list.includes(value)) list.push(value);
}

/**
 * 每個專案一個 `<slug>.json`
 * 讀取、合併、寫回之間沒有鎖，併發寫入以最後寫入者為準
 */
export class FileInsightStore implements InsightStorePort {
  private readonly logger = new Logger('FileInsightStore');

  constructor(
    private readonly insightsDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  pathFor(projectPath: string): string {
    return path.join(this.insightsDir, `${projectSlug(projectPath)}.json`);
  }

  async merge(briefing: SessionBriefing): Promise<AccumulatedInsight> {
    const filePath = this.pathFor(briefing.projectPath);
    const insight = (await this.read(filePath)) ?? {
      projectPath: briefing.projectPath,
      recurringPatterns: [],
      knownIssues: [],
      architectureNotes: [],
      lastUpdated: '',
      briefingCount: 0,
    };

    for (const p of briefing.patternsUsed) appendUnique(insight.recurringPatterns, p.pattern);
    appendUnique(insight.knownIssues, briefing.willBiteYou?.issue ?? '');
    appendUnique(insight.architectureNotes, briefing.howPiecesConnect);
    insight.briefingCount += 1;
    insight.lastUpdated = this.now().toISOString();

    try {
      await fs.mkdir(this.insightsDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(toRecord(insight), null, 2), 'utf-8');
    } catch (err) {
      throw new PersistenceError('insights', filePath, errorMessage(err), { cause: err });
    }
    return insight;
  }

  async list(): Promise<AccumulatedInsight[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.insightsDir);
    } catch {
      return [];
    }

    const insights: AccumulatedInsight[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const insight = await this.read(path.join(this.insightsDir, name));
      if (insight) insights.push(insight);
    }
    return insights;
  }

  /** 不存在或格式錯誤時回傳 undefined（格式錯誤的檔案會在下次 merge 時被取代） */
  private async read(filePath: string): Promise<AccumulatedInsight | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch {
      return undefined;
    }

    try {
      return fromRecord(InsightRecordSchema.parse(JSON.parse(raw)));
    } catch (err) {
      this.logger.warn('Discarding malformed insight record', { filePath, error: errorMessage(err) });
      return undefined;
    }
  }
}
