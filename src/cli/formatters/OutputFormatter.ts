import type { SessionBriefing } from '../../domain/entities/Briefing.js';
import { toRecord } from '../../application/dto/BriefingRecord.js';
import { renderBriefingMarkdown } from '../../infrastructure/storage/BriefingMarkdown.js';

export type OutputFormat = 'json' | 'markdown' | 'text';

const FORMATS: readonly OutputFormat[] = ['json', 'markdown', 'text'];

export function parseOutputFormat(value: string): OutputFormat {
  const format = FORMATS.find((f) => f === value);
  if (!format) {
    throw new Error(`Unknown format "${value}" (expected one of: ${FORMATS.join(', ')})`);
  }
  return format;
}

/**
 * CLI 輸出格式化
 *
 * - json：結構化輸出（briefing 使用與儲存檔相同的 snake_case 形狀）
 * - markdown：briefing 文件；其他物件同 text
 * - text：人類可讀的平展文字
 */
export class OutputFormatter {
  formatBriefing(briefing: SessionBriefing, format: OutputFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(toRecord(briefing), null, 2);
      case 'markdown':
        return renderBriefingMarkdown(briefing);
      case 'text':
        return this.briefingText(briefing);
    }
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  private briefingText(b: SessionBriefing): string {
    const lines = [`Session ${b.sessionId} (${b.projectPath || 'unknown project'})`, '', b.sessionSummary];

    if (b.whatGotBuilt.length > 0) {
      lines.push('', 'Built:');
      for (const item of b.whatGotBuilt) lines.push(`  ${item.file}: ${item.description}`);
    }
    if (b.willBiteYou) {
      lines.push('', `Watch out: ${b.willBiteYou.issue} (${b.willBiteYou.where})`);
    }
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
