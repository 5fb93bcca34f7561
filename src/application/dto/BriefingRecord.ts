import { z } from 'zod';
import type { SessionBriefing, RiskRecord } from '../../domain/entities/Briefing.js';

/**
 * Briefing 的 wire format（snake_case）
 *
 * 同一份 schema 用於解析摘要服務回應與讀寫 briefing JSON 檔。
 * 欄位缺漏時補預設值，只在型別錯誤時失敗。
 */

const BuiltItemSchema = z.object({
  file: z.string().default('unknown'),
  description: z.string().default(''),
  key_code: z.string().default(''),
  key_decisions: z.array(z.string()).default([]),
});

const PatternSchema = z.object({
  pattern: z.string().default(''),
  where: z.string().default(''),
  explained: z.string().default(''),
});

const RiskSchema = z.object({
  issue: z.string().default(''),
  where: z.string().default(''),
  why: z.string().default(''),
  what_to_check: z.string().default(''),
});

const ConceptSchema = z.object({
  concept: z.string().default(''),
  in_code: z.string().default(''),
  developer_understood: z.boolean().default(false),
  evidence: z.string().default(''),
});

export const BriefingResponseSchema = z.object({
  session_summary: z.string().default(''),
  what_got_built: z.array(BuiltItemSchema).default([]),
  how_pieces_connect: z.string().default(''),
  patterns_used: z.array(PatternSchema).default([]),
  will_bite_you: RiskSchema.nullish(),
  concepts_touched: z.array(ConceptSchema).default([]),
});

export const BriefingRecordSchema = BriefingResponseSchema.extend({
  session_id: z.string(),
  project_path: z.string().default(''),
  created_at: z.string().default(''),
});

export type BriefingResponse = z.infer<typeof BriefingResponseSchema>;
export type BriefingRecord = z.infer<typeof BriefingRecordSchema>;

export interface BriefingMeta {
  sessionId: string;
  projectPath: string;
  createdAt: string;
}

/** 所有欄位皆空的 will_bite_you 視為沒有 */
function toRisk(risk: BriefingResponse['will_bite_you']): RiskRecord | undefined {
  if (!risk) return undefined;
  if (!risk.issue && !risk.where && !risk.why && !risk.what_to_check) return undefined;
  return { issue: risk.issue, where: risk.where, why: risk.why, whatToCheck: risk.what_to_check };
}

export function briefingFromResponse(data: BriefingResponse, meta: BriefingMeta): SessionBriefing {
  return {
    sessionId: meta.sessionId,
    projectPath: meta.projectPath,
    sessionSummary: data.session_summary,
    whatGotBuilt: data.what_got_built.map((item) => ({
      file: item.file,
      description: item.description,
      keyCode: item.key_code,
      keyDecisions: item.key_decisions,
    })),
    howPiecesConnect: data.how_pieces_connect,
    patternsUsed: data.patterns_used.map((p) => ({ ...p })),
    willBiteYou: toRisk(data.will_bite_you),
    conceptsTouched: data.concepts_touched.map((c) => ({
      concept: c.concept,
      inCode: c.in_code,
      developerUnderstood: c.developer_understood,
      evidence: c.evidence,
    })),
    createdAt: meta.createdAt,
  };
}

export function fromRecord(record: BriefingRecord): SessionBriefing {
  return briefingFromResponse(record, {
    sessionId: record.session_id,
    projectPath: record.project_path,
    createdAt: record.created_at,
  });
}

export function toRecord(briefing: SessionBriefing): BriefingRecord {
  const risk = briefing.willBiteYou;
  return {
    session_id: briefing.sessionId,
    project_path: briefing.projectPath,
    session_summary: briefing.sessionSummary,
    what_got_built: briefing.whatGotBuilt.map((item) => ({
      file: item.file,
      description: item.description,
      key_code: item.keyCode,
      key_decisions: item.keyDecisions,
    })),
    how_pieces_connect: briefing.howPiecesConnect,
    patterns_used: briefing.patternsUsed.map((p) => ({ ...p })),
    will_bite_you: risk
      ? { issue: risk.issue, where: risk.where, why: risk.why, what_to_check: risk.whatToCheck }
      : null,
    concepts_touched: briefing.conceptsTouched.map((c) => ({
      concept: c.concept,
      in_code: c.inCode,
      developer_understood: c.developerUnderstood,
      evidence: c.evidence,
    })),
    created_at: briefing.createdAt,
  };
}
