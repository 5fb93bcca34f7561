export interface BuiltItem {
  file: string;
  description: string;
  keyCode: string;
  keyDecisions: string[];
}

export interface PatternUsed {
  pattern: string;
  where: string;
  explained: string;
}

/** 最可能出問題的一件事 */
export interface RiskRecord {
  issue: string;
  where: string;
  why: string;
  whatToCheck: string;
}

export interface ConceptTouched {
  concept: string;
  inCode: string;
  developerUnderstood: boolean;
  evidence: string;
}

/** 摘要服務產生的 session briefing（加上 session 中繼資料） */
export interface SessionBriefing {
  sessionId: string;
  projectPath: string;
  sessionSummary: string;
  whatGotBuilt: BuiltItem[];
  howPiecesConnect: string;
  patternsUsed: PatternUsed[];
  willBiteYou?: RiskRecord;
  conceptsTouched: ConceptTouched[];
  /** ISO datetime */
  createdAt: string;
}

/** briefing 列表用的摘要資訊 */
export interface BriefingListing {
  sessionId: string;
  projectPath: string;
  sessionSummary: string;
  createdAt: string;
}
