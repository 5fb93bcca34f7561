export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 sessbrief domain 錯誤的基底類別 */
export abstract class SessbriefError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

/** 摘要服務回應無法解析或不符 schema */
export class SummarizerResponseError extends SessbriefError {
  readonly classification = 'retryable' as const;
  readonly code = 'SUMMARIZER_BAD_RESPONSE';
}

export class SummarizerRateLimitError extends SessbriefError {
  readonly classification = 'retryable' as const;
  readonly code = 'SUMMARIZER_RATE_LIMIT';
}

// --- Degradable ---

/** 非 repo、git 不存在、逾時；由 ChangeSetExtractor 吸收並改用 transcript 重建 */
export class VersionControlUnavailableError extends SessbriefError {
  readonly classification = 'degradable' as const;
  readonly code = 'VCS_UNAVAILABLE';
}

// --- Manual ---

export class SessionNotFoundError extends SessbriefError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_NOT_FOUND';

  constructor(
    public readonly sessionId: string,
    options?: ErrorOptions,
  ) {
    super(`Session not found: ${sessionId}`, options);
  }
}

export class SourceUnreadableError extends SessbriefError {
  readonly classification = 'manual' as const;
  readonly code = 'SOURCE_UNREADABLE';

  constructor(
    public readonly sourcePath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot read transcript "${sourcePath}": ${detail}`, options);
  }
}

export class SummarizerError extends SessbriefError {
  readonly classification = 'manual' as const;
  readonly code = 'SUMMARIZER_FAILED';
}

export type PersistenceStage = 'briefing' | 'insights';

export class PersistenceError extends SessbriefError {
  readonly classification = 'manual' as const;
  readonly code = 'PERSISTENCE_FAILED';

  constructor(
    public readonly stage: PersistenceStage,
    public readonly targetPath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to persist ${stage} at "${targetPath}": ${detail}`, options);
  }
}

export class ConfigError extends SessbriefError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';
}
