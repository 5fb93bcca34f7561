import type { LockStorePort } from '../domain/ports/LockStorePort.js';
import type { ExtractionUseCase, ExtractionRequest } from './ExtractionUseCase.js';
import type { PersistedBriefing } from './dto/PersistedBriefing.js';
import { SessbriefError } from '../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../shared/Logger.js';

/**
 * 由觸發端啟動的背景分析
 *
 * 任何結果都不往外拋；結束時一定釋放該 session 的 lock。
 */
export class BackgroundExtractionUseCase {
  private readonly logger = new Logger('BackgroundExtractionUseCase');

  constructor(
    private readonly extraction: ExtractionUseCase,
    private readonly locks: LockStorePort,
  ) {}

  async run(request: ExtractionRequest): Promise<PersistedBriefing | undefined> {
    this.logger.info('Background analysis started', {
      sessionId: request.sessionId,
      snapshot: request.snapshot ?? false,
    });

    try {
      const result = await this.extraction.run(request);
      this.logger.info('Background analysis finished', {
        sessionId: result.briefing.sessionId,
        jsonPath: result.jsonPath,
      });
      return result;
    } catch (err) {
      this.logger.error('Background analysis failed', {
        sessionId: request.sessionId,
        code: err instanceof SessbriefError ? err.code : undefined,
        error: errorMessage(err),
      });
      return undefined;
    } finally {
      if (request.sessionId) this.locks.removeLock(request.sessionId);
    }
  }
}
