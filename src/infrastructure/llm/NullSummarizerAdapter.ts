import type { SummarizerPort, SummaryRequest } from '../../domain/ports/SummarizerPort.js';
import type { SessionBriefing } from '../../domain/entities/Briefing.js';
import { SummarizerError } from '../../domain/errors/DomainErrors.js';

/** summarizer.provider 為 'none' 時使用；任何分析請求都以 SummarizerError 結束 */
export class NullSummarizerAdapter implements SummarizerPort {
  readonly providerId = 'none';

  async summarize(request: SummaryRequest): Promise<SessionBriefing> {
    throw new SummarizerError(
      `Summarizer is disabled (summarizer.provider = "none"); cannot analyze session ${request.sessionId}`,
    );
  }
}
