import OpenAI from 'openai';
import type { SummarizerPort, SummaryRequest } from '../../domain/ports/SummarizerPort.js';
import type { SessionBriefing } from '../../domain/entities/Briefing.js';
import {
  SummarizerError,
  SummarizerRateLimitError,
  SummarizerResponseError,
} from '../../domain/errors/DomainErrors.js';
import {
  BriefingResponseSchema,
  type BriefingResponse,
  briefingFromResponse,
} from '../../application/dto/BriefingRecord.js';
import { renderSummaryInput } from '../../application/formatters/SummaryInputFormatter.js';
import { withRetry, RetryExhaustedError } from '../../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * OpenAI-compatible 摘要服務
 *
 * 單一 chat completion 呼叫產出整份 briefing。
 * 回應無法解析時重試（共 maxAttempts 次）；rate limit 與其他 API 錯誤不重試。
 * 支援任何 OpenAI-compatible endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）。
 */

export const BRIEFING_PROMPT = `You are reviewing a coding session between a developer and an AI assistant.
You receive two inputs:
1. CODEBASE DIFF: the code that actually changed. Treat it as ground truth.
2. CONVERSATION: the developer's messages and the assistant's replies. Use it to learn intent.

If the two disagree, believe the diff.

Write a post-session briefing. Name real files, functions and patterns from the diff; avoid generic advice.

Reply with a single JSON object of this shape:

{
  "session_summary": "Two or three sentences on what changed, naming files and behaviour.",
  "what_got_built": [
    {
      "file": "path/to/file",
      "description": "What the file does, in plain words",
      "key_code": "The central function or class and its job",
      "key_decisions": ["A choice that was made and the alternative it beat"]
    }
  ],
  "how_pieces_connect": "Two or three sentences on how the files relate: imports, call paths, data flow.",
  "patterns_used": [
    {
      "pattern": "Pattern name",
      "where": "file:function taken from the diff",
      "explained": "One or two sentences on what it does here."
    }
  ],
  "will_bite_you": {
    "issue": "The one thing most likely to break",
    "where": "file:function or line",
    "why": "What makes it fragile",
    "what_to_check": "Where to look first when it does"
  },
  "concepts_touched": [
    {
      "concept": "A technical concept the session relied on",
      "in_code": "Where it shows up in the diff",
      "developer_understood": true,
      "evidence": "What in the conversation shows the developer's grasp (or lack of it)"
    }
  ]
}

Output the JSON only, without markdown fences.`;

export interface OpenAISummarizerConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  maxAttempts: number;
  maxTokens: number;
  timeoutMs: number;
  /** 重試間隔基準（毫秒） */
  retryBaseDelayMs?: number;
  /** 產生 createdAt 的時鐘 */
  now?: () => Date;
}

/** 去除 ``` 或 ```json 包裹 */
export function stripJsonFence(text: string): string {
  let body = text.trim();
  if (!body.startsWith('```')) return body;

  const lines = body.split('\n');
  lines.shift();
  if (lines.length > 0 && lines[lines.length - 1]?.trim() === '```') lines.pop();
  body = lines.join('\n');
  return body.trim();
}

export class OpenAISummarizerAdapter implements SummarizerPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly logger = new Logger('OpenAISummarizerAdapter');

  constructor(private readonly config: OpenAISummarizerConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      // 重試由 withRetry 控制
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  async summarize(request: SummaryRequest): Promise<SessionBriefing> {
    const userMessage = renderSummaryInput(request);

    try {
      return await withRetry(
        (attempt) => this.attemptOnce(request, userMessage, attempt),
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs ?? 500,
          maxDelayMs: 5000,
          isRetryable: (err) => err instanceof SummarizerResponseError,
          onRetry: (attempt, err) => {
            this.logger.warn('Unparseable summarizer response, retrying', {
              attempt,
              error: errorMessage(err),
            });
          },
        },
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new SummarizerResponseError(
          `Failed to parse summarizer response after ${err.attempts} attempts: ${errorMessage(err.lastError)}`,
          { cause: err.lastError },
        );
      }
      throw err;
    }
  }

  private async attemptOnce(
    request: SummaryRequest,
    userMessage: string,
    attempt: number,
  ): Promise<SessionBriefing> {
    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        messages: [
          { role: 'system', content: BRIEFING_PROMPT },
          { role: 'user', content: userMessage },
        ],
      });
      content = response.choices[0]?.message?.content ?? '';
    } catch (err) {
      if (err instanceof OpenAI.RateLimitError) {
        throw new SummarizerRateLimitError(
          'Summarizer rate limit exceeded. Wait a minute and try again, or analyze a smaller session.',
          { cause: err },
        );
      }
      throw new SummarizerError(`Summarizer API error: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.debug('Summarizer responded', { attempt, chars: content.length });
    return briefingFromResponse(this.parse(content), {
      sessionId: request.sessionId,
      projectPath: request.projectPath,
      createdAt: (this.config.now?.() ?? new Date()).toISOString(),
    });
  }

  private parse(content: string): BriefingResponse {
    let json: unknown;
    try {
      json = JSON.parse(stripJsonFence(content));
    } catch (err) {
      throw new SummarizerResponseError(`Response is not JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = BriefingResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SummarizerResponseError(
        `Response does not match briefing schema: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      );
    }
    return parsed.data;
  }
}
