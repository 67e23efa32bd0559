import OpenAI, { APIConnectionTimeoutError, RateLimitError } from 'openai';
import { z } from 'zod';
import type { ChunkAnalysisRequest, ChunkAnalyzerPort } from '../../domain/ports/ChunkAnalyzerPort.js';
import { TurnSchema, TURN_TYPES, type Turn } from '../../domain/entities/Turn.js';
import {
  AnalyzerRateLimitError,
  AnalyzerTimeoutError,
  AnalyzerUnavailableError,
  InvalidAnalyzerResponseError,
  describeError,
} from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * HTTP Chunk Analyzer
 *
 * 透過 OpenAI-compatible chat completions 將 chunk 文字轉為 turn 列表。
 * 支援任何 OpenAI-compatible endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）。
 * 重試交由呼叫端的 withRetry 處理，SDK 本身不重試。
 */

export interface HttpChunkAnalyzerConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
}

const AnalyzerResponseSchema = z.object({
  turns: z.array(TurnSchema),
});

const SYSTEM_PROMPT = `You segment meeting transcripts into speaker turns.
Return ONLY a JSON object of the form {"turns": [...]}, no other text.
Each turn has:
- "idx": 0-based integer, sequential within this excerpt
- "start_ts", "end_ts": wall-clock time "HH:MM:SS"
- "speaker": speaker label exactly as written in the transcript
- "type": one of ${TURN_TYPES.map((t) => `"${t}"`).join(', ')}
- "question_likelihood": number between 0 and 1
- "text": what the speaker said, verbatim
The excerpt may start or end mid-sentence; transcribe partial turns as they appear.`;

export class HttpChunkAnalyzer implements ChunkAnalyzerPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(config: HttpChunkAnalyzerConfig, logger?: Logger) {
    this.model = config.model;
    this.logger = logger ?? new Logger('HttpChunkAnalyzer');
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 120000,
    });
  }

  async analyze(request: ChunkAnalysisRequest): Promise<Turn[]> {
    const { chunk } = request;
    let content: string;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: this.buildUserPrompt(request) },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      });
      content = response.choices[0]?.message?.content?.trim() ?? '';
    } catch (err) {
      this.logger.warn('Chunk analysis request failed', {
        chunkIndex: chunk.chunkIndex,
        error: describeError(err),
      });
      throw this.classifyError(err);
    }

    if (!content) {
      throw new InvalidAnalyzerResponseError('Empty response from analyzer', chunk.chunkIndex);
    }

    const json = this.parseJsonObject(content);
    if (json === undefined) {
      throw new InvalidAnalyzerResponseError('Model response is not valid JSON', chunk.chunkIndex);
    }

    const parsed = AnalyzerResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidAnalyzerResponseError(
        `Invalid response format: ${issue.path.join('.')} ${issue.message}`,
        chunk.chunkIndex,
      );
    }

    this.logger.debug('Chunk analyzed', { chunkIndex: chunk.chunkIndex, turns: parsed.data.turns.length });
    return parsed.data.turns;
  }

  private buildUserPrompt(request: ChunkAnalysisRequest): string {
    const lines = [
      `Meeting: ${request.meetingId}`,
      `Time zone: ${request.timeZone}`,
      `Excerpt ${request.chunk.chunkIndex + 1}${request.chunk.hasNextChunk ? '' : ' (final)'}`,
      '',
      'Transcript excerpt:',
      request.text,
    ];
    if (request.overlapText) {
      lines.push(
        '',
        'The following tail of the excerpt is repeated at the start of the next excerpt:',
        request.overlapText,
      );
    }
    return lines.join('\n');
  }

  private classifyError(err: unknown): Error {
    const message = describeError(err);
    if (err instanceof RateLimitError) {
      return new AnalyzerRateLimitError(message, { cause: err });
    }
    if (err instanceof APIConnectionTimeoutError) {
      return new AnalyzerTimeoutError(message, { cause: err });
    }
    return new AnalyzerUnavailableError(message, { cause: err });
  }

  /** 解析 LLM 回應中的 JSON 物件，處理 markdown code block 與前後雜訊 */
  private parseJsonObject(content: string): unknown {
    const attempts: string[] = [content];

    const fenced = content.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
    if (fenced) attempts.push(fenced[1].trim());

    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start !== -1 && end > start) attempts.push(content.slice(start, end + 1));

    for (const candidate of attempts) {
      try {
        return JSON.parse(candidate);
      } catch {
        // 換下一種擷取方式
      }
    }
    return undefined;
  }
}
