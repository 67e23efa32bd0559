import type { ChunkAnalyzerPort } from '../domain/ports/ChunkAnalyzerPort.js';
import type { TranscriptStorePort } from '../domain/ports/TranscriptStorePort.js';
import type { ChunkAnalysisOutcome } from '../domain/entities/MergedTranscript.js';
import type { ChunkTurnsFile } from '../domain/entities/Turn.js';
import { describeError, isRetryableError } from '../domain/errors/DomainErrors.js';
import { mapWithConcurrency } from '../shared/ConcurrencyLimiter.js';
import { Logger } from '../shared/Logger.js';
import { withRetry, type Sleep } from '../shared/RetryPolicy.js';
import type { ChunkManifest, ChunkManifestEntry } from './dto/ChunkManifest.js';
import type { AnalyzeReport } from './dto/PipelineReports.js';
import { loadChunkManifest } from './ManifestReader.js';
import { MeetingLayout } from './MeetingLayout.js';

export interface AnalyzeOptions {
  maxConcurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  timeZone: string;
  /** 測試可注入 */
  sleep?: Sleep;
}

export interface AnalyzeResult {
  /** 依完成順序排列，merge 前需依 chunkIndex 重新排序 */
  outcomes: ChunkAnalysisOutcome[];
  report: AnalyzeReport;
}

/**
 * Analyze 用例：每個 chunk 呼叫一次 analyzer，最多 maxConcurrency 個同時進行
 *
 * 可重試錯誤以指數退避重試（次數取 maxRetries 與錯誤類型上限的較小者）；
 * 最終失敗的 chunk 記為 failed outcome，不影響其他 chunk。
 * 成功結果寫入 chunk_<i>_turns.json；分析前先刪除舊結果，失敗的 chunk 不留下結果檔。
 */
export class AnalyzeUseCase {
  constructor(
    private readonly store: TranscriptStorePort,
    private readonly analyzer: ChunkAnalyzerPort,
    private readonly options: AnalyzeOptions,
    private readonly logger: Logger = new Logger('AnalyzeUseCase'),
  ) {}

  /** 從 outDir 讀取 manifest 後分析所有 chunk */
  async analyzeDir(outDir: string): Promise<AnalyzeResult> {
    const manifest = await loadChunkManifest(this.store, outDir);
    return this.analyzeAll(manifest, outDir);
  }

  async analyzeAll(manifest: ChunkManifest, outDir: string): Promise<AnalyzeResult> {
    const startTime = Date.now();
    const outcomes: ChunkAnalysisOutcome[] = [];

    this.logger.info('Analyzing chunks', {
      meetingId: manifest.meetingId,
      chunkCount: manifest.chunks.length,
      maxConcurrency: this.options.maxConcurrency,
      analyzer: this.analyzer.providerId,
    });

    await mapWithConcurrency(manifest.chunks, this.options.maxConcurrency, async (entry) => {
      const outcome = await this.analyzeOne(manifest, entry, outDir);
      outcomes.push(outcome);
    });

    const report: AnalyzeReport = {
      meetingId: manifest.meetingId,
      chunkCount: manifest.chunks.length,
      succeeded: outcomes.filter((o) => o.status === 'ok').map((o) => o.chunkIndex).sort((a, b) => a - b),
      failed: outcomes
        .flatMap((o) => (o.status === 'failed' ? [{ chunkIndex: o.chunkIndex, error: o.error }] : []))
        .sort((a, b) => a.chunkIndex - b.chunkIndex),
      durationMs: Date.now() - startTime,
    };

    this.logger.info('Analysis complete', {
      meetingId: manifest.meetingId,
      succeeded: report.succeeded.length,
      failed: report.failed.length,
    });

    return { outcomes, report };
  }

  private async analyzeOne(
    manifest: ChunkManifest,
    entry: ChunkManifestEntry,
    outDir: string,
  ): Promise<ChunkAnalysisOutcome> {
    const { meetingId } = manifest;
    const { chunkIndex } = entry;
    const turnsPath = MeetingLayout.resolve(outDir, entry.outputKey);
    try {
      await this.store.removeFile(turnsPath);
      const text = await this.store.readText(MeetingLayout.resolve(outDir, entry.inputKey));
      const overlap = entry.overlapKey
        ? await this.store.readText(MeetingLayout.resolve(outDir, entry.overlapKey))
        : undefined;

      let retries = 0;
      const turns = await withRetry(
        () => this.analyzer.analyze({
          meetingId,
          timeZone: this.options.timeZone,
          chunk: entry,
          text,
          ...(overlap ? { overlapText: overlap } : {}),
        }),
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          isRetryable: (err) => isRetryableError(err) && retries < err.maxRetries,
          onRetry: (attempt, err, delayMs) => {
            retries = attempt;
            this.logger.warn('Retrying chunk analysis', {
              chunkIndex,
              attempt,
              delayMs: Math.round(delayMs),
              error: describeError(err),
            });
          },
          sleep: this.options.sleep,
        },
      );

      const file: ChunkTurnsFile = {
        meeting_id: meetingId,
        time_zone: this.options.timeZone,
        chunk_index: chunkIndex,
        manifest_created_at: manifest.createdAt,
        turns,
      };
      await this.store.writeJson(turnsPath, file);

      this.logger.info('Chunk analyzed', { chunkIndex, turns: turns.length });
      return { chunkIndex, status: 'ok', turns };
    } catch (err) {
      const error = describeError(err);
      this.logger.error('Chunk analysis failed', { chunkIndex, error });
      return { chunkIndex, status: 'failed', error };
    }
  }
}
