import type { TranscriptStorePort } from '../domain/ports/TranscriptStorePort.js';
import type { ChunkAnalysisOutcome, MergedTranscript } from '../domain/entities/MergedTranscript.js';
import { ChunkTurnsFileSchema } from '../domain/entities/Turn.js';
import { ChunkResultMissingError, describeError } from '../domain/errors/DomainErrors.js';
import type { ChunkMerger } from '../infrastructure/merge/ChunkMerger.js';
import { Logger } from '../shared/Logger.js';
import type { ChunkManifest } from './dto/ChunkManifest.js';
import type { MergeReport } from './dto/PipelineReports.js';
import { loadChunkManifest } from './ManifestReader.js';
import { MeetingLayout } from './MeetingLayout.js';

export interface MergeRequest {
  outDir: string;
  timeZone: string;
  /** 已在記憶體中的 analyze 結果；省略時從 chunk_<i>_turns.json 讀取 */
  outcomes?: ChunkAnalysisOutcome[];
}

export interface MergeResult {
  merged: MergedTranscript;
  report: MergeReport;
}

/**
 * Merge 用例：讀取 manifest 與各 chunk 結果 → ChunkMerger → 寫出 01_turns.json
 *
 * 結果檔缺漏、格式不符或屬於先前的 manifest 時，該 chunk 視為缺漏結果，merge 照常進行。
 * overlap window 以切分時的 charsPerToken 估算。
 */
export class MergeUseCase {
  constructor(
    private readonly store: TranscriptStorePort,
    private readonly merger: ChunkMerger,
    private readonly logger: Logger = new Logger('MergeUseCase'),
  ) {}

  async merge(request: MergeRequest): Promise<MergeResult> {
    const startTime = Date.now();
    const manifest = await loadChunkManifest(this.store, request.outDir);
    const outcomes = request.outcomes ?? await this.readOutcomes(manifest, request.outDir);

    const merged = this.merger.merge(manifest.chunks, outcomes, manifest.chunkingParams.charsPerToken);

    const output = {
      meeting_id: manifest.meetingId,
      time_zone: request.timeZone,
      turns: merged.turns,
      metadata: {
        total_turns: merged.turns.length,
        chunk_count: manifest.chunkCount,
        duplicates_removed: merged.duplicatesRemoved,
        missing_chunks: merged.missingChunks,
        warnings: merged.warnings,
        merged_at: new Date().toISOString(),
      },
    };
    await this.store.writeJson(MeetingLayout.resolve(request.outDir, MeetingLayout.mergedTurnsKey), output);

    const report: MergeReport = {
      meetingId: manifest.meetingId,
      outputKey: MeetingLayout.mergedTurnsKey,
      totalTurns: merged.turns.length,
      chunkCount: manifest.chunkCount,
      duplicatesRemoved: merged.duplicatesRemoved,
      missingChunks: merged.missingChunks,
      warnings: merged.warnings,
      durationMs: Date.now() - startTime,
    };

    this.logger.info('Merged turns written', {
      meetingId: manifest.meetingId,
      totalTurns: report.totalTurns,
      missingChunks: report.missingChunks,
    });
    return { merged, report };
  }

  private async readOutcomes(manifest: ChunkManifest, outDir: string): Promise<ChunkAnalysisOutcome[]> {
    const outcomes: ChunkAnalysisOutcome[] = [];

    for (const entry of manifest.chunks) {
      const turnsPath = MeetingLayout.resolve(outDir, entry.outputKey);
      try {
        if (!(await this.store.fileExists(turnsPath))) {
          throw new ChunkResultMissingError(entry.chunkIndex, `${entry.outputKey} not found`);
        }
        const parsed = ChunkTurnsFileSchema.safeParse(await this.store.readJson(turnsPath));
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new ChunkResultMissingError(
            entry.chunkIndex,
            `${entry.outputKey}: ${issue.path.join('.')} ${issue.message}`,
          );
        }
        const stamp = parsed.data.manifest_created_at;
        if (stamp !== undefined && stamp !== manifest.createdAt) {
          throw new ChunkResultMissingError(
            entry.chunkIndex,
            `${entry.outputKey} belongs to an earlier chunking run (${stamp})`,
          );
        }
        outcomes.push({ chunkIndex: entry.chunkIndex, status: 'ok', turns: parsed.data.turns });
      } catch (err) {
        const error = err instanceof ChunkResultMissingError ? err.reason : describeError(err);
        this.logger.warn('Chunk result unavailable', { chunkIndex: entry.chunkIndex, error });
        outcomes.push({ chunkIndex: entry.chunkIndex, status: 'failed', error });
      }
    }

    return outcomes;
  }
}
