import type { TranscriptStorePort } from '../domain/ports/TranscriptStorePort.js';
import { chunkText, overlapText } from '../domain/entities/TranscriptChunk.js';
import { TranscriptNotFoundError } from '../domain/errors/DomainErrors.js';
import type { SlidingWindowChunker } from '../infrastructure/chunking/SlidingWindowChunker.js';
import { Logger } from '../shared/Logger.js';
import type { ChunkManifest, ChunkManifestEntry } from './dto/ChunkManifest.js';
import { MeetingLayout } from './MeetingLayout.js';

export interface ChunkRequest {
  meetingId: string;
  transcriptPath: string;
  outDir: string;
}

/**
 * Chunk 用例：讀取逐字稿 → sliding-window 切分 → 寫出 chunk 文字與 metadata.json
 *
 * 空白逐字稿不視為錯誤，產生 chunkCount 為 0 的 manifest。
 */
export class ChunkUseCase {
  constructor(
    private readonly store: TranscriptStorePort,
    private readonly chunker: SlidingWindowChunker,
    private readonly logger: Logger = new Logger('ChunkUseCase'),
  ) {}

  async chunk(request: ChunkRequest): Promise<ChunkManifest> {
    const { meetingId, transcriptPath, outDir } = request;

    if (!(await this.store.fileExists(transcriptPath))) {
      throw new TranscriptNotFoundError(transcriptPath);
    }

    const text = await this.store.readText(transcriptPath);
    this.logger.info('Read transcript', { meetingId, chars: text.length });

    if (!text.trim()) {
      this.logger.warn('Transcript is blank, no chunks produced', { meetingId, transcriptPath });
    }
    const chunks = text.trim() ? this.chunker.chunk(text) : [];

    const entries: ChunkManifestEntry[] = [];
    for (const chunk of chunks) {
      const inputKey = MeetingLayout.chunkTextKey(chunk.chunkIndex);
      await this.store.writeText(MeetingLayout.resolve(outDir, inputKey), chunkText(text, chunk));

      // 只有存在下一個 chunk 時才寫 overlap
      let overlapKey: string | undefined;
      const overlap = overlapText(text, chunk);
      if (overlap) {
        overlapKey = MeetingLayout.overlapKey(chunk.chunkIndex);
        await this.store.writeText(MeetingLayout.resolve(outDir, overlapKey), overlap);
      }

      entries.push({
        ...chunk,
        inputKey,
        ...(overlapKey ? { overlapKey } : {}),
        outputKey: MeetingLayout.turnsKey(chunk.chunkIndex),
      });
    }

    const manifest: ChunkManifest = {
      meetingId,
      sourcePath: transcriptPath,
      chunked: chunks.length > 1,
      chunkCount: chunks.length,
      totalChars: text.length,
      estimatedTotalTokens: Math.ceil(this.chunker.estimateTokens(text)),
      chunkingParams: { ...this.chunker.config },
      chunks: entries,
      createdAt: new Date().toISOString(),
    };

    await this.store.writeJson(MeetingLayout.resolve(outDir, MeetingLayout.manifestKey), manifest);
    this.logger.info('Chunk manifest written', { meetingId, chunkCount: chunks.length, chunked: manifest.chunked });

    return manifest;
  }
}
