import type { ChunkingConfig } from '../../config/types.js';
import type { TranscriptChunk } from '../../domain/entities/TranscriptChunk.js';
import { ConfigValidationError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { BoundaryFinder } from './BoundaryFinder.js';

/**
 * Sliding-window chunking：將過長的逐字稿切成互相重疊的 chunk，
 * 讓每段可獨立、平行分析，之後再由 ChunkMerger 合併。
 *
 * - 估算 token 數（length / charsPerToken）不超過 thresholdTokens 時直接回傳單一 chunk
 * - 否則每段長 chunkSizeTokens，往回找自然切點，並與下一段重疊 overlapTokens
 * - 下一段起點一律由實際切點推得（end - overlapChars），不使用固定 stride
 */
export class SlidingWindowChunker {
  private readonly boundaryFinder = new BoundaryFinder();
  private readonly chunkSizeChars: number;
  private readonly overlapChars: number;

  constructor(
    readonly config: ChunkingConfig,
    private readonly logger: Logger = new Logger('SlidingWindowChunker'),
  ) {
    if (config.charsPerToken <= 0 || config.overlapTokens <= 0) {
      throw new ConfigValidationError('charsPerToken and overlapTokens must be positive');
    }
    if (config.chunkSizeTokens <= config.overlapTokens) {
      throw new ConfigValidationError('chunkSizeTokens must be greater than overlapTokens');
    }
    this.chunkSizeChars = config.chunkSizeTokens * config.charsPerToken;
    this.overlapChars = config.overlapTokens * config.charsPerToken;
  }

  /** token 估算：字元數 / charsPerToken */
  estimateTokens(text: string): number {
    return text.length / this.config.charsPerToken;
  }

  needsChunking(text: string): boolean {
    return this.estimateTokens(text) > this.config.thresholdTokens;
  }

  chunk(text: string): TranscriptChunk[] {
    if (text.length === 0) return [];

    if (!this.needsChunking(text)) {
      return [this.describe(0, 0, text.length, 'end', undefined)];
    }

    return this.slide(text);
  }

  private slide(text: string): TranscriptChunk[] {
    const chunks: TranscriptChunk[] = [];
    const total = text.length;

    this.logger.info('Chunking transcript', {
      totalChars: total,
      estimatedTokens: Math.ceil(this.estimateTokens(text)),
      chunkSizeChars: this.chunkSizeChars,
      overlapChars: this.overlapChars,
    });

    let start = 0;
    for (;;) {
      const tentativeEnd = Math.min(start + this.chunkSizeChars, total);
      const { position: end, kind } = tentativeEnd < total
        // floor = start + overlapChars：保證 end - overlapChars > start
        ? this.boundaryFinder.find(text, tentativeEnd, this.overlapChars, start + this.overlapChars)
        : { position: total, kind: 'end' as const };

      if (kind === 'whitespace' || kind === 'hard') {
        this.logger.warn('No natural break found, degraded chunk boundary', {
          chunkIndex: chunks.length,
          boundary: kind,
          tentativeEnd,
          end,
        });
      }

      const hasNext = end < total;
      const overlapStart = hasNext ? Math.max(start, end - this.overlapChars) : undefined;
      const chunk = this.describe(chunks.length, start, end, kind, overlapStart);
      chunks.push(chunk);

      this.logger.debug('Chunk created', {
        chunkIndex: chunk.chunkIndex,
        startChar: chunk.startChar,
        endChar: chunk.endChar,
        boundary: kind,
      });

      if (overlapStart === undefined) break;
      start = overlapStart;
    }

    this.logger.info('Chunking complete', { chunkCount: chunks.length, totalChars: total });
    return chunks;
  }

  private describe(
    chunkIndex: number,
    startChar: number,
    endChar: number,
    boundary: TranscriptChunk['boundary'],
    overlapStartChar: number | undefined,
  ): TranscriptChunk {
    return {
      chunkIndex,
      startChar,
      endChar,
      ...(overlapStartChar !== undefined ? { overlapStartChar } : {}),
      estimatedTokens: Math.ceil((endChar - startChar) / this.config.charsPerToken),
      hasNextChunk: overlapStartChar !== undefined,
      boundary,
    };
  }
}
