import type { MergeConfig } from '../../config/types.js';
import type {
  ChunkAnalysisOutcome,
  ChunkMergeStats,
  MergedTranscript,
} from '../../domain/entities/MergedTranscript.js';
import { overlapWidth, type TranscriptChunk } from '../../domain/entities/TranscriptChunk.js';
import type { Turn } from '../../domain/entities/Turn.js';
import { TextSimilarity } from '../../domain/value-objects/TextSimilarity.js';
import { earliest, latest } from '../../domain/value-objects/Timestamp.js';
import { Logger } from '../../shared/Logger.js';
import { TurnValidator } from './TurnValidator.js';

export interface ChunkMergerOptions extends MergeConfig {
  /** 預設的字元/token 比例；merge 時可改用切分當時的值 */
  charsPerToken: number;
}

/**
 * 將各 chunk 獨立產生的 turn 序列合併為單一、無重複、依時間排序的序列
 *
 * 依 chunkIndex 遞增處理（與分析完成順序無關）。第一個有結果的 chunk 全數加入；
 * 之後每個 chunk 的 turn 只和「overlap window」比對：合併前結果序列的尾端，
 * 大小由上一個 chunk 的 overlap 寬度與 avgTokensPerTurn 估算。
 * 同一說話者（不分大小寫）且 Jaccard 相似度 ≥ similarityThreshold 視為重複，
 * 就地合併（保留較長文字、時間範圍取聯集）；否則附加為新 turn。
 *
 * 缺漏的 chunk 結果只記錄 gap，不中斷合併。
 */
export class ChunkMerger {
  constructor(
    private readonly options: ChunkMergerOptions,
    private readonly logger: Logger = new Logger('ChunkMerger'),
    private readonly validator: TurnValidator = new TurnValidator(),
  ) {}

  merge(
    chunks: readonly TranscriptChunk[],
    outcomes: readonly ChunkAnalysisOutcome[],
    charsPerToken: number = this.options.charsPerToken,
  ): MergedTranscript {
    const warnings: string[] = [];
    const ordered = [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);
    const outcomeByIndex = this.indexOutcomes(ordered, outcomes, warnings);

    const merged: Turn[] = [];
    const missingChunks: number[] = [];
    const chunkStats: ChunkMergeStats[] = [];
    let duplicatesRemoved = 0;
    let previous: { chunk: TranscriptChunk; present: boolean } | undefined;

    for (const chunk of ordered) {
      const outcome = outcomeByIndex.get(chunk.chunkIndex);

      if (!outcome || outcome.status === 'failed') {
        const reason = outcome ? outcome.error : 'no result';
        missingChunks.push(chunk.chunkIndex);
        warnings.push(
          `Chunk ${chunk.chunkIndex} result missing (${reason}); its turns are absent from the merged transcript`,
        );
        this.logger.warn('Skipping missing chunk result', { chunkIndex: chunk.chunkIndex, reason });
        previous = { chunk, present: false };
        continue;
      }

      // 上一個 chunk 缺漏時，結果序列中沒有與本 chunk 共享的文字
      const windowSize = previous?.present ? this.windowSizeFor(previous.chunk, charsPerToken) : 0;
      const stats = this.foldChunk(merged, outcome.turns, chunk.chunkIndex, windowSize);
      chunkStats.push(stats);
      duplicatesRemoved += stats.merged;

      this.logger.info('Chunk merged', {
        chunkIndex: chunk.chunkIndex,
        added: stats.added,
        merged: stats.merged,
        windowSize,
      });
      previous = { chunk, present: true };
    }

    const turns = merged.map((turn, idx) => ({ ...turn, idx }));

    const validationWarnings = this.validator.validate(turns);
    if (validationWarnings.length > 0) {
      this.logger.warn('Merged turns failed validation', { issues: validationWarnings.length });
    }
    warnings.push(...validationWarnings);

    this.logger.info('Merge complete', {
      totalTurns: turns.length,
      chunkCount: ordered.length,
      duplicatesRemoved,
      missingChunks,
    });

    return { turns, duplicatesRemoved, missingChunks, warnings, chunkStats };
  }

  /**
   * overlap window 大小（turn 數）：
   * ceil(overlap token 數 / avgTokensPerTurn)，上限 maxWindowTurns
   */
  windowSizeFor(previous: TranscriptChunk, charsPerToken: number = this.options.charsPerToken): number {
    const overlapTokens = overlapWidth(previous) / charsPerToken;
    if (overlapTokens <= 0) return 0;
    const estimate = Math.ceil(overlapTokens / this.options.avgTokensPerTurn);
    return Math.min(this.options.maxWindowTurns, estimate);
  }

  /** 同一 chunkIndex 有多筆 outcome 時，ok 優先於 failed，其餘以後者為準 */
  private indexOutcomes(
    chunks: readonly TranscriptChunk[],
    outcomes: readonly ChunkAnalysisOutcome[],
    warnings: string[],
  ): Map<number, ChunkAnalysisOutcome> {
    const known = new Set(chunks.map((c) => c.chunkIndex));
    const byIndex = new Map<number, ChunkAnalysisOutcome>();

    for (const outcome of outcomes) {
      if (!known.has(outcome.chunkIndex)) {
        warnings.push(`Result for unknown chunk ${outcome.chunkIndex} ignored`);
        continue;
      }
      const existing = byIndex.get(outcome.chunkIndex);
      if (existing?.status === 'ok' && outcome.status === 'failed') continue;
      byIndex.set(outcome.chunkIndex, outcome);
    }
    return byIndex;
  }

  /**
   * 將一個 chunk 的 turns 併入 merged（就地修改）
   *
   * window 在處理本 chunk 前固定，本 chunk 新加入的 turn 不會成為比對對象。
   * 被合併過的 window turn 仍是候選，並以合併後的文字參與後續比對。
   */
  private foldChunk(
    merged: Turn[],
    incoming: readonly Turn[],
    chunkIndex: number,
    windowSize: number,
  ): ChunkMergeStats {
    const windowEnd = merged.length;
    const windowStart = Math.max(0, windowEnd - windowSize);
    const candidateTokens = merged
      .slice(windowStart, windowEnd)
      .map((turn) => TextSimilarity.tokenSet(turn.text));

    let added = 0;
    let mergedCount = 0;

    for (const turn of incoming) {
      const tokens = TextSimilarity.tokenSet(turn.text);
      let bestPos = -1;
      let bestScore = -1;

      for (let pos = windowStart; pos < windowEnd; pos++) {
        if (!TextSimilarity.sameSpeaker(merged[pos].speaker, turn.speaker)) continue;

        const score = TextSimilarity.jaccard(tokens, candidateTokens[pos - windowStart]);
        if (score > bestScore) {
          bestScore = score;
          bestPos = pos;
        }
      }

      if (bestPos >= 0 && bestScore >= this.options.similarityThreshold) {
        this.logger.debug('Duplicate turn merged', {
          chunkIndex,
          localIdx: turn.idx,
          into: merged[bestPos].idx,
          similarity: Number(bestScore.toFixed(3)),
        });
        merged[bestPos] = mergeTurns(merged[bestPos], turn);
        candidateTokens[bestPos - windowStart] = TextSimilarity.tokenSet(merged[bestPos].text);
        mergedCount++;
      } else {
        merged.push({ ...turn, idx: merged.length });
        added++;
      }
    }

    return { chunkIndex, added, merged: mergedCount, windowSize };
  }
}

/**
 * 合併兩個重複 turn：較長文字（同長保留既有者）連同其 speaker/type/question_likelihood
 * 保留下來，時間範圍取兩者聯集，idx 沿用既有者。
 */
export function mergeTurns(existing: Turn, incoming: Turn): Turn {
  const survivor = incoming.text.length > existing.text.length ? incoming : existing;
  return {
    ...survivor,
    idx: existing.idx,
    start_ts: earliest(existing.start_ts, incoming.start_ts),
    end_ts: latest(existing.end_ts, incoming.end_ts),
  };
}
