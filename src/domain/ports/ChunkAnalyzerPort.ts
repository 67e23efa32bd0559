/**
 * Chunk analyzer 抽象介面
 *
 * 將一段逐字稿文字轉為以 chunk 內部編號的 turn 列表。
 * 分析失敗時 reject；呼叫端將其視為該 chunk 結果缺漏。
 */

import type { TranscriptChunk } from '../entities/TranscriptChunk.js';
import type { Turn } from '../entities/Turn.js';

export interface ChunkAnalysisRequest {
  meetingId: string;
  timeZone: string;
  chunk: TranscriptChunk;
  /** chunk 全文 */
  text: string;
  /** 與下一個 chunk 共享的文字（供 prompt context，可省略） */
  overlapText?: string;
}

export interface ChunkAnalyzerPort {
  readonly providerId: string;

  /** @returns chunk 內的 turns，idx 從 0 起算 */
  analyze(request: ChunkAnalysisRequest): Promise<Turn[]>;
}
