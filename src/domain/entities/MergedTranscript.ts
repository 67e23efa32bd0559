import type { Turn } from './Turn.js';

/** 單一 chunk 的分析結果；缺少 outcome 與 failed 同樣視為缺漏 */
export type ChunkAnalysisOutcome =
  | { chunkIndex: number; status: 'ok'; turns: Turn[] }
  | { chunkIndex: number; status: 'failed'; error: string };

export interface ChunkMergeStats {
  chunkIndex: number;
  /** 新增到結果序列的 turn 數 */
  added: number;
  /** 被併入 overlap window 既有 turn 的數量 */
  merged: number;
  /** 本 chunk 使用的 overlap window 大小（turn 數） */
  windowSize: number;
}

/** merge 後的正式 turn 序列，idx 為 0..N-1 */
export interface MergedTranscript {
  turns: Turn[];
  duplicatesRemoved: number;
  missingChunks: number[];
  warnings: string[];
  chunkStats: ChunkMergeStats[];
}
