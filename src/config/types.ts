import type { LogLevel } from '../shared/Logger.js';

/** Sliding-window 切分設定（token 以 charsPerToken 估算） */
export interface ChunkingConfig {
  chunkSizeTokens: number;
  overlapTokens: number;
  /** 估算 token 數不超過此值時不切分 */
  thresholdTokens: number;
  charsPerToken: number;
}

/** Chunk merge 設定 */
export interface MergeConfig {
  /** Jaccard 相似度達此值即視為重複 turn */
  similarityThreshold: number;
  /**
   * 估算 overlap window 用的平均每 turn token 數。
   * 值太大 window 太小，可能漏掉重複；值太小 window 太大，易誤併且比對成本增加。
   */
  avgTokensPerTurn: number;
  /** overlap window 上限（turn 數） */
  maxWindowTurns: number;
}

export type AnalyzerProvider = 'openai-compatible' | 'lines';

/** Chunk analyzer 設定 */
export interface AnalyzerConfig {
  provider: AnalyzerProvider;
  baseUrl: string;
  apiKey?: string;
  model: string;
  /** 同時進行中的 chunk 分析上限 */
  maxConcurrency: number;
  /** 單次請求逾時（毫秒） */
  timeoutMs: number;
  /** 每個 chunk 的重試次數上限（另受各錯誤類型的 maxRetries 限制） */
  maxRetries: number;
  /** 指數退避的基礎延遲（毫秒） */
  retryBaseDelayMs: number;
  /** 會議時區，傳給 analyzer 作為 prompt context */
  timeZone: string;
}

export interface OutputConfig {
  /** 會議輸出根目錄，實際路徑為 <root>/<meetingId>/ */
  root: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface MeetSpliceConfig {
  version: number;
  chunking: ChunkingConfig;
  merge: MergeConfig;
  analyzer: AnalyzerConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof MeetSpliceConfig]?: MeetSpliceConfig[K] extends object
    ? Partial<MeetSpliceConfig[K]>
    : MeetSpliceConfig[K];
};
