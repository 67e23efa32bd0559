/** analyze 階段統計 */
export interface AnalyzeReport {
  meetingId: string;
  chunkCount: number;
  succeeded: number[];
  failed: Array<{ chunkIndex: number; error: string }>;
  durationMs: number;
}

/** merge 階段統計 */
export interface MergeReport {
  meetingId: string;
  outputKey: string;
  totalTurns: number;
  chunkCount: number;
  duplicatesRemoved: number;
  missingChunks: number[];
  warnings: string[];
  durationMs: number;
}
