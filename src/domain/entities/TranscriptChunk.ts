/** chunk 結尾的切點種類，`end` 表示到達全文結尾 */
export type BoundaryKind = 'paragraph' | 'line' | 'sentence' | 'whitespace' | 'hard' | 'end';

/**
 * 原始逐字稿中的一段切片描述
 *
 * [startChar, endChar) 為半開區間。overlapStartChar 僅在有下一個 chunk 時存在，
 * 標示與下一個 chunk 共享區段的起點；下一個 chunk 從該處開始。
 */
export interface TranscriptChunk {
  readonly chunkIndex: number;
  readonly startChar: number;
  readonly endChar: number;
  readonly overlapStartChar?: number;
  readonly estimatedTokens: number;
  readonly hasNextChunk: boolean;
  readonly boundary: BoundaryKind;
}

export function chunkText(text: string, chunk: TranscriptChunk): string {
  return text.slice(chunk.startChar, chunk.endChar);
}

/** 與下一個 chunk 共享的文字；最後一個 chunk 回傳空字串 */
export function overlapText(text: string, chunk: TranscriptChunk): string {
  if (chunk.overlapStartChar === undefined) return '';
  return text.slice(chunk.overlapStartChar, chunk.endChar);
}

/** 共享區段寬度（字元） */
export function overlapWidth(chunk: TranscriptChunk): number {
  if (chunk.overlapStartChar === undefined) return 0;
  return chunk.endChar - chunk.overlapStartChar;
}
