import type { BoundaryKind } from '../../domain/entities/TranscriptChunk.js';

export interface BoundaryMatch {
  /** chunk 結尾（exclusive） */
  position: number;
  kind: BoundaryKind;
}

type BoundaryMatcher = (text: string, pos: number) => boolean;

const SENTENCE_TERMINATORS = new Set(['.', '!', '?']);

function isWhitespace(ch: string): boolean {
  return ch !== '' && ch.trim() === '';
}

/** pos 前一個字元是換行，且再往前是空白行 */
const isParagraphBreak: BoundaryMatcher = (text, pos) => {
  if (text.charAt(pos - 1) !== '\n') return false;
  const prev = text.charAt(pos - 2);
  return prev === '\n' || (prev === '\r' && text.charAt(pos - 3) === '\n');
};

const isLineBreak: BoundaryMatcher = (text, pos) => text.charAt(pos - 1) === '\n';

/** 句末標點後接空白，切點落在空白之後 */
const isSentenceEnd: BoundaryMatcher = (text, pos) =>
  isWhitespace(text.charAt(pos - 1)) && SENTENCE_TERMINATORS.has(text.charAt(pos - 2));

const NATURAL_BREAKS: ReadonlyArray<[BoundaryKind, BoundaryMatcher]> = [
  ['paragraph', isParagraphBreak],
  ['line', isLineBreak],
  ['sentence', isSentenceEnd],
];

/**
 * 自 target 往回尋找自然切點
 *
 * 搜尋順序：段落（空行）→ 換行 → 句末標點 + 空白，範圍限於 lookback 字元內；
 * 都找不到時退回最近的空白（不切在字中間），連空白都沒有才在 target 硬切。
 * 回傳位置一律 > floor，呼叫端藉此保證下一個 chunk 的起點前進。
 */
export class BoundaryFinder {
  find(text: string, target: number, lookback: number, floor: number): BoundaryMatch {
    const windowStart = Math.max(floor + 1, target - lookback);

    for (const [kind, matches] of NATURAL_BREAKS) {
      for (let pos = target; pos >= windowStart; pos--) {
        if (matches(text, pos)) return { position: pos, kind };
      }
    }

    for (let pos = target; pos > floor; pos--) {
      if (isWhitespace(text.charAt(pos - 1))) return { position: pos, kind: 'whitespace' };
    }

    return { position: target, kind: 'hard' };
  }
}
