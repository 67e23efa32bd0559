/**
 * 文字相似度
 *
 * 正規化（case-fold、去除標點、合併空白）後以字詞集合計算 Jaccard 相似度：
 * |A ∩ B| / |A ∪ B|。用於辨識相鄰 chunk 在 overlap 區段重複產生的 turn。
 */

const PUNCTUATION_RE = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE_RE = /\s+/g;

export class TextSimilarity {
  static normalize(text: string): string {
    return text
      .toLowerCase()
      .replace(PUNCTUATION_RE, '')
      .replace(WHITESPACE_RE, ' ')
      .trim();
  }

  static tokenSet(text: string): Set<string> {
    const normalized = TextSimilarity.normalize(text);
    if (!normalized) return new Set();
    return new Set(normalized.split(' '));
  }

  /**
   * 兩個集合的 Jaccard 相似度
   * 兩者皆空視為相同（1.0），只有一方為空則為 0
   */
  static jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 1;
    if (a.size === 0 || b.size === 0) return 0;

    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    let intersection = 0;
    for (const token of small) {
      if (large.has(token)) intersection++;
    }
    const union = a.size + b.size - intersection;
    return intersection / union;
  }

  static compare(textA: string, textB: string): number {
    return TextSimilarity.jaccard(TextSimilarity.tokenSet(textA), TextSimilarity.tokenSet(textB));
  }

  /** 說話者比對：去頭尾空白、不分大小寫 */
  static sameSpeaker(a: string, b: string): boolean {
    return a.trim().toLowerCase() === b.trim().toLowerCase();
  }
}
