import { TIMESTAMP_PATTERN } from '../entities/Turn.js';

/** HH:MM:SS → 秒數；格式不符回傳 undefined */
export function parseTimestamp(ts: string): number | undefined {
  if (!TIMESTAMP_PATTERN.test(ts)) return undefined;
  const [hours, minutes, seconds] = ts.split(':').map(Number);
  return hours * 3600 + minutes * 60 + seconds;
}

export function formatTimestamp(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(secs / 3600);
  const m = Math.floor((secs % 3600) / 60);
  const s = secs % 60;
  return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':');
}

/** 比較兩個 timestamp；無法解析的一方排在後面 */
export function compareTimestamps(a: string, b: string): number {
  const secA = parseTimestamp(a);
  const secB = parseTimestamp(b);
  if (secA === undefined && secB === undefined) return 0;
  if (secA === undefined) return 1;
  if (secB === undefined) return -1;
  return secA - secB;
}

/** 取較早者；只有一方合法時取合法的那個 */
export function earliest(a: string, b: string): string {
  return compareTimestamps(a, b) <= 0 ? a : b;
}

/** 取較晚者；只有一方合法時取合法的那個 */
export function latest(a: string, b: string): string {
  const secA = parseTimestamp(a);
  const secB = parseTimestamp(b);
  if (secA === undefined) return secB === undefined ? a : b;
  if (secB === undefined) return a;
  return secA >= secB ? a : b;
}
