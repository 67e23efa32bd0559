import { TurnSchema } from '../../domain/entities/Turn.js';
import { parseTimestamp } from '../../domain/value-objects/Timestamp.js';

/**
 * merge 結果的結構檢查
 *
 * 只回報問題，不修正也不丟例外：
 * - 每個 turn 符合 TurnSchema（必要欄位、type、question_likelihood 範圍、timestamp 格式）
 * - idx 嚴格遞增
 * - start_ts 在整個序列中不遞減
 * - 同一 turn 的 end_ts 不早於 start_ts
 */
export class TurnValidator {
  validate(turns: readonly unknown[]): string[] {
    const warnings: string[] = [];
    let prevIdx: number | undefined;
    let prevStart: { ts: string; seconds: number } | undefined;

    turns.forEach((raw, i) => {
      const parsed = TurnSchema.safeParse(raw);
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          const field = issue.path.length > 0 ? issue.path.join('.') : 'turn';
          warnings.push(`Turn ${i}: ${field} ${issue.message}`);
        }
        return;
      }

      const turn = parsed.data;

      if (prevIdx !== undefined && turn.idx <= prevIdx) {
        warnings.push(`Turn ${i}: idx ${turn.idx} is not greater than previous idx ${prevIdx}`);
      }
      prevIdx = turn.idx;

      const start = parseTimestamp(turn.start_ts);
      const end = parseTimestamp(turn.end_ts);
      if (start !== undefined && end !== undefined && end < start) {
        warnings.push(`Turn ${i}: end_ts ${turn.end_ts} precedes start_ts ${turn.start_ts}`);
      }
      if (start !== undefined) {
        if (prevStart && start < prevStart.seconds) {
          warnings.push(`Turn ${i}: start_ts ${turn.start_ts} precedes previous start_ts ${prevStart.ts}`);
        }
        prevStart = { ts: turn.start_ts, seconds: start };
      }
    });

    return warnings;
  }
}
