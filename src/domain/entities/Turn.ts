import { z } from 'zod';

/**
 * 單一發言回合
 *
 * 欄位名稱沿用 analyzer 輸出的 JSON 格式（snake_case），
 * 因為 turn 會原樣寫入 chunk_<i>_turns.json 與 01_turns.json 給下游使用。
 */

export const TURN_TYPES = ['question', 'answer', 'followup', 'monologue', 'housekeeping'] as const;

export type TurnType = (typeof TURN_TYPES)[number];

/** HH:MM:SS，小時允許超過兩位數 */
export const TIMESTAMP_PATTERN = /^\d{2,}:[0-5]\d:[0-5]\d$/;

export const TurnSchema = z.object({
  idx: z.number().int().nonnegative(),
  start_ts: z.string().regex(TIMESTAMP_PATTERN, 'expected HH:MM:SS'),
  end_ts: z.string().regex(TIMESTAMP_PATTERN, 'expected HH:MM:SS'),
  speaker: z.string(),
  type: z.enum(TURN_TYPES),
  question_likelihood: z.number().min(0).max(1),
  text: z.string(),
});

export type Turn = z.infer<typeof TurnSchema>;

/** analyzer 寫出的 chunk 結果檔 */
export const ChunkTurnsFileSchema = z.object({
  meeting_id: z.string().optional(),
  time_zone: z.string().optional(),
  chunk_index: z.number().int().nonnegative().optional(),
  /** 產生此結果的 manifest 的 createdAt；與目前 manifest 不符即為舊結果 */
  manifest_created_at: z.string().optional(),
  turns: z.array(TurnSchema),
});

export type ChunkTurnsFile = z.infer<typeof ChunkTurnsFileSchema>;
