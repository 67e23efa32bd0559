import { z } from 'zod';

/** chunks/metadata.json：chunk 描述與對應的儲存 key（相對於會議輸出目錄） */

export const ChunkManifestEntrySchema = z.object({
  chunkIndex: z.number().int().nonnegative(),
  startChar: z.number().int().nonnegative(),
  endChar: z.number().int().positive(),
  overlapStartChar: z.number().int().nonnegative().optional(),
  estimatedTokens: z.number().nonnegative(),
  hasNextChunk: z.boolean(),
  boundary: z.enum(['paragraph', 'line', 'sentence', 'whitespace', 'hard', 'end']),
  inputKey: z.string(),
  overlapKey: z.string().optional(),
  outputKey: z.string(),
});

export const ChunkManifestSchema = z.object({
  meetingId: z.string(),
  sourcePath: z.string(),
  chunked: z.boolean(),
  chunkCount: z.number().int().nonnegative(),
  totalChars: z.number().int().nonnegative(),
  estimatedTotalTokens: z.number().int().nonnegative(),
  chunkingParams: z.object({
    chunkSizeTokens: z.number(),
    overlapTokens: z.number(),
    thresholdTokens: z.number(),
    charsPerToken: z.number(),
  }),
  chunks: z.array(ChunkManifestEntrySchema),
  createdAt: z.string(),
});

export type ChunkManifestEntry = z.infer<typeof ChunkManifestEntrySchema>;
export type ChunkManifest = z.infer<typeof ChunkManifestSchema>;
