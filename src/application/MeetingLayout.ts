import path from 'node:path';

/**
 * 會議輸出目錄的檔案配置
 *
 * <outDir>/chunks/chunk_<i>.txt          chunk 文字
 * <outDir>/chunks/chunk_<i>_overlap.txt  與下一個 chunk 共享的文字
 * <outDir>/chunks/metadata.json          ChunkManifest
 * <outDir>/chunk_<i>_turns.json          analyzer 結果
 * <outDir>/01_turns.json                 merge 後的 turn 序列
 */
export const MeetingLayout = {
  manifestKey: 'chunks/metadata.json',
  mergedTurnsKey: '01_turns.json',
  chunkTextKey: (chunkIndex: number): string => `chunks/chunk_${chunkIndex}.txt`,
  overlapKey: (chunkIndex: number): string => `chunks/chunk_${chunkIndex}_overlap.txt`,
  turnsKey: (chunkIndex: number): string => `chunk_${chunkIndex}_turns.json`,
  resolve: (outDir: string, key: string): string => path.join(outDir, key),
} as const;
