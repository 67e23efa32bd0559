import type { Command } from 'commander';
import {
  addCommonOptions,
  createChunkUseCase,
  createContext,
  printReport,
  resolveMeetingId,
  resolveOutDir,
  type CommonOptions,
} from './shared.js';

/** 註冊 chunk 指令：切分逐字稿並寫出 chunks/ 與 metadata.json */
export function registerChunkCommand(program: Command): void {
  addCommonOptions(
    program
      .command('chunk')
      .description('Split a transcript into overlapping chunks')
      .argument('<transcript>', 'Path to the transcript text file'),
  ).action(async (transcript: string, opts: CommonOptions) => {
    const ctx = createContext(opts);
    const meetingId = resolveMeetingId(opts, transcript);
    const outDir = resolveOutDir(ctx, opts, meetingId);

    const manifest = await createChunkUseCase(ctx).chunk({ meetingId, transcriptPath: transcript, outDir });

    printReport(ctx, {
      meetingId: manifest.meetingId,
      outDir,
      chunked: manifest.chunked,
      chunkCount: manifest.chunkCount,
      totalChars: manifest.totalChars,
      estimatedTotalTokens: manifest.estimatedTotalTokens,
      chunks: manifest.chunks.map((c) => ({
        chunkIndex: c.chunkIndex,
        startChar: c.startChar,
        endChar: c.endChar,
        estimatedTokens: c.estimatedTokens,
        boundary: c.boundary,
      })),
    }, opts.format);
  });
}
