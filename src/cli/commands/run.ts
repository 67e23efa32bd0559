import type { Command } from 'commander';
import { PipelineUseCase } from '../../application/PipelineUseCase.js';
import {
  addAnalyzerOption,
  addCommonOptions,
  createAnalyzeUseCase,
  createChunkUseCase,
  createContext,
  createMergeUseCase,
  printReport,
  resolveMeetingId,
  resolveOutDir,
  type AnalyzerOptions,
  type CommonOptions,
} from './shared.js';

/** 註冊 run 指令：chunk → analyze → merge */
export function registerRunCommand(program: Command): void {
  addAnalyzerOption(addCommonOptions(
    program
      .command('run')
      .description('Chunk, analyze and merge a transcript in one step')
      .argument('<transcript>', 'Path to the transcript text file'),
  )).action(async (transcript: string, opts: CommonOptions & AnalyzerOptions) => {
    const ctx = createContext(opts);
    const meetingId = resolveMeetingId(opts, transcript);
    const outDir = resolveOutDir(ctx, opts, meetingId);

    const pipeline = new PipelineUseCase(
      createChunkUseCase(ctx),
      createAnalyzeUseCase(ctx, opts.analyzer),
      createMergeUseCase(ctx),
      ctx.config.analyzer.timeZone,
    );
    const report = await pipeline.run({ meetingId, transcriptPath: transcript, outDir });

    printReport(ctx, report, opts.format);
    process.exitCode = report.merge.missingChunks.length > 0 ? 1 : 0;
  });
}
