import type { Command } from 'commander';
import {
  addAnalyzerOption,
  addCommonOptions,
  createAnalyzeUseCase,
  createContext,
  printReport,
  resolveExistingOutDir,
  type AnalyzerOptions,
  type CommonOptions,
} from './shared.js';

/** 註冊 analyze 指令：對 manifest 中每個 chunk 呼叫 analyzer */
export function registerAnalyzeCommand(program: Command): void {
  addAnalyzerOption(addCommonOptions(
    program
      .command('analyze')
      .description('Analyze every chunk of a chunked meeting into speaker turns'),
  )).action(async (opts: CommonOptions & AnalyzerOptions) => {
    const ctx = createContext(opts);
    const outDir = resolveExistingOutDir(ctx, opts);

    const { report } = await createAnalyzeUseCase(ctx, opts.analyzer).analyzeDir(outDir);

    printReport(ctx, report, opts.format);
    process.exitCode = report.failed.length > 0 ? 1 : 0;
  });
}
