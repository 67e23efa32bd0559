import type { Command } from 'commander';
import {
  addCommonOptions,
  createContext,
  createMergeUseCase,
  printReport,
  resolveExistingOutDir,
  type CommonOptions,
} from './shared.js';

/** 註冊 merge 指令：合併 chunk_<i>_turns.json 為 01_turns.json */
export function registerMergeCommand(program: Command): void {
  addCommonOptions(
    program
      .command('merge')
      .description('Merge per-chunk turns into a single de-duplicated turn list'),
  ).action(async (opts: CommonOptions) => {
    const ctx = createContext(opts);
    const outDir = resolveExistingOutDir(ctx, opts);

    const { report } = await createMergeUseCase(ctx).merge({
      outDir,
      timeZone: ctx.config.analyzer.timeZone,
    });

    printReport(ctx, report, opts.format);
    // 有缺漏 chunk 時仍寫出結果，但以非零結束碼提示
    process.exitCode = report.missingChunks.length > 0 ? 1 : 0;
  });
}
