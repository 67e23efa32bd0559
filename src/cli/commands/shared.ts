import path from 'node:path';
import { Option, type Command } from 'commander';
import { AnalyzeUseCase } from '../../application/AnalyzeUseCase.js';
import { ChunkUseCase } from '../../application/ChunkUseCase.js';
import { MergeUseCase } from '../../application/MergeUseCase.js';
import { loadConfig, type MeetSpliceConfig } from '../../config/ConfigLoader.js';
import type { AnalyzerProvider } from '../../config/types.js';
import type { ChunkAnalyzerPort } from '../../domain/ports/ChunkAnalyzerPort.js';
import { HttpChunkAnalyzer } from '../../infrastructure/analyzer/HttpChunkAnalyzer.js';
import { LineTranscriptAnalyzer } from '../../infrastructure/analyzer/LineTranscriptAnalyzer.js';
import { SlidingWindowChunker } from '../../infrastructure/chunking/SlidingWindowChunker.js';
import { ChunkMerger } from '../../infrastructure/merge/ChunkMerger.js';
import { FileSystemTranscriptStore } from '../../infrastructure/storage/FileSystemTranscriptStore.js';
import { Logger } from '../../shared/Logger.js';
import { OUTPUT_FORMATS, ReportFormatter, type OutputFormat } from '../formatters/ReportFormatter.js';

export interface CommonOptions {
  configDir: string;
  outDir?: string;
  meetingId?: string;
  format: OutputFormat;
}

export interface AnalyzerOptions {
  analyzer?: 'openai' | 'lines';
}

/** 所有指令共用的選項 */
export function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('--config-dir <path>', 'Directory containing .meetsplice.json', '.')
    .option('--out-dir <path>', 'Meeting output directory (default: <output.root>/<meeting-id>)')
    .option('--meeting-id <id>', 'Meeting identifier')
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'),
    );
}

export function addAnalyzerOption(cmd: Command): Command {
  return cmd.addOption(
    new Option('--analyzer <kind>', 'Turn analyzer (default: analyzer.provider)').choices(['openai', 'lines']),
  );
}

/** 一次 CLI 執行所需的依賴 */
export interface CliContext {
  config: MeetSpliceConfig;
  logger: Logger;
  store: FileSystemTranscriptStore;
  formatter: ReportFormatter;
}

export function createContext(opts: CommonOptions): CliContext {
  const config = loadConfig(opts.configDir);
  return {
    config,
    logger: new Logger('cli', config.logging.level),
    store: new FileSystemTranscriptStore(),
    formatter: new ReportFormatter(),
  };
}

/** meeting id 預設取逐字稿檔名（去掉副檔名） */
export function resolveMeetingId(opts: CommonOptions, transcriptPath?: string): string {
  if (opts.meetingId) return opts.meetingId;
  if (transcriptPath) return path.parse(transcriptPath).name;
  throw new Error('Either --out-dir or --meeting-id is required');
}

export function resolveOutDir(ctx: CliContext, opts: CommonOptions, meetingId: string): string {
  return opts.outDir ?? path.join(opts.configDir, ctx.config.output.root, meetingId);
}

/** analyze / merge：有 --out-dir 時不需要 meeting id */
export function resolveExistingOutDir(ctx: CliContext, opts: CommonOptions): string {
  if (opts.outDir) return opts.outDir;
  return resolveOutDir(ctx, opts, resolveMeetingId(opts));
}

export function createChunkUseCase(ctx: CliContext): ChunkUseCase {
  const chunker = new SlidingWindowChunker(ctx.config.chunking, ctx.logger.child('SlidingWindowChunker'));
  return new ChunkUseCase(ctx.store, chunker, ctx.logger.child('ChunkUseCase'));
}

export function createAnalyzer(ctx: CliContext, choice: AnalyzerOptions['analyzer']): ChunkAnalyzerPort {
  const provider: AnalyzerProvider = choice === 'lines'
    ? 'lines'
    : choice === 'openai' ? 'openai-compatible' : ctx.config.analyzer.provider;

  if (provider === 'lines') {
    return new LineTranscriptAnalyzer();
  }

  const { baseUrl, apiKey, model, timeoutMs } = ctx.config.analyzer;
  return new HttpChunkAnalyzer(
    { baseUrl, model, timeoutMs, ...(apiKey ? { apiKey } : {}) },
    ctx.logger.child('HttpChunkAnalyzer'),
  );
}

export function createAnalyzeUseCase(ctx: CliContext, choice: AnalyzerOptions['analyzer']): AnalyzeUseCase {
  const { maxConcurrency, maxRetries, retryBaseDelayMs, timeZone } = ctx.config.analyzer;
  return new AnalyzeUseCase(
    ctx.store,
    createAnalyzer(ctx, choice),
    { maxConcurrency, maxRetries, retryBaseDelayMs, timeZone },
    ctx.logger.child('AnalyzeUseCase'),
  );
}

export function createMergeUseCase(ctx: CliContext): MergeUseCase {
  const merger = new ChunkMerger(
    { ...ctx.config.merge, charsPerToken: ctx.config.chunking.charsPerToken },
    ctx.logger.child('ChunkMerger'),
  );
  return new MergeUseCase(ctx.store, merger, ctx.logger.child('MergeUseCase'));
}

export function printReport(ctx: CliContext, report: unknown, format: OutputFormat): void {
  process.stdout.write(ctx.formatter.formatObject(report, format) + '\n');
}
