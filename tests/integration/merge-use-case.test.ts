import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { ChunkUseCase } from '../../src/application/ChunkUseCase.js';
import { AnalyzeUseCase } from '../../src/application/AnalyzeUseCase.js';
import { MergeUseCase } from '../../src/application/MergeUseCase.js';
import { SlidingWindowChunker } from '../../src/infrastructure/chunking/SlidingWindowChunker.js';
import { LineTranscriptAnalyzer } from '../../src/infrastructure/analyzer/LineTranscriptAnalyzer.js';
import { ChunkMerger } from '../../src/infrastructure/merge/ChunkMerger.js';
import { FileSystemTranscriptStore } from '../../src/infrastructure/storage/FileSystemTranscriptStore.js';
import {
  AnalyzerUnavailableError,
  ChunkManifestNotFoundError,
  InvalidChunkManifestError,
} from '../../src/domain/errors/DomainErrors.js';
import type { ChunkAnalyzerPort } from '../../src/domain/ports/ChunkAnalyzerPort.js';
import { Logger } from '../../src/shared/Logger.js';

const FIXTURE = fileURLToPath(new URL('../fixtures/planning-meeting.txt', import.meta.url));
const CHUNKING = { chunkSizeTokens: 50, overlapTokens: 15, thresholdTokens: 40, charsPerToken: 4 };
const MERGE = { similarityThreshold: 0.75, avgTokensPerTurn: 5, maxWindowTurns: 50, charsPerToken: 4 };

/**
 * Feature: 從磁碟上的 chunk 結果合併 turn
 *
 * 作為 merge 指令，我需要讀取 analyze 寫出的 chunk_<i>_turns.json，
 * 缺漏或損壞的結果只記錄 gap，不中斷合併。
 */
describe('MergeUseCase', () => {
  const tmpDir = path.join(os.tmpdir(), 'meetsplice-merge-' + Date.now());
  const outDir = path.join(tmpDir, 'planning');
  const logger = new Logger('test', 'error', () => {});
  const store = new FileSystemTranscriptStore();
  const analyzeOptions = { maxConcurrency: 2, maxRetries: 0, retryBaseDelayMs: 0, timeZone: 'Europe/Berlin' };
  let useCase: MergeUseCase;

  beforeEach(async () => {
    fs.mkdirSync(tmpDir, { recursive: true });
    const manifest = await new ChunkUseCase(store, new SlidingWindowChunker(CHUNKING, logger), logger)
      .chunk({ meetingId: 'planning', transcriptPath: FIXTURE, outDir });
    await new AnalyzeUseCase(store, new LineTranscriptAnalyzer(), analyzeOptions, logger).analyzeAll(manifest, outDir);
    useCase = new MergeUseCase(store, new ChunkMerger(MERGE, logger), logger);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write 01_turns.json with the merged turns and metadata', async () => {
    const { report } = await useCase.merge({ outDir, timeZone: 'Europe/Berlin' });

    expect(report).toMatchObject({
      meetingId: 'planning',
      outputKey: '01_turns.json',
      totalTurns: 10,
      chunkCount: 3,
      duplicatesRemoved: 2,
      missingChunks: [],
      warnings: [],
    });

    const output = JSON.parse(fs.readFileSync(path.join(outDir, '01_turns.json'), 'utf-8'));
    expect(output.meeting_id).toBe('planning');
    expect(output.time_zone).toBe('Europe/Berlin');
    expect(output.turns).toHaveLength(10);
    expect(output.metadata).toMatchObject({
      total_turns: 10,
      chunk_count: 3,
      duplicates_removed: 2,
      missing_chunks: [],
      warnings: [],
    });
    expect(typeof output.metadata.merged_at).toBe('string');
  });

  /**
   * Scenario: 中間 chunk 的結果檔不存在
   * Given chunk_1_turns.json 被刪除
   * Then chunk 0 與 chunk 2 的 turn 仍被合併，並回報缺漏
   */
  it('should merge around a missing chunk result', async () => {
    fs.rmSync(path.join(outDir, 'chunk_1_turns.json'));

    const { merged, report } = await useCase.merge({ outDir, timeZone: 'UTC' });

    expect(report.missingChunks).toEqual([1]);
    expect(report.warnings).toEqual([
      'Chunk 1 result missing (chunk_1_turns.json not found); its turns are absent from the merged transcript',
    ]);
    expect(merged.turns.map((t) => t.text)).toEqual([
      'Welcome to the planning meeting.',
      'Thanks, glad to be here.',
      'First item is the launch date.',
      'Can we move it to March?',
      'I will update the roadmap.',
      'Next is the hiring plan.',
      'We have two open roles.',
      'Any questions before we wrap up?',
    ]);
    expect(fs.existsSync(path.join(outDir, '01_turns.json'))).toBe(true);
  });

  it('should treat a malformed chunk result as missing', async () => {
    fs.writeFileSync(path.join(outDir, 'chunk_1_turns.json'), JSON.stringify({ turns: [{ idx: 'zero' }] }));

    const { report } = await useCase.merge({ outDir, timeZone: 'UTC' });

    expect(report.missingChunks).toEqual([1]);
    expect(report.warnings[0]).toMatch(
      /^Chunk 1 result missing \(chunk_1_turns\.json: turns\.0\.idx .+\); its turns are absent/,
    );
  });

  /**
   * Scenario: 重新分析時全部失敗
   * Given 先前的 analyze 已寫出所有 chunk 結果
   * When 再次 analyze 且 analyzer 無法連線
   * Then merge 不會讀到先前的結果，所有 chunk 皆回報缺漏
   */
  it('should not merge results left over from an earlier analysis', async () => {
    const unavailable: ChunkAnalyzerPort = {
      providerId: 'unavailable',
      analyze: () => Promise.reject(new AnalyzerUnavailableError('connection refused')),
    };
    const { report: analysis } = await new AnalyzeUseCase(store, unavailable, analyzeOptions, logger)
      .analyzeDir(outDir);

    const { report } = await useCase.merge({ outDir, timeZone: 'UTC' });

    expect(analysis.failed.map((f) => f.chunkIndex)).toEqual([0, 1, 2]);
    expect(report.missingChunks).toEqual([0, 1, 2]);
    expect(report.totalTurns).toBe(0);
  });

  it('should treat a result written for an earlier manifest as missing', async () => {
    const resultPath = path.join(outDir, 'chunk_2_turns.json');
    const stale = { ...JSON.parse(fs.readFileSync(resultPath, 'utf-8')), manifest_created_at: '2020-01-01T00:00:00.000Z' };
    fs.writeFileSync(resultPath, JSON.stringify(stale));

    const { report } = await useCase.merge({ outDir, timeZone: 'UTC' });

    expect(report.missingChunks).toEqual([2]);
    expect(report.warnings).toEqual([
      'Chunk 2 result missing (chunk_2_turns.json belongs to an earlier chunking run (2020-01-01T00:00:00.000Z)); its turns are absent from the merged transcript',
    ]);
  });

  it('should size the overlap window with the ratio the chunks were cut with', async () => {
    const mismatched = new MergeUseCase(
      store,
      new ChunkMerger({ ...MERGE, charsPerToken: 1000 }, logger),
      logger,
    );

    const { merged } = await mismatched.merge({ outDir, timeZone: 'UTC' });

    // overlap 60 字元 / 4 = 15 token → 3 turns
    expect(merged.chunkStats.map((s) => s.windowSize)).toEqual([0, 3, 3]);
    expect(merged.turns).toHaveLength(10);
  });

  it('should use in-memory outcomes instead of the files when given', async () => {
    const { report } = await useCase.merge({
      outDir,
      timeZone: 'UTC',
      outcomes: [{ chunkIndex: 0, status: 'failed', error: 'quota exceeded' }],
    });

    expect(report.missingChunks).toEqual([0, 1, 2]);
    expect(report.totalTurns).toBe(0);
  });

  it('should require a chunk manifest', async () => {
    await expect(
      useCase.merge({ outDir: path.join(tmpDir, 'never-chunked'), timeZone: 'UTC' }),
    ).rejects.toBeInstanceOf(ChunkManifestNotFoundError);
  });

  it('should reject a manifest that does not match the schema', async () => {
    fs.writeFileSync(path.join(outDir, 'chunks', 'metadata.json'), JSON.stringify({ meetingId: 'planning' }));

    await expect(useCase.merge({ outDir, timeZone: 'UTC' })).rejects.toBeInstanceOf(InvalidChunkManifestError);
  });
});
