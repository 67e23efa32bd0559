import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { ChunkUseCase } from '../../src/application/ChunkUseCase.js';
import { ChunkManifestSchema } from '../../src/application/dto/ChunkManifest.js';
import { SlidingWindowChunker } from '../../src/infrastructure/chunking/SlidingWindowChunker.js';
import { FileSystemTranscriptStore } from '../../src/infrastructure/storage/FileSystemTranscriptStore.js';
import { TranscriptNotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { Logger } from '../../src/shared/Logger.js';

const FIXTURE = fileURLToPath(new URL('../fixtures/planning-meeting.txt', import.meta.url));
/** chunk 200 字元、overlap 60 字元、超過 160 字元才切分 */
const CHUNKING = { chunkSizeTokens: 50, overlapTokens: 15, thresholdTokens: 40, charsPerToken: 4 };

/**
 * Feature: 切分逐字稿並寫出 chunk 檔案
 */
describe('ChunkUseCase', () => {
  const tmpDir = path.join(os.tmpdir(), 'meetsplice-chunk-' + Date.now());
  const outDir = path.join(tmpDir, 'planning');
  let useCase: ChunkUseCase;

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    const logger = new Logger('test', 'error', () => {});
    useCase = new ChunkUseCase(
      new FileSystemTranscriptStore(),
      new SlidingWindowChunker(CHUNKING, logger),
      logger,
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 超過門檻的逐字稿
   * Given 444 字元的會議逐字稿
   * When 以 200 字元 chunk、60 字元 overlap 切分
   * Then 產生 3 個 chunk，並寫出 chunk 文字、overlap 與 metadata.json
   */
  it('should write chunk texts, overlaps and the manifest', async () => {
    const transcript = fs.readFileSync(FIXTURE, 'utf-8');

    const manifest = await useCase.chunk({ meetingId: 'planning', transcriptPath: FIXTURE, outDir });

    expect(manifest.chunked).toBe(true);
    expect(manifest.chunkCount).toBe(3);
    expect(manifest.totalChars).toBe(444);
    expect(manifest.estimatedTotalTokens).toBe(111);
    expect(manifest.chunkingParams).toEqual(CHUNKING);
    expect(manifest.chunks.map((c) => [c.startChar, c.endChar, c.overlapStartChar, c.boundary])).toEqual([
      [0, 184, 124, 'line'],
      [124, 310, 250, 'line'],
      [250, 444, undefined, 'end'],
    ]);
    expect(manifest.chunks[0]).toMatchObject({
      inputKey: 'chunks/chunk_0.txt',
      overlapKey: 'chunks/chunk_0_overlap.txt',
      outputKey: 'chunk_0_turns.json',
    });
    expect(manifest.chunks[2].overlapKey).toBeUndefined();

    expect(fs.readFileSync(path.join(outDir, 'chunks', 'chunk_1.txt'), 'utf-8')).toBe(transcript.slice(124, 310));
    expect(fs.readFileSync(path.join(outDir, 'chunks', 'chunk_0_overlap.txt'), 'utf-8'))
      .toBe('the launch date.\n[00:00:15] Carol: Can we move it to March?\n');
    expect(fs.existsSync(path.join(outDir, 'chunks', 'chunk_2_overlap.txt'))).toBe(false);

    const onDisk = JSON.parse(fs.readFileSync(path.join(outDir, 'chunks', 'metadata.json'), 'utf-8'));
    expect(ChunkManifestSchema.parse(onDisk)).toEqual(manifest);
  });

  it('should write a single chunk for a short transcript', async () => {
    const transcriptPath = path.join(tmpDir, 'short.txt');
    fs.writeFileSync(transcriptPath, 'Alice: Quick sync today.\nBob: Nothing to report.\n');

    const manifest = await useCase.chunk({ meetingId: 'short', transcriptPath, outDir });

    expect(manifest.chunked).toBe(false);
    expect(manifest.chunks).toEqual([
      {
        chunkIndex: 0,
        startChar: 0,
        endChar: 49,
        estimatedTokens: 13,
        hasNextChunk: false,
        boundary: 'end',
        inputKey: 'chunks/chunk_0.txt',
        outputKey: 'chunk_0_turns.json',
      },
    ]);
  });

  it('should produce an empty manifest for a blank transcript', async () => {
    const transcriptPath = path.join(tmpDir, 'blank.txt');
    fs.writeFileSync(transcriptPath, '  \n\n');

    const manifest = await useCase.chunk({ meetingId: 'blank', transcriptPath, outDir });

    expect(manifest.chunkCount).toBe(0);
    expect(manifest.chunks).toEqual([]);
    expect(fs.existsSync(path.join(outDir, 'chunks', 'metadata.json'))).toBe(true);
  });

  it('should fail when the transcript does not exist', async () => {
    await expect(
      useCase.chunk({ meetingId: 'x', transcriptPath: path.join(tmpDir, 'nope.txt'), outDir }),
    ).rejects.toBeInstanceOf(TranscriptNotFoundError);
  });
});
