import type { AnalyzeUseCase } from './AnalyzeUseCase.js';
import type { ChunkRequest, ChunkUseCase } from './ChunkUseCase.js';
import type { ChunkManifest } from './dto/ChunkManifest.js';
import type { AnalyzeReport, MergeReport } from './dto/PipelineReports.js';
import type { MergeUseCase } from './MergeUseCase.js';

export interface PipelineReport {
  chunking: Pick<ChunkManifest, 'meetingId' | 'chunked' | 'chunkCount' | 'totalChars' | 'estimatedTotalTokens'>;
  analysis: AnalyzeReport;
  merge: MergeReport;
}

/**
 * 完整流程：chunk → analyze（平行）→ merge
 *
 * merge 只在所有 chunk 分析都結束（成功或失敗）後才執行。
 */
export class PipelineUseCase {
  constructor(
    private readonly chunkUseCase: ChunkUseCase,
    private readonly analyzeUseCase: AnalyzeUseCase,
    private readonly mergeUseCase: MergeUseCase,
    private readonly timeZone: string,
  ) {}

  async run(request: ChunkRequest): Promise<PipelineReport> {
    const manifest = await this.chunkUseCase.chunk(request);
    const { outcomes, report: analysis } = await this.analyzeUseCase.analyzeAll(manifest, request.outDir);
    const { report: merge } = await this.mergeUseCase.merge({
      outDir: request.outDir,
      timeZone: this.timeZone,
      outcomes,
    });

    return {
      chunking: {
        meetingId: manifest.meetingId,
        chunked: manifest.chunked,
        chunkCount: manifest.chunkCount,
        totalChars: manifest.totalChars,
        estimatedTotalTokens: manifest.estimatedTotalTokens,
      },
      analysis,
      merge,
    };
  }
}
