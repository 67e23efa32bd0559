import type { MeetSpliceConfig } from './types.js';

export const CONFIG_FILE_NAME = '.meetsplice.json';

export const DEFAULT_CONFIG: MeetSpliceConfig = {
  version: 1,
  chunking: {
    chunkSizeTokens: 15000,
    overlapTokens: 2000,
    thresholdTokens: 50000,
    charsPerToken: 4,
  },
  merge: {
    similarityThreshold: 0.75,
    avgTokensPerTurn: 50, // 約 200 字元
    maxWindowTurns: 50,
  },
  analyzer: {
    provider: 'openai-compatible',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    maxConcurrency: 5,
    timeoutMs: 120000,
    maxRetries: 3,
    retryBaseDelayMs: 1000,
    timeZone: 'UTC',
  },
  output: {
    root: 'meetings',
  },
  logging: {
    level: 'info',
  },
};
