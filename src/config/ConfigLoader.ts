import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { MeetSpliceConfig, PartialConfig } from './types.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';
import { LOG_LEVELS, isLogLevel } from '../shared/Logger.js';

export type { MeetSpliceConfig, PartialConfig } from './types.js';

/** .meetsplice.json 的形狀；每個區塊皆可部分覆寫 */
const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  chunking: z.object({
    chunkSizeTokens: z.number(),
    overlapTokens: z.number(),
    thresholdTokens: z.number(),
    charsPerToken: z.number(),
  }).partial().optional(),
  merge: z.object({
    similarityThreshold: z.number(),
    avgTokensPerTurn: z.number(),
    maxWindowTurns: z.number(),
  }).partial().optional(),
  analyzer: z.object({
    provider: z.enum(['openai-compatible', 'lines']),
    baseUrl: z.string(),
    apiKey: z.string(),
    model: z.string(),
    maxConcurrency: z.number(),
    timeoutMs: z.number(),
    maxRetries: z.number(),
    retryBaseDelayMs: z.number(),
    timeZone: z.string(),
  }).partial().optional(),
  output: z.object({ root: z.string() }).partial().optional(),
  logging: z.object({ level: z.enum(LOG_LEVELS) }).partial().optional(),
});

/** 移除值為 undefined 的欄位，避免覆蓋預設值 */
function definedOnly<T extends object>(value: Partial<T> | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) return result;
  for (const key of Object.keys(value) as (keyof T)[]) {
    const val = value[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/** 合併：partial 覆蓋 base（逐區塊淺層合併） */
function mergeConfig(base: MeetSpliceConfig, partial: PartialConfig): MeetSpliceConfig {
  return {
    version: partial.version ?? base.version,
    chunking: { ...base.chunking, ...definedOnly(partial.chunking) },
    merge: { ...base.merge, ...definedOnly(partial.merge) },
    analyzer: { ...base.analyzer, ...definedOnly(partial.analyzer) },
    output: { ...base.output, ...definedOnly(partial.output) },
    logging: { ...base.logging, ...definedOnly(partial.logging) },
  };
}

/** 環境變數覆蓋：OPENAI_BASE_URL、OPENAI_API_KEY、MEETSPLICE_LOG_LEVEL */
function applyEnvOverrides(config: MeetSpliceConfig, env: NodeJS.ProcessEnv): void {
  if (env.OPENAI_BASE_URL) {
    config.analyzer.baseUrl = env.OPENAI_BASE_URL;
  }
  if (env.OPENAI_API_KEY && !config.analyzer.apiKey) {
    config.analyzer.apiKey = env.OPENAI_API_KEY;
  }
  const level = env.MEETSPLICE_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    config.logging.level = level;
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** 驗證設定值的合法性 */
function validate(config: MeetSpliceConfig): void {
  const { chunking, merge, analyzer } = config;

  for (const key of ['chunkSizeTokens', 'overlapTokens', 'thresholdTokens', 'charsPerToken'] as const) {
    if (!isPositiveInteger(chunking[key])) {
      throw new ConfigValidationError(`chunking.${key} must be a positive integer`);
    }
  }
  if (chunking.chunkSizeTokens <= chunking.overlapTokens) {
    throw new ConfigValidationError('chunking.chunkSizeTokens must be greater than chunking.overlapTokens');
  }

  if (!(merge.similarityThreshold > 0 && merge.similarityThreshold <= 1)) {
    throw new ConfigValidationError('merge.similarityThreshold must be in (0, 1]');
  }
  if (!(merge.avgTokensPerTurn > 0)) {
    throw new ConfigValidationError('merge.avgTokensPerTurn must be positive');
  }
  if (!isPositiveInteger(merge.maxWindowTurns)) {
    throw new ConfigValidationError('merge.maxWindowTurns must be a positive integer');
  }

  if (!isPositiveInteger(analyzer.maxConcurrency)) {
    throw new ConfigValidationError('analyzer.maxConcurrency must be a positive integer');
  }
  if (!isPositiveInteger(analyzer.timeoutMs)) {
    throw new ConfigValidationError('analyzer.timeoutMs must be a positive integer');
  }
  if (!Number.isInteger(analyzer.maxRetries) || analyzer.maxRetries < 0) {
    throw new ConfigValidationError('analyzer.maxRetries must be a non-negative integer');
  }
  if (!(analyzer.retryBaseDelayMs >= 0)) {
    throw new ConfigValidationError('analyzer.retryBaseDelayMs must be non-negative');
  }
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(`${configPath} is not valid JSON`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(`${configPath}: ${issue.path.join('.')} ${issue.message}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .meetsplice.json（若存在）並合併到預設值上
 * @param configDir - 設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數來源，預設 process.env
 */
export function loadConfig(
  configDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): MeetSpliceConfig {
  const fileConfig = readConfigFile(path.join(configDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides
  let merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  // 環境變數優先於檔案設定
  applyEnvOverrides(merged, env);

  validate(merged);
  return merged;
}
