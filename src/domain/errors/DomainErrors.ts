export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 meetsplice domain 錯誤的基底類別 */
export abstract class MeetSpliceError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** 可重試錯誤：maxRetries 為此類錯誤允許的重試次數上限 */
export abstract class RetryableError extends MeetSpliceError {
  readonly classification = 'retryable' as const;
  abstract readonly maxRetries: number;
}

export function isRetryableError(err: unknown): err is RetryableError {
  return err instanceof RetryableError;
}

// --- Retryable ---

export class AnalyzerRateLimitError extends RetryableError {
  readonly code = 'ANALYZER_RATE_LIMIT';
  readonly maxRetries = 3;
}

export class AnalyzerTimeoutError extends RetryableError {
  readonly code = 'ANALYZER_TIMEOUT';
  readonly maxRetries = 2;
}

/** 模型回應不是合法 JSON 或不符合 turn schema */
export class InvalidAnalyzerResponseError extends RetryableError {
  readonly code = 'ANALYZER_INVALID_RESPONSE';
  readonly maxRetries = 2;

  constructor(
    message: string,
    public readonly chunkIndex: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Degradable ---

export class AnalyzerUnavailableError extends MeetSpliceError {
  readonly classification = 'degradable' as const;
  readonly code = 'ANALYZER_UNAVAILABLE';
}

/** chunk 結果缺漏：merge 仍會繼續，只記錄 gap */
export class ChunkResultMissingError extends MeetSpliceError {
  readonly classification = 'degradable' as const;
  readonly code = 'CHUNK_RESULT_MISSING';

  constructor(
    public readonly chunkIndex: number,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Chunk ${chunkIndex} result missing: ${reason}`, options);
  }
}

// --- Manual ---

export class ConfigValidationError extends MeetSpliceError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';
}

export class TranscriptNotFoundError extends MeetSpliceError {
  readonly classification = 'manual' as const;
  readonly code = 'TRANSCRIPT_NOT_FOUND';

  constructor(
    public readonly transcriptPath: string,
    options?: ErrorOptions,
  ) {
    super(`Transcript not found: ${transcriptPath}`, options);
  }
}

export class ChunkManifestNotFoundError extends MeetSpliceError {
  readonly classification = 'manual' as const;
  readonly code = 'MANIFEST_NOT_FOUND';

  constructor(
    public readonly manifestPath: string,
    options?: ErrorOptions,
  ) {
    super(`Chunk manifest not found: ${manifestPath}. Run: meetsplice chunk <transcript>`, options);
  }
}

export class InvalidChunkManifestError extends MeetSpliceError {
  readonly classification = 'manual' as const;
  readonly code = 'MANIFEST_INVALID';
}

/** 將任意 thrown value 轉為可記錄的訊息 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
