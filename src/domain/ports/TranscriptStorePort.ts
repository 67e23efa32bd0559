export interface TranscriptStorePort {
  fileExists(filePath: string): Promise<boolean>;
  readText(filePath: string): Promise<string>;
  writeText(filePath: string, content: string): Promise<void>;
  readJson(filePath: string): Promise<unknown>;
  writeJson(filePath: string, data: unknown): Promise<void>;
  /** 檔案不存在時不視為錯誤 */
  removeFile(filePath: string): Promise<void>;
}
