import fs from 'node:fs/promises';
import path from 'node:path';
import type { TranscriptStorePort } from '../../domain/ports/TranscriptStorePort.js';

export class FileSystemTranscriptStore implements TranscriptStorePort {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async readText(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async readJson(filePath: string): Promise<unknown> {
    const raw = await this.readText(filePath);
    return JSON.parse(raw);
  }

  async writeJson(filePath: string, data: unknown): Promise<void> {
    await this.writeText(filePath, JSON.stringify(data, null, 2) + '\n');
  }

  async removeFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
