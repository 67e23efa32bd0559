import type { TranscriptStorePort } from '../domain/ports/TranscriptStorePort.js';
import { ChunkManifestNotFoundError, InvalidChunkManifestError } from '../domain/errors/DomainErrors.js';
import { ChunkManifestSchema, type ChunkManifest } from './dto/ChunkManifest.js';
import { MeetingLayout } from './MeetingLayout.js';

/** 讀取並驗證 <outDir>/chunks/metadata.json */
export async function loadChunkManifest(store: TranscriptStorePort, outDir: string): Promise<ChunkManifest> {
  const manifestPath = MeetingLayout.resolve(outDir, MeetingLayout.manifestKey);
  if (!(await store.fileExists(manifestPath))) {
    throw new ChunkManifestNotFoundError(manifestPath);
  }

  let raw: unknown;
  try {
    raw = await store.readJson(manifestPath);
  } catch (err) {
    throw new InvalidChunkManifestError(`${manifestPath} is not valid JSON`, { cause: err });
  }

  const parsed = ChunkManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidChunkManifestError(`${manifestPath}: ${issue.path.join('.')} ${issue.message}`);
  }
  return parsed.data;
}
