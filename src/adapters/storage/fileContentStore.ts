import { createHash, randomUUID } from 'node:crypto';
import { createWriteStream, promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { detectAudioFormat, UNKNOWN_FORMAT } from '@/adapters/storage/audioFormat';
import { ContentNotFoundError, StorageError, TapdeckError, errorMessage } from '@/domain/errors';
import { isContentRef, sha256Hex } from '@/domain/track/contentRef';
import type { ContentEntry, ContentRef } from '@/domain/track/types';
import type { ContentStorePort, StoredContent } from '@/ports/ContentStorePort';
import { createLogger } from '@/shared/logging/logger';
import { ensureDir, isMissingFileError, pathExists, readJson, writeJsonAtomic } from '@/shared/utils/file';

type ContentMeta = {
  format: string;
  byteSize: number;
};

/**
 * Content-addressed blob store on the local filesystem.
 *
 * Layout under the root: `objects/<aa>/<hash>` for payloads, a
 * `<hash>.json` sidecar next to each one, and `tmp/` for writes in progress.
 * A payload only appears under its final name through a rename of a fully
 * written and fsynced temporary file.
 */
export class FileContentStore implements ContentStorePort {
  private readonly log = createLogger('Storage', 'Content');
  private readonly objectsDir: string;
  private readonly tempDir: string;

  constructor(private readonly rootDir: string) {
    this.objectsDir = path.join(rootDir, 'objects');
    this.tempDir = path.join(rootDir, 'tmp');
  }

  public async init(): Promise<void> {
    await ensureDir(this.objectsDir);
    await ensureDir(this.tempDir);
    const leftovers = await fs.readdir(this.tempDir);
    for (const name of leftovers) {
      await fs.rm(path.join(this.tempDir, name), { force: true, recursive: true });
    }
    if (leftovers.length > 0) {
      this.log.warn('removed partial writes', { count: leftovers.length });
    }
    this.log.info('content store ready', { rootDir: this.rootDir });
  }

  public async put(bytes: Buffer): Promise<ContentRef> {
    const contentHash = sha256Hex(bytes);
    if (await this.exists(contentHash)) {
      this.log.debug('payload already stored', { contentHash });
      return contentHash;
    }
    const tempPath = this.createTempPath();
    try {
      const handle = await fs.open(tempPath, 'wx');
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      return await this.publish(tempPath, contentHash, bytes.length);
    } catch (error) {
      await this.discard(tempPath);
      throw this.toWriteFailure(error);
    }
  }

  public async putStream(source: Readable): Promise<ContentRef> {
    const tempPath = this.createTempPath();
    const hash = createHash('sha256');
    let byteSize = 0;
    const tap = new Transform({
      transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        hash.update(buffer);
        byteSize += buffer.length;
        callback(null, buffer);
      },
    });

    try {
      await pipeline(source, tap, createWriteStream(tempPath, { flags: 'wx' }));
      await this.syncFile(tempPath);
      const contentHash = hash.digest('hex');
      this.log.debug('stream written', { contentHash, byteSize });
      return await this.publish(tempPath, contentHash, byteSize);
    } catch (error) {
      await this.discard(tempPath);
      throw this.toWriteFailure(error);
    }
  }

  public async get(contentRef: ContentRef): Promise<StoredContent> {
    if (!isContentRef(contentRef)) {
      throw new ContentNotFoundError(contentRef);
    }
    let handle: FileHandle;
    try {
      handle = await fs.open(this.objectPath(contentRef), 'r');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ContentNotFoundError(contentRef);
      }
      throw new StorageError(`failed to open content ${contentRef}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const stat = await handle.stat();
      const meta = await this.readMeta(contentRef);
      return {
        entry: {
          contentHash: contentRef,
          byteSize: stat.size,
          format: meta?.format ?? UNKNOWN_FORMAT,
          refCount: 0,
        },
        stream: handle.createReadStream(),
      };
    } catch (error) {
      await handle.close();
      throw new StorageError(`failed to read content ${contentRef}: ${errorMessage(error)}`, { cause: error });
    }
  }

  public async exists(contentRef: ContentRef): Promise<boolean> {
    if (!isContentRef(contentRef)) {
      return false;
    }
    try {
      return await pathExists(this.objectPath(contentRef));
    } catch (error) {
      throw new StorageError(`failed to check content ${contentRef}: ${errorMessage(error)}`, { cause: error });
    }
  }

  public async describe(contentRef: ContentRef): Promise<ContentEntry | null> {
    if (!isContentRef(contentRef)) {
      return null;
    }
    try {
      const stat = await fs.stat(this.objectPath(contentRef));
      const meta = await this.readMeta(contentRef);
      return {
        contentHash: contentRef,
        byteSize: stat.size,
        format: meta?.format ?? UNKNOWN_FORMAT,
        refCount: 0,
      };
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new StorageError(`failed to describe content ${contentRef}: ${errorMessage(error)}`, { cause: error });
    }
  }

  public pathFor(contentRef: ContentRef): string | null {
    return isContentRef(contentRef) ? this.objectPath(contentRef) : null;
  }

  private async publish(tempPath: string, contentHash: ContentRef, byteSize: number): Promise<ContentRef> {
    const finalPath = this.objectPath(contentHash);
    if (await pathExists(finalPath)) {
      await this.discard(tempPath);
      this.log.debug('payload already stored', { contentHash });
      return contentHash;
    }
    await ensureDir(path.dirname(finalPath));
    const format = await detectAudioFormat(tempPath, this.log);
    const meta: ContentMeta = { format, byteSize };
    await writeJsonAtomic(this.metaPath(contentHash), meta);
    await fs.rename(tempPath, finalPath);
    this.log.info('content published', { contentHash, byteSize, format });
    return contentHash;
  }

  private async readMeta(contentRef: ContentRef): Promise<ContentMeta | null> {
    const raw = await readJson<Partial<ContentMeta>>(this.metaPath(contentRef));
    if (!raw || typeof raw.format !== 'string' || typeof raw.byteSize !== 'number') {
      return null;
    }
    return { format: raw.format, byteSize: raw.byteSize };
  }

  private async syncFile(filePath: string): Promise<void> {
    const handle = await fs.open(filePath, 'r+');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      this.log.warn('failed to remove temporary file', { tempPath, message: errorMessage(error) });
    }
  }

  private toWriteFailure(error: unknown): TapdeckError {
    if (error instanceof TapdeckError) {
      return error;
    }
    return new StorageError(`content write failed: ${errorMessage(error)}`, { cause: error });
  }

  private createTempPath(): string {
    return path.join(this.tempDir, `${randomUUID()}.part`);
  }

  private objectPath(contentRef: ContentRef): string {
    return path.join(this.objectsDir, contentRef.slice(0, 2), contentRef);
  }

  private metaPath(contentRef: ContentRef): string {
    return `${this.objectPath(contentRef)}.json`;
  }
}
