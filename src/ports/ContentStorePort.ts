import type { Readable } from 'node:stream';
import type { ContentEntry, ContentRef } from '@/domain/track/types';

export type StoredContent = {
  entry: ContentEntry;
  stream: Readable;
};

/**
 * Content-addressed audio storage. Only fully published payloads are
 * addressable; a reference is the sha256 hex of the bytes.
 */
export interface ContentStorePort {
  put(bytes: Buffer): Promise<ContentRef>;
  putStream(source: Readable): Promise<ContentRef>;
  /** Rejects with `ContentNotFoundError` when nothing is published under the reference. */
  get(contentRef: ContentRef): Promise<StoredContent>;
  exists(contentRef: ContentRef): Promise<boolean>;
  /** `refCount` is left at 0; reference counting belongs to the track registry. */
  describe(contentRef: ContentRef): Promise<ContentEntry | null>;
  pathFor(contentRef: ContentRef): string | null;
}
