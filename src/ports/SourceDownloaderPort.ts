import type { Readable } from 'node:stream';
import type { SourceRef } from '@/domain/source/sourceRef';

/**
 * Performs the external retrieval for one canonical source. The returned
 * stream ends only after a complete, successful download; any failure is
 * delivered as a stream error.
 */
export interface SourceDownloaderPort {
  open(source: SourceRef): Readable;
}
