import { parseFile } from 'music-metadata';
import type { ComponentLogger } from '@/shared/logging/logger';

export const UNKNOWN_FORMAT = 'unknown';

/**
 * Maps a music-metadata container label (`MPEG`, `EBML/webm`, `M4A/isom`, ...)
 * to the short format tag stored with each entry.
 */
export function formatTagFromContainer(container: string | undefined): string {
  if (!container) {
    return UNKNOWN_FORMAT;
  }
  const normalized = container.trim().toLowerCase();
  if (!normalized) {
    return UNKNOWN_FORMAT;
  }
  if (normalized.startsWith('ebml/')) {
    return normalized.slice('ebml/'.length) || 'webm';
  }
  if (normalized.startsWith('m4a') || normalized.startsWith('mp4')) {
    return 'm4a';
  }
  if (normalized === 'wave') {
    return 'wav';
  }
  if (normalized === 'adts') {
    return 'aac';
  }
  return normalized.replace(/[^a-z0-9]+/g, '-');
}

/**
 * Probes a file on disk for its container. Undetectable payloads are stored
 * as `unknown` rather than rejected.
 */
export async function detectAudioFormat(filePath: string, log: ComponentLogger): Promise<string> {
  try {
    const metadata = await parseFile(filePath, { duration: false, skipCovers: true });
    return formatTagFromContainer(metadata.format.container);
  } catch (error) {
    log.debug('format probe failed', {
      filePath,
      message: error instanceof Error ? error.message : String(error),
    });
    return UNKNOWN_FORMAT;
  }
}
