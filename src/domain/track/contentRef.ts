import { createHash } from 'node:crypto';
import type { ContentRef } from '@/domain/track/types';

const CONTENT_REF_PATTERN = /^[0-9a-f]{8,128}$/;

export function sha256Hex(input: Buffer | string): ContentRef {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * True for strings shaped like a content hash. Anything else can never be
 * published, so callers treat it as absent instead of touching the filesystem.
 */
export function isContentRef(value: string): value is ContentRef {
  return CONTENT_REF_PATTERN.test(value);
}
