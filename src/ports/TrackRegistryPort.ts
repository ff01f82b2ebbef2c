import type { ContentRef, TrackRecord } from '@/domain/track/types';

export type TrackListOptions = {
  limit: number;
  offset: number;
};

export type TrackPage = {
  total: number;
  items: TrackRecord[];
};

/**
 * Durable card → content binding. The persisted store is authoritative.
 */
export interface TrackRegistryPort {
  lookup(cardId: string): Promise<TrackRecord | null>;
  /** Last writer wins; `lastPlayedAt` is never changed here. */
  upsert(cardId: string, contentRef: ContentRef, sourceRef?: string | null): Promise<void>;
  /** No-op when the card is not bound yet. */
  touch(cardId: string): Promise<void>;
  countReferences(contentRef: ContentRef): Promise<number>;
  list(options: TrackListOptions): Promise<TrackPage>;
}
