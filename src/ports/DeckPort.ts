import type { Readable } from 'node:stream';
import type { ContentEntry } from '@/domain/track/types';

export type DeckEndReason = 'ended' | 'stopped' | 'failed';

export type DeckSession = {
  /** Settles once the output has released the device. */
  finished: Promise<DeckEndReason>;
  /** Resolves after `finished` has settled. */
  stop(): Promise<void>;
};

/**
 * The single physical output. `play` resolves once the output accepted the
 * stream and rejects with `PlaybackError` when it cannot be opened.
 */
export interface DeckPort {
  play(input: { entry: ContentEntry; stream: Readable }): Promise<DeckSession>;
}
