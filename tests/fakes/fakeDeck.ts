import type { Readable } from 'node:stream';
import type { ContentEntry } from '../../src/domain/track/types';
import type { DeckEndReason, DeckPort, DeckSession } from '../../src/ports/DeckPort';
import { deferred, delay } from '../helpers/deferred';

export type FakeDeckSession = {
  entry: ContentEntry;
  stopCalls: number;
  ended: boolean;
  finished: Promise<DeckEndReason>;
  /** Bytes received from the content stream so far. */
  received: () => Buffer;
  /** Resolves once the content stream has been read to the end. */
  drained: Promise<void>;
  /** Ends the session as if the output finished on its own. */
  finish: (reason: DeckEndReason) => void;
};

export class FakeDeck implements DeckPort {
  public readonly sessions: FakeDeckSession[] = [];
  public active = 0;
  public maxActive = 0;
  public failNext: Error | null = null;
  public stopDelayMs = 0;

  public async play(input: { entry: ContentEntry; stream: Readable }): Promise<DeckSession> {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }

    const finished = deferred<DeckEndReason>();
    const drained = deferred<void>();
    const chunks: Buffer[] = [];
    input.stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    input.stream.on('end', () => drained.resolve());

    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);

    const session: FakeDeckSession = {
      entry: input.entry,
      stopCalls: 0,
      ended: false,
      finished: finished.promise,
      received: () => Buffer.concat(chunks),
      drained: drained.promise,
      finish: (reason) => {
        if (session.ended) {
          return;
        }
        session.ended = true;
        this.active -= 1;
        input.stream.destroy();
        finished.resolve(reason);
      },
    };
    this.sessions.push(session);

    return {
      finished: finished.promise,
      stop: async () => {
        session.stopCalls += 1;
        if (this.stopDelayMs > 0) {
          await delay(this.stopDelayMs);
        }
        session.finish('stopped');
        await finished.promise;
      },
    };
  }
}
