import { PlaybackError, TapdeckError, errorMessage } from '@/domain/errors';
import type { ContentRef } from '@/domain/track/types';
import type { ContentStorePort } from '@/ports/ContentStorePort';
import type { DeckEndReason, DeckPort, DeckSession } from '@/ports/DeckPort';
import { createLogger } from '@/shared/logging/logger';

export type PlaybackState = 'idle' | 'playing' | 'stopping';

export type PlaybackStatus =
  | { state: 'idle' }
  | { state: Exclude<PlaybackState, 'idle'>; contentRef: ContentRef; startedAt: number };

type ActiveSession = {
  contentRef: ContentRef;
  startedAt: number;
  session: DeckSession;
  stopping: boolean;
};

/**
 * Owns the single deck slot. Every start and stop runs through one promise
 * chain, so two operations never interleave and two streams never overlap.
 */
export class PlaybackController {
  private readonly log = createLogger('Playback', 'Controller');
  private current: ActiveSession | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: ContentStorePort,
    private readonly deck: DeckPort,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Interrupts whatever is playing, then hands `contentRef` to the deck.
   * Resolves once the deck accepted the stream.
   */
  public start(contentRef: ContentRef): Promise<void> {
    return this.enqueue(() => this.startNow(contentRef));
  }

  public stop(): Promise<void> {
    return this.enqueue(() => this.stopCurrent());
  }

  public getStatus(): PlaybackStatus {
    const active = this.current;
    if (!active) {
      return { state: 'idle' };
    }
    return {
      state: active.stopping ? 'stopping' : 'playing',
      contentRef: active.contentRef,
      startedAt: active.startedAt,
    };
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    this.tail = result.then(noop, noop);
    return result;
  }

  private async startNow(contentRef: ContentRef): Promise<void> {
    await this.stopCurrent();

    const { entry, stream } = await this.store.get(contentRef);
    let session: DeckSession;
    try {
      session = await this.deck.play({ entry, stream });
    } catch (error) {
      stream.destroy();
      throw error instanceof TapdeckError
        ? error
        : new PlaybackError(`deck refused ${contentRef}: ${errorMessage(error)}`, { cause: error });
    }

    const active: ActiveSession = { contentRef, startedAt: this.now(), session, stopping: false };
    this.current = active;
    this.log.info('playing', { contentRef, format: entry.format });
    void session.finished.then(
      (reason) => this.handleFinished(active, reason),
      (error: unknown) => {
        this.log.warn('deck session failed', { contentRef, message: errorMessage(error) });
        this.handleFinished(active, 'failed');
      },
    );
  }

  private async stopCurrent(): Promise<void> {
    const active = this.current;
    if (!active) {
      return;
    }
    active.stopping = true;
    this.log.debug('stopping', { contentRef: active.contentRef });
    try {
      await active.session.stop();
    } finally {
      if (this.current === active) {
        this.current = null;
      }
    }
    this.log.info('stopped', { contentRef: active.contentRef });
  }

  private handleFinished(active: ActiveSession, reason: DeckEndReason): void {
    if (this.current !== active || active.stopping) {
      return;
    }
    this.current = null;
    this.log.info('playback finished', { contentRef: active.contentRef, reason });
  }
}

function noop(): void {}
