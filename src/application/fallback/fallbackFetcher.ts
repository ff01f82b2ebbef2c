import { PassThrough, type Readable } from 'node:stream';
import {
  SourceUnavailableError,
  StorageError,
  TapdeckError,
  UnsupportedSourceError,
  errorMessage,
} from '@/domain/errors';
import { normalizeSourceRef, type SourceRef } from '@/domain/source/sourceRef';
import type { ContentRef } from '@/domain/track/types';
import type { ContentStorePort } from '@/ports/ContentStorePort';
import type { SourceDownloaderPort } from '@/ports/SourceDownloaderPort';
import { raceAbort } from '@/shared/abort';
import { createLogger } from '@/shared/logging/logger';

export type FetchResult = {
  contentRef: ContentRef;
  sourceKey: string;
};

type FetchTask =
  | { state: 'in-flight'; key: string; promise: Promise<FetchResult>; startedAt: number }
  | {
      state: 'done';
      key: string;
      promise: Promise<FetchResult>;
      startedAt: number;
      contentRef: ContentRef;
      settledAt: number;
    }
  | {
      state: 'failed';
      key: string;
      promise: Promise<FetchResult>;
      startedAt: number;
      error: TapdeckError;
      settledAt: number;
    };

export type FetchTaskState =
  | { state: 'in-flight'; key: string; startedAt: number }
  | { state: 'done'; key: string; startedAt: number; contentRef: ContentRef; settledAt: number }
  | { state: 'failed'; key: string; startedAt: number; error: TapdeckError; settledAt: number };

export type FallbackFetcherOptions = {
  failureCooldownMs: number;
  maxDoneTasks?: number;
  now?: () => number;
};

const DEFAULT_MAX_DONE_TASKS = 512;

/**
 * Acquires fallback audio once per canonical source.
 *
 * Tasks live in a map keyed by source key. The map is only read and written
 * between awaits, so check-or-create is atomic: concurrent callers for the
 * same source join one download and see the same result or the same error.
 */
export class FallbackFetcher {
  private readonly log = createLogger('Fallback', 'Fetcher');
  private readonly tasks = new Map<string, FetchTask>();
  private readonly maxDoneTasks: number;
  private readonly now: () => number;

  constructor(
    private readonly downloader: SourceDownloaderPort,
    private readonly store: ContentStorePort,
    private readonly options: FallbackFetcherOptions,
  ) {
    this.maxDoneTasks = Math.max(1, options.maxDoneTasks ?? DEFAULT_MAX_DONE_TASKS);
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the stored content for `sourceHint`, downloading it at most once.
   * An aborted `signal` releases this caller only; the download continues.
   */
  public async fetch(sourceHint: string, options: { signal?: AbortSignal } = {}): Promise<FetchResult> {
    const source = normalizeSourceRef(sourceHint);
    return raceAbort(this.join(source), options.signal);
  }

  public getTaskState(sourceHint: string): FetchTaskState | null {
    let key: string;
    try {
      key = normalizeSourceRef(sourceHint).key;
    } catch (error) {
      if (error instanceof UnsupportedSourceError) {
        return null;
      }
      throw error;
    }
    const task = this.tasks.get(key);
    if (!task) {
      return null;
    }
    switch (task.state) {
      case 'in-flight':
        return { state: task.state, key: task.key, startedAt: task.startedAt };
      case 'done':
        return {
          state: task.state,
          key: task.key,
          startedAt: task.startedAt,
          contentRef: task.contentRef,
          settledAt: task.settledAt,
        };
      case 'failed':
        return {
          state: task.state,
          key: task.key,
          startedAt: task.startedAt,
          error: task.error,
          settledAt: task.settledAt,
        };
    }
  }

  private async join(source: SourceRef): Promise<FetchResult> {
    for (;;) {
      const task = this.tasks.get(source.key);
      if (!task) {
        return this.startTask(source).promise;
      }
      if (task.state === 'in-flight') {
        this.log.debug('joining download', { sourceKey: source.key });
        return task.promise;
      }
      if (task.state === 'failed') {
        if (this.now() - task.settledAt < this.options.failureCooldownMs) {
          return task.promise;
        }
        this.tasks.delete(source.key);
        continue;
      }

      const present = await this.store.exists(task.contentRef);
      if (present) {
        return task.promise;
      }
      if (this.tasks.get(source.key) === task) {
        this.log.warn('cached content vanished; fetching again', {
          sourceKey: source.key,
          contentRef: task.contentRef,
        });
        this.tasks.delete(source.key);
      }
    }
  }

  private startTask(source: SourceRef): FetchTask {
    this.pruneFailed();
    const startedAt = this.now();
    const promise = this.download(source).then(
      (contentRef) => {
        this.settle(source.key, { state: 'done', key: source.key, promise, startedAt, contentRef, settledAt: this.now() });
        return { contentRef, sourceKey: source.key };
      },
      (error: unknown) => {
        const failure = this.toFetchError(source, error);
        this.settle(source.key, {
          state: 'failed',
          key: source.key,
          promise,
          startedAt,
          error: failure,
          settledAt: this.now(),
        });
        throw failure;
      },
    );
    const task: FetchTask = { state: 'in-flight', key: source.key, promise, startedAt };
    this.tasks.set(source.key, task);
    return task;
  }

  private async download(source: SourceRef): Promise<ContentRef> {
    let raw: Readable;
    try {
      raw = this.downloader.open(source);
    } catch (error) {
      throw this.toSourceFailure(source, error);
    }

    // Source errors are typed here, before the store sees them.
    const guarded = new PassThrough();
    raw.on('error', (error: unknown) => {
      guarded.destroy(this.toSourceFailure(source, error));
    });
    guarded.once('close', () => {
      if (!raw.readableEnded) {
        raw.destroy();
      }
    });
    raw.pipe(guarded);

    const contentRef = await this.store.putStream(guarded);
    this.log.info('fallback content stored', { sourceKey: source.key, contentRef });
    return contentRef;
  }

  private settle(key: string, next: FetchTask): void {
    const current = this.tasks.get(key);
    if (!current || current.state !== 'in-flight' || current.promise !== next.promise) {
      return;
    }
    this.tasks.delete(key);
    this.tasks.set(key, next);
    if (next.state === 'failed') {
      this.log.warn('fallback fetch failed', { sourceKey: key, kind: next.error.kind, message: next.error.message });
      return;
    }
    this.evictDone();
  }

  private evictDone(): void {
    let done = 0;
    for (const task of this.tasks.values()) {
      if (task.state === 'done') {
        done += 1;
      }
    }
    for (const [key, task] of this.tasks) {
      if (done <= this.maxDoneTasks) {
        return;
      }
      if (task.state === 'done') {
        this.tasks.delete(key);
        done -= 1;
      }
    }
  }

  private pruneFailed(): void {
    const now = this.now();
    for (const [key, task] of this.tasks) {
      if (task.state === 'failed' && now - task.settledAt >= this.options.failureCooldownMs) {
        this.tasks.delete(key);
      }
    }
  }

  private toSourceFailure(source: SourceRef, error: unknown): TapdeckError {
    if (error instanceof TapdeckError) {
      return error;
    }
    return new SourceUnavailableError(source.key, errorMessage(error), { cause: error });
  }

  private toFetchError(source: SourceRef, error: unknown): TapdeckError {
    if (error instanceof TapdeckError) {
      return error;
    }
    return new StorageError(`storing ${source.key} failed: ${errorMessage(error)}`, { cause: error });
  }
}
