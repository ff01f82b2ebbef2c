import type { FallbackFetcher } from '@/application/fallback/fallbackFetcher';
import { UnknownCardError } from '@/domain/errors';
import type { ContentEntry, ContentRef, TrackRecord } from '@/domain/track/types';
import type { ContentStorePort } from '@/ports/ContentStorePort';
import type { TrackRegistryPort } from '@/ports/TrackRegistryPort';
import { raceAbort } from '@/shared/abort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export type ResolveOptions = {
  signal?: AbortSignal;
};

export type TrackDescription = {
  record: TrackRecord;
  entry: ContentEntry | null;
};

export type TrackStatus = TrackRecord & {
  /** True when the bound content is published in the store. */
  available: boolean;
};

export type TrackStatusPage = {
  total: number;
  items: TrackStatus[];
};

const SCAN_PAGE_SIZE = 500;

/**
 * Maps a card id (plus an optional fallback hint) to stored audio.
 *
 * A binding whose content exists wins and no fallback work happens. Otherwise
 * the hint is fetched once, the binding is written and the content returned.
 */
export class ResolutionEngine {
  private readonly log = createLogger('Resolution', 'Engine');

  constructor(
    private readonly registry: TrackRegistryPort,
    private readonly store: ContentStorePort,
    private readonly fetcher: FallbackFetcher,
  ) {}

  /**
   * Aborting `signal` rejects this call only. A download or registry write
   * already underway still completes.
   */
  public resolve(cardId: string, sourceHint?: string | null, options: ResolveOptions = {}): Promise<ContentRef> {
    return raceAbort(this.resolveDetached(cardId, sourceHint ?? null), options.signal);
  }

  public async describe(cardId: string): Promise<TrackDescription | null> {
    const record = await this.registry.lookup(cardId);
    if (!record) {
      return null;
    }
    if (!record.contentRef) {
      return { record, entry: null };
    }
    const entry = await this.store.describe(record.contentRef);
    if (!entry) {
      return { record, entry: null };
    }
    const refCount = await this.registry.countReferences(record.contentRef);
    return { record, entry: { ...entry, refCount } };
  }

  /**
   * Pages through the registry with each record's availability. With
   * `unavailableOnly`, the whole registry is scanned and paging applies to the
   * records whose content is missing.
   */
  public async listTracks(options: {
    limit: number;
    offset: number;
    unavailableOnly?: boolean;
  }): Promise<TrackStatusPage> {
    if (!options.unavailableOnly) {
      const page = await this.registry.list({ limit: options.limit, offset: options.offset });
      const items = await Promise.all(page.items.map((record) => this.withStatus(record)));
      return { total: page.total, items };
    }

    const unavailable: TrackStatus[] = [];
    for (let offset = 0; ; offset += SCAN_PAGE_SIZE) {
      const page = await this.registry.list({ limit: SCAN_PAGE_SIZE, offset });
      for (const record of page.items) {
        const status = await this.withStatus(record);
        if (!status.available) {
          unavailable.push(status);
        }
      }
      if (page.items.length < SCAN_PAGE_SIZE) {
        break;
      }
    }
    return {
      total: unavailable.length,
      items: unavailable.slice(options.offset, options.offset + options.limit),
    };
  }

  private async withStatus(record: TrackRecord): Promise<TrackStatus> {
    const available = record.contentRef ? await this.store.exists(record.contentRef) : false;
    return { ...record, available };
  }

  private async resolveDetached(cardId: string, sourceHint: string | null): Promise<ContentRef> {
    const record = await this.registry.lookup(cardId);
    if (record?.contentRef) {
      if (await this.store.exists(record.contentRef)) {
        this.log.debug('resolved from registry', { cardId, contentRef: record.contentRef });
        this.scheduleTouch(cardId);
        return record.contentRef;
      }
      this.log.warn('bound content is missing; treating as unbound', {
        cardId,
        contentRef: record.contentRef,
      });
    }

    const hint = sourceHint?.trim();
    if (!hint) {
      throw new UnknownCardError(cardId);
    }

    this.log.info('resolving through fallback', { cardId, sourceHint: hint });
    const { contentRef, sourceKey } = await this.fetcher.fetch(hint);
    await this.registry.upsert(cardId, contentRef, sourceKey);
    this.log.info('card bound', { cardId, contentRef, sourceKey });
    this.scheduleTouch(cardId);
    return contentRef;
  }

  private scheduleTouch(cardId: string): void {
    void bestEffort(() => this.registry.touch(cardId), {
      fallback: undefined,
      onError: 'debug',
      label: 'last-played update failed',
      context: { cardId },
      log: this.log,
    });
  }
}
