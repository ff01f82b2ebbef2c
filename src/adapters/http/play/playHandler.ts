import type { IncomingMessage, ServerResponse } from 'node:http';
import type { PageTemplates } from '@/adapters/http/play/pageTemplates';
import { ERROR_HEADER, MISSING_CARD_ID, statusForError } from '@/adapters/http/utils/errorStatus';
import { sendHtml, sendJson, sendMethodNotAllowed, wantsJson } from '@/adapters/http/utils/respond';
import type { PlaybackController } from '@/application/playback/playbackController';
import type { ResolutionEngine } from '@/application/resolution/resolutionEngine';
import { UnsupportedSourceError, toTapdeckError, type TapdeckErrorKind } from '@/domain/errors';
import { normalizeSourceRef } from '@/domain/source/sourceRef';
import { isAbortError } from '@/shared/abort';
import { createLogger } from '@/shared/logging/logger';

type PlayFailure = {
  status: number;
  kind: TapdeckErrorKind | typeof MISSING_CARD_ID;
  message: string;
  cardId: string | null;
  sourceHint: string | null;
};

/**
 * `GET /play?h=<cardId>&y=<sourceFragment>`: the URL printed on every card.
 */
export class PlayHandler {
  private readonly log = createLogger('Http', 'Play');

  constructor(
    private readonly engine: ResolutionEngine,
    private readonly controller: PlaybackController,
    private readonly pages: PageTemplates,
  ) {}

  public matches(pathname: string): boolean {
    return pathname === '/play';
  }

  public async handle(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    if (req.method !== 'GET') {
      sendMethodNotAllowed(res, ['GET']);
      return;
    }

    const cardId = url.searchParams.get('h') ?? '';
    const sourceHint = url.searchParams.get('y');
    if (!cardId) {
      await this.respondFailure(req, res, {
        status: 400,
        kind: MISSING_CARD_ID,
        message: 'missing card id',
        cardId: null,
        sourceHint,
      });
      return;
    }

    const abort = new AbortController();
    res.once('close', () => {
      if (!res.writableEnded) {
        abort.abort();
      }
    });

    let contentRef: string;
    try {
      contentRef = await this.engine.resolve(cardId, sourceHint, { signal: abort.signal });
      await this.controller.start(contentRef);
    } catch (error) {
      if (abort.signal.aborted && isAbortError(error)) {
        this.log.debug('client left before the card resolved', { cardId });
        return;
      }
      const failure = toTapdeckError(error);
      const status = statusForError(failure.kind);
      const context = { cardId, kind: failure.kind, message: failure.message };
      if (status >= 500) {
        this.log.warn('play request failed', context);
      } else {
        this.log.info('play request rejected', context);
      }
      await this.respondFailure(req, res, {
        status,
        kind: failure.kind,
        message: failure.message,
        cardId,
        sourceHint,
      });
      return;
    }

    this.log.info('card playing', { cardId, contentRef });
    if (wantsJson(req)) {
      sendJson(res, 200, { ok: true, cardId, contentRef, deck: this.controller.getStatus() });
      return;
    }
    sendHtml(res, 200, await this.pages.render('now_playing', { CARD_ID: cardId }));
  }

  private async respondFailure(req: IncomingMessage, res: ServerResponse, failure: PlayFailure): Promise<void> {
    const headers = { [ERROR_HEADER]: failure.kind };
    if (wantsJson(req)) {
      sendJson(
        res,
        failure.status,
        { ok: false, error: failure.kind, message: failure.message, cardId: failure.cardId },
        headers,
      );
      return;
    }

    const sourceUrl = offerableSourceUrl(failure.sourceHint);
    const values = { STATUS: failure.status, REASON: failure.message };
    const html = sourceUrl
      ? await this.pages.render('offer_source', { ...values, SOURCE_URL: sourceUrl })
      : await this.pages.render('no_track', values);
    sendHtml(res, failure.status, html, headers);
  }
}

function offerableSourceUrl(sourceHint: string | null): string | null {
  if (!sourceHint) {
    return null;
  }
  try {
    return normalizeSourceRef(sourceHint).url;
  } catch (error) {
    if (error instanceof UnsupportedSourceError) {
      return null;
    }
    throw error;
  }
}
