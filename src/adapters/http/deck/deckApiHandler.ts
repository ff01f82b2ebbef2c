import type { IncomingMessage, ServerResponse } from 'node:http';
import { ERROR_HEADER, statusForError } from '@/adapters/http/utils/errorStatus';
import { sendJson, sendMethodNotAllowed } from '@/adapters/http/utils/respond';
import type { PlaybackController } from '@/application/playback/playbackController';
import { toTapdeckError } from '@/domain/errors';
import { createLogger } from '@/shared/logging/logger';

/**
 * `GET /deck` reports the controller state, `POST /deck/stop` stops playback.
 */
export class DeckApiHandler {
  private readonly log = createLogger('Http', 'Deck');

  constructor(private readonly controller: PlaybackController) {}

  public matches(pathname: string): boolean {
    return pathname === '/deck' || pathname === '/deck/stop';
  }

  public async handle(req: IncomingMessage, res: ServerResponse, pathname: string): Promise<void> {
    if (pathname === '/deck') {
      if (req.method !== 'GET') {
        sendMethodNotAllowed(res, ['GET']);
        return;
      }
      sendJson(res, 200, this.controller.getStatus());
      return;
    }

    if (req.method !== 'POST') {
      sendMethodNotAllowed(res, ['POST']);
      return;
    }
    try {
      await this.controller.stop();
    } catch (error) {
      const failure = toTapdeckError(error);
      this.log.warn('stop failed', { kind: failure.kind, message: failure.message });
      sendJson(
        res,
        statusForError(failure.kind),
        { error: failure.kind, message: failure.message },
        { [ERROR_HEADER]: failure.kind },
      );
      return;
    }
    sendJson(res, 200, this.controller.getStatus());
  }
}
