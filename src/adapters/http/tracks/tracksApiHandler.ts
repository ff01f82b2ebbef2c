import fs from 'node:fs';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { getAudioMimeType } from '@/adapters/http/utils/mimeTypes';
import { ERROR_HEADER } from '@/adapters/http/utils/errorStatus';
import { sendJson, sendMethodNotAllowed, sendText } from '@/adapters/http/utils/respond';
import type { ResolutionEngine } from '@/application/resolution/resolutionEngine';
import { buildPlayUrl } from '@/domain/publicEndpoint';
import { sourceFragmentForKey } from '@/domain/source/sourceRef';
import type { ContentEntry } from '@/domain/track/types';
import type { ContentStorePort } from '@/ports/ContentStorePort';
import { createLogger } from '@/shared/logging/logger';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 500;

/**
 * Read-only track inspection: `/tracks` (with `?unavailable=true` for cards
 * whose audio is gone), `/tracks/<cardId>` and
 * `/tracks/<cardId>/stream` (with Range support).
 */
export class TracksApiHandler {
  private readonly log = createLogger('Http', 'Tracks');

  constructor(
    private readonly engine: ResolutionEngine,
    private readonly store: ContentStorePort,
    private readonly publicBaseUrl: string,
  ) {}

  public matches(pathname: string): boolean {
    return pathname === '/tracks' || pathname.startsWith('/tracks/');
  }

  public async handle(req: IncomingMessage, res: ServerResponse, url: URL, pathname: string): Promise<void> {
    if (req.method !== 'GET') {
      sendMethodNotAllowed(res, ['GET']);
      return;
    }

    if (pathname === '/tracks' || pathname === '/tracks/') {
      await this.sendList(res, url);
      return;
    }

    const rest = pathname.slice('/tracks/'.length);
    if (rest.endsWith('/stream')) {
      await this.streamTrack(req, res, rest.slice(0, -'/stream'.length));
      return;
    }
    await this.sendTrack(res, rest);
  }

  private async sendList(res: ServerResponse, url: URL): Promise<void> {
    const limit = clampInteger(url.searchParams.get('limit'), DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE);
    const offset = clampInteger(url.searchParams.get('offset'), 0, 0, Number.MAX_SAFE_INTEGER);
    const unavailableOnly = isTruthyFlag(url.searchParams.get('unavailable'));
    const page = await this.engine.listTracks({ limit, offset, unavailableOnly });
    sendJson(res, 200, { total: page.total, limit, offset, items: page.items });
  }

  private async sendTrack(res: ServerResponse, cardId: string): Promise<void> {
    const described = await this.engine.describe(cardId);
    if (!described) {
      this.sendUnknown(res, cardId);
      return;
    }
    const fragment = described.record.sourceRef ? sourceFragmentForKey(described.record.sourceRef) : null;
    sendJson(res, 200, {
      record: described.record,
      entry: described.entry,
      available: described.entry !== null,
      playUrl: buildPlayUrl(this.publicBaseUrl, cardId, fragment),
    });
  }

  private async streamTrack(req: IncomingMessage, res: ServerResponse, cardId: string): Promise<void> {
    const described = await this.engine.describe(cardId);
    if (!described) {
      this.sendUnknown(res, cardId);
      return;
    }
    const filePath = described.record.contentRef ? this.store.pathFor(described.record.contentRef) : null;
    if (!described.entry || !filePath) {
      sendJson(res, 404, { error: 'content-missing', cardId }, { [ERROR_HEADER]: 'content-missing' });
      return;
    }
    this.streamFile(req, res, filePath, described.entry);
  }

  private streamFile(req: IncomingMessage, res: ServerResponse, filePath: string, entry: ContentEntry): void {
    const size = entry.byteSize;
    const contentType = getAudioMimeType(entry.format);
    const rangeHeader = req.headers.range;

    if (!rangeHeader) {
      res.writeHead(200, {
        'Content-Type': contentType,
        'Content-Length': size,
        'Accept-Ranges': 'bytes',
      });
      this.pipeStream(fs.createReadStream(filePath), res);
      return;
    }

    const match = /^bytes=(\d*)-(\d*)$/.exec(rangeHeader);
    if (!match || (!match[1] && !match[2])) {
      this.sendUnsatisfiable(res, size);
      return;
    }

    let start: number;
    let end: number;
    if (!match[1]) {
      // suffix range: the last N bytes
      const suffix = Number(match[2]);
      start = Math.max(0, size - suffix);
      end = size - 1;
    } else {
      start = Number(match[1]);
      end = match[2] ? Math.min(Number(match[2]), size - 1) : size - 1;
    }

    if (Number.isNaN(start) || Number.isNaN(end) || start > end || start >= size) {
      this.sendUnsatisfiable(res, size);
      return;
    }

    res.writeHead(206, {
      'Content-Type': contentType,
      'Content-Length': end - start + 1,
      'Content-Range': `bytes ${start}-${end}/${size}`,
      'Accept-Ranges': 'bytes',
    });
    this.pipeStream(fs.createReadStream(filePath, { start, end }), res);
  }

  private pipeStream(stream: fs.ReadStream, res: ServerResponse): void {
    stream.on('error', (error: Error) => {
      this.log.error('track stream error', { message: error.message });
      if (!res.headersSent) {
        sendText(res, 500, 'Streaming error');
      } else {
        res.destroy(error);
      }
    });
    stream.pipe(res);
  }

  private sendUnsatisfiable(res: ServerResponse, size: number): void {
    res.writeHead(416, { 'Content-Range': `bytes */${size}`, 'Content-Type': 'text/plain' });
    res.end('Invalid Range');
  }

  private sendUnknown(res: ServerResponse, cardId: string): void {
    sendJson(res, 404, { error: 'unknown-card', cardId }, { [ERROR_HEADER]: 'unknown-card' });
  }
}

function isTruthyFlag(raw: string | null): boolean {
  const value = raw?.trim().toLowerCase();
  return value === 'true' || value === '1' || value === '';
}

function clampInteger(raw: string | null, fallback: number, min: number, max: number): number {
  if (raw === null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, parsed));
}
