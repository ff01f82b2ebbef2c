import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createLogger } from '@/shared/logging/logger';
import type { HttpServerConfig } from '@/config/http';
import { DeckApiHandler } from '@/adapters/http/deck/deckApiHandler';
import { PageTemplates } from '@/adapters/http/play/pageTemplates';
import { PlayHandler } from '@/adapters/http/play/playHandler';
import { TracksApiHandler } from '@/adapters/http/tracks/tracksApiHandler';
import { ERROR_HEADER } from '@/adapters/http/utils/errorStatus';
import { sendJson } from '@/adapters/http/utils/respond';
import type { PlaybackController } from '@/application/playback/playbackController';
import type { ResolutionEngine } from '@/application/resolution/resolutionEngine';
import type { ContentStorePort } from '@/ports/ContentStorePort';

/**
 * Hosts the HTTP gateway: the card trigger plus track and deck inspection.
 */
export class HttpService {
  private readonly log = createLogger('Http');
  private readonly play: PlayHandler;
  private readonly tracks: TracksApiHandler;
  private readonly deck: DeckApiHandler;
  private server?: http.Server;

  constructor(
    private readonly config: HttpServerConfig,
    options: {
      engine: ResolutionEngine;
      controller: PlaybackController;
      store: ContentStorePort;
    },
  ) {
    this.play = new PlayHandler(options.engine, options.controller, new PageTemplates(config.templatesDir));
    this.tracks = new TracksApiHandler(options.engine, options.store, config.publicBaseUrl);
    this.deck = new DeckApiHandler(options.controller);
  }

  public async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.log.error('http request failed', { url: req.url, message });
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'internal-error' }, { [ERROR_HEADER]: 'internal-error' });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server
        .listen(this.config.port, this.config.host, () => {
          this.log.info('http gateway listening', {
            port: this.address()?.port ?? this.config.port,
            host: this.config.host,
          });
          resolve();
        })
        .on('error', reject);
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }

  public address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    this.applyCors(res);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = this.normalizePath(url.pathname);
    this.log.spam('request', { method: req.method, pathname });

    if (this.play.matches(pathname)) {
      await this.play.handle(req, res, url);
      return;
    }

    if (this.tracks.matches(pathname)) {
      await this.tracks.handle(req, res, url, pathname);
      return;
    }

    if (this.deck.matches(pathname)) {
      await this.deck.handle(req, res, pathname);
      return;
    }

    sendJson(res, 404, { error: 'not-found' });
  }

  private applyCors(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Cache-Control', 'no-cache');
  }

  private normalizePath(rawPath: string): string {
    try {
      return decodeURIComponent(rawPath || '/');
    } catch {
      return rawPath || '/';
    }
  }
}
