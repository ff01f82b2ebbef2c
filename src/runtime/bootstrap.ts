import type { AddressInfo } from 'node:net';
import { loadConfig, type AppConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { FfmpegDeck } from '@/adapters/deck/ffmpegDeck';
import { HttpService } from '@/adapters/http/httpService';
import { SqliteTrackRegistry } from '@/adapters/registry/sqliteTrackRegistry';
import { YtDlpDownloader } from '@/adapters/source/ytDlpDownloader';
import { FileContentStore } from '@/adapters/storage/fileContentStore';
import { FallbackFetcher } from '@/application/fallback/fallbackFetcher';
import { PlaybackController } from '@/application/playback/playbackController';
import { ResolutionEngine } from '@/application/resolution/resolutionEngine';
import type { DeckPort } from '@/ports/DeckPort';
import type { SourceDownloaderPort } from '@/ports/SourceDownloaderPort';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** Bound address of the HTTP gateway once started. */
  address: () => AddressInfo | null;
};

/** Replaces the process-backed adapters, for embedding and tests. */
export type RuntimeOverrides = {
  downloader?: SourceDownloaderPort;
  deck?: DeckPort;
};

const STOP_TIMEOUT_MS = 6000;

export function createRuntime(config: AppConfig = loadConfig(), overrides: RuntimeOverrides = {}): Runtime {
  logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
  const log = createLogger('Server');

  const store = new FileContentStore(config.storage.contentDir);
  const registry = new SqliteTrackRegistry(config.storage.databasePath);
  const downloader =
    overrides.downloader ??
    new YtDlpDownloader({
      command: config.fetcher.ytDlpPath,
      timeoutMs: config.fetcher.timeoutMs,
      maxBytes: config.fetcher.maxDownloadBytes,
    });
  const deck = overrides.deck ?? new FfmpegDeck(config.deck);
  const fetcher = new FallbackFetcher(downloader, store, {
    failureCooldownMs: config.fetcher.failureCooldownMs,
  });
  const engine = new ResolutionEngine(registry, store, fetcher);
  const controller = new PlaybackController(store, deck);
  const httpService = new HttpService(config.http, { engine, controller, store });
  let started = false;

  async function startServices(): Promise<void> {
    if (started) {
      return;
    }
    log.info('starting tapdeck', { nodeEnv: config.env.nodeEnv });
    await store.init();
    await registry.init();
    await httpService.start();
    started = true;
    log.info('startup complete', { publicBaseUrl: config.http.publicBaseUrl });
  }

  async function stopServices(): Promise<void> {
    const services: LifecycleService[] = [
      { name: 'http', stop: () => httpService.stop() },
      { name: 'playback', stop: () => controller.stop() },
      { name: 'registry', stop: async () => registry.close() },
    ];
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, STOP_TIMEOUT_MS, log);
    }
    started = false;
  }

  return {
    start: startServices,
    stop: stopServices,
    address: () => httpService.address(),
  };
}
