import type { EnvironmentConfig } from '@/config/environment';

export interface FetcherConfig {
  ytDlpPath: string;
  timeoutMs: number;
  failureCooldownMs: number;
  maxDownloadBytes: number;
}

export interface DeckConfig {
  ffmpegPath: string;
  outputArgs: string[];
  killTimeoutMs: number;
}

export function buildFetcherConfig(env: EnvironmentConfig): FetcherConfig {
  return {
    ytDlpPath: env.ytDlpPath,
    timeoutMs: env.fetchTimeoutMs,
    failureCooldownMs: env.fetchFailureCooldownMs,
    maxDownloadBytes: env.maxDownloadBytes,
  };
}

export function buildDeckConfig(env: EnvironmentConfig): DeckConfig {
  return {
    ffmpegPath: env.ffmpegPath,
    outputArgs: env.deckOutputArgs,
    killTimeoutMs: 2000,
  };
}
