import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Canonical view of the process environment consumed by the application.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  logJson: boolean;
  httpPort: number;
  httpHost: string;
  publicBaseUrl: string;
  dataDir: string;
  /** SQLite file for the track registry, or `:memory:`. Defaults to `<dataDir>/tapdeck.db`. */
  databasePath: string | null;
  ytDlpPath: string;
  fetchTimeoutMs: number;
  fetchFailureCooldownMs: number;
  maxDownloadBytes: number;
  ffmpegPath: string;
  deckOutputArgs: string[];
}

const DEFAULT_ENVIRONMENT: EnvironmentConfig = {
  nodeEnv: 'development',
  logLevel: 'info',
  logJson: false,
  httpPort: 8080,
  httpHost: '0.0.0.0',
  publicBaseUrl: 'http://tapdeck.local:8080',
  dataDir: 'data',
  databasePath: null,
  ytDlpPath: 'yt-dlp',
  fetchTimeoutMs: 5 * 60_000,
  fetchFailureCooldownMs: 30_000,
  maxDownloadBytes: 200 * 1024 * 1024,
  ffmpegPath: 'ffmpeg',
  deckOutputArgs: ['-f', 'alsa', 'default'],
};

type Env = Record<string, string | undefined>;

/**
 * Reads `TAPDECK_*` overrides on top of the defaults. Unparseable values fall
 * back to the default instead of aborting startup.
 */
export function loadEnvironment(env: Env = process.env): EnvironmentConfig {
  const defaults = DEFAULT_ENVIRONMENT;
  return {
    nodeEnv: readNodeEnv(env.NODE_ENV) ?? defaults.nodeEnv,
    logLevel: readLogLevel(env.TAPDECK_LOG_LEVEL) ?? defaults.logLevel,
    logJson: readBoolean(env.TAPDECK_LOG_JSON) ?? defaults.logJson,
    httpPort: readInteger(env.TAPDECK_HTTP_PORT, 0, 65_535) ?? defaults.httpPort,
    httpHost: readString(env.TAPDECK_HTTP_HOST) ?? defaults.httpHost,
    publicBaseUrl: readString(env.TAPDECK_PUBLIC_BASE_URL) ?? defaults.publicBaseUrl,
    dataDir: readString(env.TAPDECK_DATA_DIR) ?? defaults.dataDir,
    databasePath: readString(env.TAPDECK_DATABASE) ?? defaults.databasePath,
    ytDlpPath: readString(env.TAPDECK_YTDLP_PATH) ?? defaults.ytDlpPath,
    fetchTimeoutMs: readInteger(env.TAPDECK_FETCH_TIMEOUT_MS, 1) ?? defaults.fetchTimeoutMs,
    fetchFailureCooldownMs:
      readInteger(env.TAPDECK_FETCH_FAILURE_COOLDOWN_MS, 0) ?? defaults.fetchFailureCooldownMs,
    maxDownloadBytes: readInteger(env.TAPDECK_MAX_DOWNLOAD_BYTES, 1) ?? defaults.maxDownloadBytes,
    ffmpegPath: readString(env.TAPDECK_FFMPEG_PATH ?? env.FFMPEG_PATH) ?? defaults.ffmpegPath,
    deckOutputArgs: readArgs(env.TAPDECK_DECK_OUTPUT) ?? [...defaults.deckOutputArgs],
  };
}

function readString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function readInteger(value: string | undefined, min: number, max = Number.MAX_SAFE_INTEGER): number | null {
  const raw = readString(value);
  if (raw === null || !/^\d+$/.test(raw)) {
    return null;
  }
  const parsed = Number(raw);
  return parsed >= min && parsed <= max ? parsed : null;
}

function readBoolean(value: string | undefined): boolean | null {
  const raw = readString(value)?.toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return null;
}

function readLogLevel(value: string | undefined): LogLevel | null {
  const raw = readString(value)?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : null;
}

function readNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] | null {
  const raw = readString(value);
  return raw === 'development' || raw === 'production' || raw === 'test' ? raw : null;
}

function readArgs(value: string | undefined): string[] | null {
  const raw = readString(value);
  return raw ? raw.split(/\s+/) : null;
}
