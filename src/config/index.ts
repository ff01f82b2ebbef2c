import { loadEnvironment } from '@/config/environment';
import { buildHttpServerConfig } from '@/config/http';
import { buildStorageConfig } from '@/config/storage';
import { buildDeckConfig, buildFetcherConfig } from '@/config/playback';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env) => {
  const environment = loadEnvironment(env);
  return {
    env: environment,
    http: buildHttpServerConfig(environment),
    storage: buildStorageConfig(environment),
    fetcher: buildFetcherConfig(environment),
    deck: buildDeckConfig(environment),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
