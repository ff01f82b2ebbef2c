import path from 'node:path';
import type { EnvironmentConfig } from '@/config/environment';

export interface StorageConfig {
  contentDir: string;
  databasePath: string;
}

export function buildStorageConfig(env: EnvironmentConfig, cwd = process.cwd()): StorageConfig {
  const dataDir = path.resolve(cwd, env.dataDir);
  const databasePath =
    env.databasePath === ':memory:'
      ? ':memory:'
      : path.resolve(dataDir, env.databasePath ?? 'tapdeck.db');
  return {
    contentDir: path.join(dataDir, 'content'),
    databasePath,
  };
}
