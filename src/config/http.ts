import path from 'node:path';
import type { EnvironmentConfig } from '@/config/environment';

/**
 * Runtime options for the HTTP gateway.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
  publicBaseUrl: string;
  templatesDir: string;
}

export function buildHttpServerConfig(env: EnvironmentConfig, cwd = process.cwd()): HttpServerConfig {
  return {
    port: env.httpPort,
    host: env.httpHost,
    publicBaseUrl: env.publicBaseUrl,
    templatesDir: path.resolve(cwd, 'public', 'templates'),
  };
}
