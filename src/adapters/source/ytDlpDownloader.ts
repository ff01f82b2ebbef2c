import { spawn } from 'node:child_process';
import { PassThrough, type Readable } from 'node:stream';
import {
  SourceUnavailableError,
  TapdeckError,
  UnsupportedSourceError,
} from '@/domain/errors';
import type { SourceRef } from '@/domain/source/sourceRef';
import type { SourceDownloaderPort } from '@/ports/SourceDownloaderPort';
import { createLogger } from '@/shared/logging/logger';

export type YtDlpDownloaderOptions = {
  command: string;
  /** Arguments placed before the yt-dlp flags (a wrapper script, for instance). */
  prefixArgs?: string[];
  timeoutMs: number;
  maxBytes: number;
};

const STDERR_TAIL_CHARS = 2000;

/**
 * Streams the best audio track of a YouTube video through `yt-dlp -o -`.
 *
 * Stdout is forwarded as it arrives, but the returned stream only ends once
 * the process exited with code 0. Any other outcome destroys it with a typed
 * error, so a consumer never mistakes a truncated download for a complete one.
 */
export class YtDlpDownloader implements SourceDownloaderPort {
  private readonly log = createLogger('Source', 'YtDlp');

  constructor(private readonly options: YtDlpDownloaderOptions) {}

  public open(source: SourceRef): Readable {
    const output = new PassThrough();
    const args = [
      ...(this.options.prefixArgs ?? []),
      '-f',
      'bestaudio',
      '--no-playlist',
      '-o',
      '-',
      source.url,
    ];
    this.log.info('download started', { sourceKey: source.key });
    this.log.debug('spawning yt-dlp', { command: this.options.command, args: args.join(' ') });

    const proc = spawn(this.options.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let settled = false;
    let received = 0;
    let stderrTail = '';

    const timer = setTimeout(() => {
      fail(new SourceUnavailableError(source.key, `download timed out after ${this.options.timeoutMs} ms`));
    }, this.options.timeoutMs);

    const fail = (error: TapdeckError): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      proc.stdout.unpipe(output);
      if (proc.exitCode === null && proc.signalCode === null) {
        proc.kill('SIGKILL');
      }
      this.log.warn('download failed', { sourceKey: source.key, message: error.message });
      output.destroy(error);
    };

    proc.stdout.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > this.options.maxBytes) {
        fail(new SourceUnavailableError(source.key, `download exceeds ${this.options.maxBytes} bytes`));
      }
    });
    proc.stdout.pipe(output, { end: false });

    proc.stderr.on('data', (chunk: Buffer) => {
      stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_CHARS);
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      fail(new SourceUnavailableError(source.key, `failed to start yt-dlp: ${error.message}`, { cause: error }));
    });

    proc.on('close', (code, signal) => {
      if (settled) {
        return;
      }
      if (code === 0) {
        settled = true;
        clearTimeout(timer);
        this.log.info('download finished', { sourceKey: source.key, bytes: received });
        output.end();
        return;
      }
      fail(classifyFailure(source, code, signal, stderrTail));
    });

    output.once('close', () => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      this.log.debug('download abandoned by consumer', { sourceKey: source.key });
      proc.kill('SIGTERM');
    });

    return output;
  }
}

function classifyFailure(
  source: SourceRef,
  code: number | null,
  signal: NodeJS.Signals | null,
  stderr: string,
): TapdeckError {
  if (/unsupported url/i.test(stderr)) {
    return new UnsupportedSourceError(source.url, 'rejected by yt-dlp');
  }
  const lastLine = lastNonEmptyLine(stderr);
  const exit = signal ? `signal ${signal}` : `exit code ${code ?? 'unknown'}`;
  return new SourceUnavailableError(source.key, lastLine ? `${exit}: ${lastLine}` : exit);
}

function lastNonEmptyLine(text: string): string | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] ?? null : null;
}
