import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { DeckConfig } from '@/config/playback';
import { PlaybackError } from '@/domain/errors';
import type { ContentEntry } from '@/domain/track/types';
import type { DeckEndReason, DeckPort, DeckSession } from '@/ports/DeckPort';
import { createLogger } from '@/shared/logging/logger';

export type FfmpegDeckOptions = DeckConfig & {
  /** Arguments placed before the ffmpeg flags (a wrapper script, for instance). */
  prefixArgs?: string[];
};

/**
 * Plays stored audio on the local output by piping it into ffmpeg.
 */
export class FfmpegDeck implements DeckPort {
  private readonly log = createLogger('Deck', 'Ffmpeg');

  constructor(private readonly options: FfmpegDeckOptions) {}

  public play(input: { entry: ContentEntry; stream: Readable }): Promise<DeckSession> {
    const { entry, stream } = input;
    const args = [
      ...(this.options.prefixArgs ?? []),
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      'pipe:0',
      ...this.options.outputArgs,
    ];
    const log = this.log.child(entry.contentHash.slice(0, 12));
    log.debug('spawning ffmpeg', { command: this.options.ffmpegPath, args: args.join(' ') });

    return new Promise<DeckSession>((resolve, reject) => {
      const proc = spawn(this.options.ffmpegPath, args, { stdio: ['pipe', 'ignore', 'pipe'] });
      let spawned = false;
      let stopping = false;
      let killTimer: NodeJS.Timeout | undefined;
      let lastStderr: string | null = null;
      let endReason: DeckEndReason | null = null;
      let settle: (reason: DeckEndReason) => void = () => undefined;
      const finished = new Promise<DeckEndReason>((resolveFinished) => {
        settle = resolveFinished;
      });

      const end = (reason: DeckEndReason): void => {
        if (endReason) {
          return;
        }
        endReason = reason;
        if (killTimer) {
          clearTimeout(killTimer);
          killTimer = undefined;
        }
        stream.unpipe(proc.stdin);
        stream.destroy();
        settle(reason);
      };

      proc.stderr.on('data', (chunk: Buffer) => {
        const message = chunk.toString('utf8').trim();
        if (message) {
          lastStderr = message;
          log.debug('ffmpeg stderr', { message });
        }
      });

      proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'EPIPE') {
          log.warn('ffmpeg stdin error', { message: error.message });
        }
      });

      stream.on('error', (error: Error) => {
        log.warn('content stream failed', { message: error.message });
        proc.kill('SIGTERM');
      });

      proc.once('spawn', () => {
        spawned = true;
        stream.pipe(proc.stdin);
        log.info('playback started', { format: entry.format, byteSize: entry.byteSize });
        resolve({
          finished,
          stop: async () => {
            if (!endReason && !stopping) {
              stopping = true;
              proc.kill('SIGTERM');
              killTimer = setTimeout(() => {
                if (proc.exitCode === null && proc.signalCode === null) {
                  log.warn('ffmpeg ignored SIGTERM; killing');
                  proc.kill('SIGKILL');
                }
              }, this.options.killTimeoutMs);
            }
            await finished;
          },
        });
      });

      proc.on('error', (error: NodeJS.ErrnoException) => {
        if (!spawned) {
          end('failed');
          reject(new PlaybackError(`failed to start ffmpeg: ${error.message}`, { cause: error }));
          return;
        }
        log.warn('ffmpeg process error', { message: error.message });
      });

      proc.on('close', (code, signal) => {
        const reason: DeckEndReason = stopping ? 'stopped' : code === 0 ? 'ended' : 'failed';
        if (reason === 'failed') {
          log.warn('playback failed', { code, signal, stderr: lastStderr ?? undefined });
        } else {
          log.info(reason === 'stopped' ? 'playback stopped' : 'playback ended', { code, signal });
        }
        end(reason);
      });
    });
  }
}
