import { errorMessage } from '@/domain/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type StopResult =
  | { kind: 'stopped' }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

export type StopLog = Pick<ComponentLogger, 'info' | 'warn' | 'error'>;

/**
 * Runs one service's stop hook, giving up after `timeoutMs`. A stop that
 * finishes late is still awaited in the background so its failure gets logged.
 */
export async function stopWithTimeout(
  name: string,
  stopFn: () => Promise<void>,
  timeoutMs: number,
  log: StopLog = createLogger('Server'),
): Promise<StopResult> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const stopPromise = (async (): Promise<StopResult> => {
    try {
      await stopFn();
      return { kind: 'stopped' };
    } catch (error) {
      return { kind: 'error', error };
    }
  })();
  const timeoutPromise = new Promise<StopResult>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  const result = await Promise.race([stopPromise, timeoutPromise]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });

  switch (result.kind) {
    case 'stopped':
      log.info(`service ${name} stopped`);
      break;
    case 'timeout':
      log.warn(`service ${name} stop timed out`, { timeoutMs });
      void stopPromise.then((late) => {
        if (late.kind === 'error') {
          log.error(`failed to stop ${name}`, { message: errorMessage(late.error) });
        }
      });
      break;
    case 'error':
      log.error(`failed to stop ${name}`, { message: errorMessage(result.error) });
      break;
  }
  return result;
}
