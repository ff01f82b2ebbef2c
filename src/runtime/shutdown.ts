import { createLogger } from '@/shared/logging/logger';
import type { Runtime } from '@/runtime/bootstrap';

const FORCE_EXIT_AFTER_MS = 8000;

export function registerShutdownHandlers(runtime: Runtime, log = createLogger('Server')): void {
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutting down', { signal });

    // force exit when a service never lets go
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      process.exit(1);
    }, FORCE_EXIT_AFTER_MS);

    await runtime.stop();

    clearTimeout(forceExit);
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    void shutdown(signal);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
