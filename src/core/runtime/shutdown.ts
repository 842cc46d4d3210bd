import { withTimeout } from '../../shared/async/resilience';
import { logger } from '../../shared/logging/logger';

type ShutdownSignal = NodeJS.Signals | 'STDIN_CLOSED' | 'UNHANDLED_REJECTION' | 'UNCAUGHT_EXCEPTION';

/** Anything that holds the process open and can be closed, such as the MCP server. */
export interface Closable {
  close(): Promise<void>;
}

interface ShutdownOptions {
  server: Closable;
  /** Upper bound on how long closing may take. */
  closeTimeoutMs?: number;
}

const DEFAULT_CLOSE_TIMEOUT_MS = 5000;

/**
 * Build an idempotent shutdown routine: the first call closes the server,
 * later calls share its outcome. Close failures are logged, never thrown.
 */
export function createShutdown({
  server,
  closeTimeoutMs = DEFAULT_CLOSE_TIMEOUT_MS,
}: ShutdownOptions): (signal: ShutdownSignal) => Promise<void> {
  let shutdownInFlight: Promise<void> | null = null;

  return (signal) => {
    if (shutdownInFlight) {
      return shutdownInFlight;
    }

    shutdownInFlight = (async () => {
      logger.info({ signal }, 'Shutdown initiated');

      try {
        await withTimeout(server.close(), closeTimeoutMs, 'MCP server close');
      } catch (error) {
        logger.warn({ error }, 'MCP server close failed during shutdown');
      }

      logger.info({ signal }, 'Shutdown complete');
    })();

    return shutdownInFlight;
  };
}

export function registerShutdownHooks(options: ShutdownOptions): void {
  const runShutdown = createShutdown(options);

  const shutdownAndExit = (signal: ShutdownSignal, exitCode: number) => {
    void runShutdown(signal)
      .catch((error) => {
        logger.error({ error, signal }, 'Fatal shutdown failure');
      })
      .finally(() => {
        process.exit(exitCode);
      });
  };

  process.once('SIGINT', () => shutdownAndExit('SIGINT', 0));
  process.once('SIGTERM', () => shutdownAndExit('SIGTERM', 0));
  // stdin ends when the MCP client disconnects.
  process.stdin.once('end', () => shutdownAndExit('STDIN_CLOSED', 0));

  process.on('unhandledRejection', (reason) => {
    logger.error({ error: reason }, 'Unhandled promise rejection');
    shutdownAndExit('UNHANDLED_REJECTION', 1);
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    shutdownAndExit('UNCAUGHT_EXCEPTION', 1);
  });
}
