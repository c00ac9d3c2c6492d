/**
 * CLI console routing
 *
 * Library modules log with tagged console.log/console.warn calls
 * ("[Parity] ...", "[Batch] ..."). Commands that write data to stdout move
 * those messages to stderr, or drop them in quiet/json mode.
 */

const LIBRARY_TAGS = ['[Parity]', '[Batch]'];

export type Logger = (...args: unknown[]) => void;

function isLibraryMessage(args: unknown[]): boolean {
  const first = args[0];
  return typeof first === 'string' && LIBRARY_TAGS.some(tag => first.startsWith(tag));
}

/**
 * Progress logger for a command: stderr, or a no-op when silenced
 */
export function createLogger(silent: boolean | undefined): Logger {
  return silent ? () => {} : console.error.bind(console);
}

/**
 * Redirect library log lines until the returned function is called
 */
export function routeLibraryLogs(silent: boolean | undefined): () => void {
  const originalLog = console.log;
  const originalWarn = console.warn;

  const route = (fallback: Logger): Logger => (...args: unknown[]) => {
    if (isLibraryMessage(args)) {
      if (!silent) {
        console.error(...args);
      }
      return;
    }
    fallback(...args);
  };

  console.log = route(originalLog.bind(console));
  console.warn = route(originalWarn.bind(console));

  return () => {
    console.log = originalLog;
    console.warn = originalWarn;
  };
}

/**
 * Print an error and flag the process as failed
 */
export function reportError(error: unknown, json?: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (json) {
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
  } else {
    console.error('Error:', message);
  }
  process.exitCode = 1;
}
