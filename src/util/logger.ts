// CLI logging. Everything goes to stderr so stdout stays parseable JSON.

export type Logger = {
  info(message: string): void;
  error(message: string, error?: unknown): void;
};

function formatTimestamp(now: Date): string {
  const hrs = String(now.getHours()).padStart(2, '0');
  const mins = String(now.getMinutes()).padStart(2, '0');
  const secs = String(now.getSeconds()).padStart(2, '0');
  const ms = String(now.getMilliseconds()).padStart(3, '0');
  return `${hrs}:${mins}:${secs}.${ms}`;
}

/** `info` is silent unless verbose; `error` always writes. */
export function createLogger(verbose: boolean): Logger {
  return {
    info(message) {
      if (!verbose) return;
      // eslint-disable-next-line no-console
      console.error(`[${formatTimestamp(new Date())}] ${message}`);
    },
    error(message, error) {
      /* eslint-disable no-console */
      if (error === undefined) console.error(message);
      else console.error(`${message}:`, error);
      /* eslint-enable no-console */
    },
  };
}
