/**
 * Scoped console logger.
 *
 * Every line is prefixed with `[scope]`, the same shape the rest of the
 * process logs with (`[bootstrap]`, `[content]`). Components take a
 * `PluginLogger` so tests can record output instead of printing it.
 */
export interface PluginLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createConsoleLogger(scope: string): PluginLogger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
        return;
      }
      console.error(`${prefix} ${message}`, error);
    },
  };
}
