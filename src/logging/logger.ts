/**
 * Logging
 *
 * Components take a `Logger` instead of writing to the console directly. The
 * console logger writes to stderr so stdout stays reserved for plan output.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (category: string, message: string, data?: unknown) => void;
  info: (category: string, message: string, data?: unknown) => void;
  warn: (category: string, message: string, data?: unknown) => void;
  error: (category: string, message: string, data?: unknown) => void;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.name}: ${data.message}`;
  return ` ${JSON.stringify(data)}`;
}

export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write =
    (messageLevel: LogLevel) =>
    (category: string, message: string, data?: unknown): void => {
      if (LOG_LEVELS.indexOf(messageLevel) < threshold) return;
      console.error(
        `${new Date().toISOString()} - ${category} - ${messageLevel.toUpperCase()} - ${message}${formatData(data)}`
      );
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
