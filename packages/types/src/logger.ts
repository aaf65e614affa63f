/* eslint-disable no-console */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines. */
  verbose?: boolean;
  /** Where formatted lines go (stderr by default). */
  write?: (line: string) => void;
}

export function formatLogLine(level: LogLevel, message: string): string {
  return `[${level.toUpperCase()}] ${message}`;
}

/**
 * Logger writing `[LEVEL] message` lines, stderr by default so stdout stays
 * free for command output.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    debug: (message) => {
      if (verbose) write(formatLogLine('debug', message));
    },
    info: (message) => write(formatLogLine('info', message)),
    warn: (message) => write(formatLogLine('warn', message)),
    error: (message) => write(formatLogLine('error', message)),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

let activeLogger: Logger = createConsoleLogger();

export function getLogger(): Logger {
  return activeLogger;
}

/** Replace the process-wide logger. Returns the previous one. */
export function setLogger(logger: Logger): Logger {
  const previous = activeLogger;
  activeLogger = logger;
  return previous;
}
