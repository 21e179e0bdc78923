export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  readonly verbose?: boolean;
  /**
   * Receives every formatted line. Defaults to the console; swapped for the
   * progress display while bars are on screen.
   */
  readonly write?: (line: string, level: LogLevel) => void;
}

const writeToConsole = (line: string, level: LogLevel): void => {
  if (level === 'error' || level === 'warn') {
    console.error(line);
    return;
  }
  console.log(line);
};

export const createLogger = ({ verbose = false, write = writeToConsole }: LoggerOptions = {}): Logger => {
  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !verbose) {
      return;
    }
    write(`[${level.toUpperCase()}] ${message}`, level);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
