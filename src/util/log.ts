export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  enabled: boolean;
  // Defaults to console.error so nothing but matched paths reaches stdout.
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    debug: (message) => {
      if (options.enabled) write(`[debug] ${message}`);
    },
    info: (message) => {
      if (options.enabled) write(message);
    },
    warn: (message) => write(`Warning: ${message}`),
    error: (message) => write(`Error: ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
