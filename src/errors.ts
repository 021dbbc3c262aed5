export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class IoError extends Error {
  readonly path: string;
  readonly code: string;

  constructor(path: string, code: string, message: string) {
    super(message);
    this.name = 'IoError';
    this.path = path;
    this.code = code;
  }

  static from(path: string, error: unknown): IoError {
    if (isErrnoException(error)) {
      return new IoError(path, error.code, error.message);
    }
    if (error instanceof Error) {
      return new IoError(path, 'EUNKNOWN', error.message);
    }
    return new IoError(path, 'EUNKNOWN', `${path}: ${String(error)}`);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
