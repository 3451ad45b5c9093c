/** Stable failure codes carried by every error this service raises on purpose. */
export type BacklogErrorCode = 'storage_error' | 'invalid_argument' | 'config_error';

export class BacklogError extends Error {
  readonly code: BacklogErrorCode;

  constructor(code: BacklogErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A store transaction could not commit, the file lock timed out, or the bucket is missing. */
export class StorageError extends BacklogError {
  constructor(message: string, options?: ErrorOptions) {
    super('storage_error', message, options);
  }
}

export class InvalidArgumentError extends BacklogError {
  constructor(message: string, options?: ErrorOptions) {
    super('invalid_argument', message, options);
  }
}

export class ConfigError extends BacklogError {
  constructor(message: string, options?: ErrorOptions) {
    super('config_error', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
