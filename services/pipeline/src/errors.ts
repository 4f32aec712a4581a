export class ConfigurationError extends Error {
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConfigurationError';
    this.path = options?.path;
  }
}

export type StorageErrorCode = 'not_found' | 'access_denied' | 'transport' | 'unreadable';

export class StorageError extends Error {
  public readonly code: StorageErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: StorageErrorCode, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'StorageError';
    this.code = code;
    this.details = details;
  }
}

export class DatasetSchemaError extends Error {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(`Dataset is missing required column(s): ${missingColumns.join(', ')}`);
    this.name = 'DatasetSchemaError';
    this.missingColumns = missingColumns;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
