import type { CacheDomain } from '../../shared/types';

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    if (typeof error.message === 'string') {
      return error.message;
    }
  }
  return String(error);
}

export class StoreQueryError extends Error {
  readonly table: string;

  constructor(table: string, message: string, options?: ErrorOptions) {
    super(`Query on '${table}' failed: ${message}`, options);
    this.name = 'StoreQueryError';
    this.table = table;
  }
}

export class StoreTimeoutError extends StoreQueryError {
  readonly timeoutMs: number;

  constructor(table: string, timeoutMs: number, options?: ErrorOptions) {
    super(table, `timed out after ${timeoutMs}ms`, options);
    this.name = 'StoreTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised when an observation cannot be written. The underlying store failure is
 * kept on `cause`.
 */
export class StorageWriteFailedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageWriteFailedError';
  }
}

export class LocalizationLoadError extends Error {
  readonly domain: CacheDomain;

  constructor(domain: CacheDomain, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LocalizationLoadError';
    this.domain = domain;
  }
}

export class LocalizationNotLoadedError extends Error {
  readonly domain: CacheDomain;

  constructor(domain: CacheDomain) {
    super(`Localization domain '${domain}' has not been loaded.`);
    this.name = 'LocalizationNotLoadedError';
    this.domain = domain;
  }
}

export class RequestValidationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
