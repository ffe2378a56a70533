import type { RunReport, StopReason } from './types';

export class FetchError extends Error {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = options.statusCode;
  }
}

/** A single field could not be read from the markup; the field is left absent. */
export class ParseError extends Error {
  readonly field: string;

  constructor(field: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ParseError';
    this.field = field;
  }
}

const FATAL_FS_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'EROFS']);

export class PersistError extends Error {
  readonly path: string;
  /** Directory-level failures stop the crawl; anything else only loses one article. */
  readonly fatal: boolean;

  constructor(path: string, message: string, options: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PersistError';
    this.path = path;
    this.fatal = options.fatal ?? false;
  }

  static fromFsError(path: string, error: unknown): PersistError {
    const code = readErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    return new PersistError(path, `Failed to write ${path}: ${message}`, {
      fatal: code !== undefined && FATAL_FS_CODES.has(code),
      cause: error
    });
  }
}

/** A resource-level failure that ends the whole run; carries the counters gathered so far. */
export class CrawlRunError extends Error {
  readonly stopReason: StopReason;
  readonly report?: RunReport;

  constructor(message: string, stopReason: StopReason, options: { cause?: unknown; report?: RunReport } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CrawlRunError';
    this.stopReason = stopReason;
    this.report = options.report;
  }
}

export function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
