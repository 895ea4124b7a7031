/**
 * Request-terminal error kinds. Every one of them ends the request; nothing
 * is retried.
 */
export type AppErrorCode =
  | 'no_file'
  | 'empty_filename'
  | 'unsupported_type'
  | 'invalid_upload'
  | 'file_too_large'
  | 'unreadable_document'
  | 'document_too_short'
  | 'extraction_failed'
  | 'service_error';

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
  no_file: 400,
  empty_filename: 400,
  unsupported_type: 400,
  invalid_upload: 400,
  file_too_large: 413,
  unreadable_document: 400,
  document_too_short: 400,
  extraction_failed: 400,
  service_error: 400,
};

/**
 * Error carrying a code and the message returned to the caller verbatim.
 */
export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly statusCode: number;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message of anything error-shaped. Errors raised by Node internals can come
 * from another realm, where `instanceof Error` is false.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
