/**
 * Text rendering at the tool boundary. Callers only ever receive text; the
 * leading symbol tells success, warning and failure apart.
 */
import { type AppError, type ErrorCode, toErrorWithCode } from '../../shared/errors/app-error';

export const SYMBOL_OK = '✅';
export const SYMBOL_WARN = '⚠️';
export const SYMBOL_FAIL = '❌';

const WARNING_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(['RATE_LIMITED', 'CONTEXT_TOO_LARGE']);

export function symbolFor(error: AppError): string {
  return WARNING_CODES.has(error.code) ? SYMBOL_WARN : SYMBOL_FAIL;
}

/** One-line description of an error, without the leading symbol. */
export function describeError(error: AppError, backendLabel: string): string {
  switch (error.code) {
    case 'BACKEND_UNREACHABLE':
      return `Cannot reach LM Studio at ${backendLabel}: ${error.message}. Make sure LM Studio is running and the server is started.`;
    case 'BACKEND_BAD_STATUS':
      return `LM Studio at ${backendLabel} failed: ${error.message}`;
    case 'EMPTY_COMPLETION':
      return `No completion from LM Studio at ${backendLabel}: ${error.message}`;
    default:
      return error.message;
  }
}

export function renderToolError(error: unknown, backendLabel: string): string {
  const appError = toErrorWithCode(error, 'INTERNAL_ERROR');
  return `${symbolFor(appError)} ${describeError(appError, backendLabel)}`;
}
