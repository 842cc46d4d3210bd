export type ErrorCode =
  | 'BOOTSTRAP_FAILED'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'BACKEND_UNREACHABLE'
  | 'BACKEND_BAD_STATUS'
  | 'EMPTY_COMPLETION'
  | 'CONTEXT_NOT_FOUND'
  | 'CONTEXT_TOO_LARGE'
  | 'UNKNOWN_OPERATION'
  | 'UNKNOWN_TASK_TYPE'
  | 'EMPTY_INPUT'
  | 'INVALID_ARGUMENT'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function toErrorWithCode(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(fallbackCode, error.message, error);
  return new AppError(fallbackCode, String(error));
}

export function isAppError(error: unknown, code?: ErrorCode): error is AppError {
  return error instanceof AppError && (code === undefined || error.code === code);
}
