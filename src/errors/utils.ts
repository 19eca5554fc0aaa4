import { TimetableError } from './timetable-error';
import { ErrorCategory, ErrorCode, ErrorContext, ErrorSeverity } from './types';

interface NormalizeOptions {
  message?: string;
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: ErrorContext;
  code?: ErrorCode;
  retryable?: boolean;
}

/**
 * Normalize arbitrary values into TimetableError instances.
 */
export function normalizeError(error: unknown, options: NormalizeOptions = {}): TimetableError {
  const { message, category, severity, context, code, retryable } = options;

  if (error instanceof TimetableError) {
    if (context) {
      error.context = {
        ...error.context,
        ...context,
      };
    }
    return error;
  }

  if (error instanceof Error) {
    return new TimetableError({
      message: message ?? error.message,
      code: code ?? 'INTERNAL_UNEXPECTED',
      category: category ?? 'internal',
      severity,
      context: {
        ...context,
        cause: error.stack ?? error.message,
      },
      cause: error,
      retryable,
    });
  }

  return new TimetableError({
    message: message ?? 'Unknown error',
    code: code ?? 'UNKNOWN',
    category: category ?? 'unknown',
    severity,
    context,
    cause: error,
    retryable,
  });
}
