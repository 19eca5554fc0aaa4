import { TimetableError } from './timetable-error';
import { ErrorContext, ErrorSeverity, ErrorCode } from './types';

export interface ValidationErrorOptions {
  code?: Extract<
    ErrorCode,
    | 'VALIDATION_INVALID_INPUT'
    | 'VALIDATION_SCHEMA_MISMATCH'
    | 'VALIDATION_PARSE_FAILURE'
    | 'VALIDATION_SCHEMA_DEFINITION'
  >;
  context?: ErrorContext;
  severity?: ErrorSeverity;
  cause?: unknown;
}

export class ValidationError extends TimetableError {
  constructor(message: string, options: ValidationErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'VALIDATION_INVALID_INPUT',
      category: 'validation',
      severity: options.severity ?? 'error',
      context: options.context,
      cause: options.cause,
    });
  }
}
