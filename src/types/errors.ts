import { TimetableError } from '../errors/timetable-error';
import { ErrorCategory, ErrorCode, ErrorContext } from '../errors/types';
import type { Violation } from './validation';

/**
 * Errors raised while loading timetable documents from disk or text.
 */
export class TimetableLoaderError extends TimetableError {
  constructor(
    message: string,
    context: ErrorContext = {},
    code: ErrorCode = 'SYSTEM_INTERNAL_FAILURE',
    category: ErrorCategory = 'system',
    cause?: unknown
  ) {
    super({
      message,
      code,
      category,
      context,
      cause,
    });
    this.name = 'TimetableLoaderError';
  }
}

export class PathTraversalError extends TimetableLoaderError {
  constructor(attemptedPath: string, context: ErrorContext = {}) {
    super(
      `Path traversal attempt detected: ${attemptedPath}`,
      {
        ...context,
        attemptedPath,
      },
      'IO_PERMISSION_DENIED',
      'io'
    );
    this.name = 'PathTraversalError';
  }
}

/**
 * The document text could not be turned into a generic value tree.
 * Validation never starts for such input.
 */
export class TimetableParseError extends TimetableLoaderError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(
      `Failed to parse timetable document: ${message}`,
      context,
      'VALIDATION_PARSE_FAILURE',
      'validation',
      cause
    );
    this.name = 'TimetableParseError';
  }
}

export class TimetableValidationError extends TimetableLoaderError {
  public readonly violations: readonly Violation[];

  constructor(source: string, violations: readonly Violation[], context: ErrorContext = {}) {
    const noun = violations.length === 1 ? 'violation' : 'violations';
    super(
      `Timetable ${source} failed validation with ${violations.length} ${noun}`,
      {
        ...context,
        source,
        violations,
      },
      'VALIDATION_SCHEMA_MISMATCH',
      'validation'
    );
    this.name = 'TimetableValidationError';
    this.violations = violations;
  }
}

export class SchemaDefinitionError extends TimetableLoaderError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(
      `Invalid schema definition: ${message}`,
      context,
      'VALIDATION_SCHEMA_DEFINITION',
      'validation',
      cause
    );
    this.name = 'SchemaDefinitionError';
  }
}
