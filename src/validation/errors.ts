import { ZodError, ZodIssue } from 'zod';
import { ValidationError } from '../errors/validation-error';
import { ErrorContext } from '../errors/types';

export interface SchemaErrorOptions {
  readonly issues?: readonly ZodIssue[];
  readonly cause?: unknown;
  readonly context?: ErrorContext;
}

/**
 * A value failed a zod schema; `issues` keeps the raw zod detail.
 */
export class SchemaError extends ValidationError {
  public readonly issues: readonly ZodIssue[];

  constructor(message: string, options: SchemaErrorOptions = {}) {
    super(message, {
      code: 'VALIDATION_SCHEMA_MISMATCH',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'SchemaError';
    this.issues = options.issues ?? [];
  }
}

function formatField(issue: ZodIssue): string {
  if (!issue.path || issue.path.length === 0) {
    return 'value';
  }
  return issue.path
    .map((segment, index) =>
      typeof segment === 'number' ? `[${segment}]` : index === 0 ? segment : `.${segment}`
    )
    .join('');
}

export function formatZodIssue(issue: ZodIssue): string {
  const field = formatField(issue);
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return `"${field}" is required`;
      }
      return `"${field}" must be of type ${issue.expected}`;
    case 'unrecognized_keys':
      return `Unrecognized key${issue.keys.length === 1 ? '' : 's'}: ${issue.keys.join(', ')}`;
    case 'too_small': {
      const comparator = issue.inclusive ? 'at least' : 'greater than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.minimum} characters`;
      }
      return `${field} must be ${comparator} ${issue.minimum}`;
    }
    case 'too_big': {
      const comparator = issue.inclusive ? 'at most' : 'less than';
      if (issue.type === 'string') {
        return `${field} must be ${comparator} ${issue.maximum} characters`;
      }
      return `${field} must be ${comparator} ${issue.maximum}`;
    }
    default:
      return issue.message || `Invalid ${field}`;
  }
}

export function normalizeValidationError(
  error: unknown,
  fallbackMessage = 'Input validation failed'
): ValidationError {
  if (error instanceof ValidationError) {
    return error;
  }

  if (error instanceof ZodError) {
    const formattedIssues = error.issues.map((issue) => formatZodIssue(issue));
    const message = formattedIssues.length === 0 ? fallbackMessage : formattedIssues.join('; ');
    return new SchemaError(message, {
      issues: error.issues,
      cause: error,
      context: { data: { messages: formattedIssues } },
    });
  }

  if (error instanceof Error) {
    return new ValidationError(error.message, { cause: error });
  }

  return new ValidationError(fallbackMessage, { cause: error });
}
