import { TimetableError } from './timetable-error';
import { ErrorLogger } from './logger';
import { ErrorCategory, ErrorCode, ErrorContext, ErrorSeverity } from './types';
import { normalizeError } from './utils';

export interface WrapOptions {
  module?: string;
  category?: ErrorCategory;
  code?: ErrorCode;
  severity?: ErrorSeverity;
  userMessage?: string;
  fallbackMessage?: string;
}

export interface HandleOptions extends WrapOptions {
  logger?: ErrorLogger;
  rethrow?: boolean;
}

export interface PublicError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  correlationId?: string;
}

export class ErrorHandler {
  private static readonly defaultLogger = new ErrorLogger();

  static wrap(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: WrapOptions = {}
  ): TimetableError {
    const baseContext: ErrorContext = {
      ...context,
      operation,
    };

    if (options.module) {
      baseContext.module = options.module;
    }

    if (options.userMessage) {
      baseContext.userMessage = options.userMessage;
    }

    const normalized = normalizeError(error, {
      message: options.fallbackMessage,
      category: options.category,
      severity: options.severity,
      context: baseContext,
      code: options.code,
    });

    normalized.context = {
      ...normalized.context,
      ...baseContext,
    };

    if (options.fallbackMessage) {
      normalized.message = options.fallbackMessage;
    }

    return normalized;
  }

  static handle(
    error: unknown,
    operation: string,
    context: ErrorContext = {},
    options: HandleOptions = {}
  ): TimetableError {
    const logger = options.logger ?? this.defaultLogger;
    const wrapped = this.wrap(error, operation, context, options);
    const correlationId = logger.logError(wrapped, wrapped.context);
    wrapped.context = {
      ...wrapped.context,
      correlationId,
    };

    if (options.rethrow ?? true) {
      throw wrapped;
    }

    return wrapped;
  }

  static toPublicError(error: TimetableError): PublicError {
    const userMessage = error.context?.userMessage;
    const correlationId = error.context?.correlationId;
    return {
      code: error.code,
      category: error.category,
      message: typeof userMessage === 'string' ? userMessage : error.message,
      correlationId: typeof correlationId === 'string' ? correlationId : undefined,
    };
  }
}
