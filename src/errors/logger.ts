import { randomUUID } from 'crypto';
import { TimetableError } from './timetable-error';
import { ErrorContext } from './types';

export interface LogSink {
  warn(message: string): void;
  error(message: string): void;
}

const DEFAULT_SINK: LogSink = console;

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function generateCorrelationId(): string {
  try {
    return randomUUID();
  } catch {
    const rand = Math.random().toString(36).slice(2, 10);
    return `cid-${Date.now().toString(36)}-${rand}`;
  }
}

/** The timetable file an error concerns, when the caller recorded one */
function sourceOf(context: ErrorContext): string | undefined {
  const source = context.data?.source;
  return typeof source === 'string' ? source : undefined;
}

/**
 * Writes one JSON line per error, warnings to `warn` and the rest to `error`.
 */
export class ErrorLogger {
  constructor(private readonly sink: LogSink = DEFAULT_SINK) {}

  ensureCorrelationId(context?: ErrorContext): string {
    if (context?.correlationId && typeof context.correlationId === 'string') {
      return context.correlationId;
    }
    return generateCorrelationId();
  }

  /**
   * @returns the correlation id, also recorded on `error.context`
   */
  logError(error: TimetableError, contextOverride?: ErrorContext): string {
    const correlationId = this.ensureCorrelationId(contextOverride ?? error.context);
    const context: ErrorContext = {
      ...error.context,
      ...contextOverride,
      correlationId,
    };
    error.context = context;

    const level = error.severity === 'warning' ? 'warn' : 'error';
    const timestamp = new Date().toISOString();
    const source = sourceOf(context);
    const line = safeStringify({
      level,
      timestamp,
      correlationId,
      code: error.code,
      category: error.category,
      source,
      message: error.message,
      context,
    });

    const write = level === 'warn' ? this.sink.warn.bind(this.sink) : this.sink.error.bind(this.sink);
    write(
      line ??
        `[${timestamp}] [${level.toUpperCase()}] [${error.code}] ${source ? `${source}: ` : ''}${error.message} (correlationId=${correlationId})`
    );
    return correlationId;
  }
}
