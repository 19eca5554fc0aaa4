import { TimetableError } from './timetable-error';
import { ErrorCode, ErrorContext } from './types';

export type IOErrorCode = Extract<ErrorCode, 'IO_NOT_FOUND' | 'IO_PERMISSION_DENIED' | 'IO_SIZE_LIMIT'>;

export interface IOErrorOptions {
  code?: IOErrorCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * A timetable file or directory that could not be read.
 */
export class IOError extends TimetableError {
  constructor(message: string, options: IOErrorOptions = {}) {
    super({
      message,
      code: options.code ?? 'IO_NOT_FOUND',
      category: 'io',
      context: options.context,
      cause: options.cause,
    });
  }

  /**
   * @param kind - what was looked up, e.g. `File` or `Directory`
   */
  static notFound(kind: string, requestedPath: string, resolvedPath: string, cause?: unknown): IOError {
    return new IOError(`${kind} not found: ${requestedPath}`, {
      code: 'IO_NOT_FOUND',
      context: { requestedPath, resolvedPath },
      cause,
    });
  }

  static notRegularFile(requestedPath: string, resolvedPath: string): IOError {
    return new IOError(`Not a regular file: ${requestedPath}`, {
      code: 'IO_NOT_FOUND',
      context: { requestedPath, resolvedPath },
    });
  }

  static tooLarge(resolvedPath: string, fileSize: number, maxSize: number): IOError {
    return new IOError(`File too large: ${fileSize} bytes (max: ${maxSize})`, {
      code: 'IO_SIZE_LIMIT',
      context: { resolvedPath, fileSize, maxSize },
    });
  }
}
