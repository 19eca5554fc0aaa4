import path from 'path';
import * as YAML from 'yaml';
import { z } from 'zod';
import { TimetableParseError } from '../types/errors';
import { normalizeValidationError } from './errors';

export const DEFAULT_MAX_CONTENT_SIZE = 1024 * 1024; // 1MB

export type DocumentFormat = 'json' | 'yaml';

export interface ParseDocumentOptions {
  readonly format?: DocumentFormat;
  readonly maxSize?: number;
  /** Reported in error context, e.g. the file the text came from */
  readonly source?: string;
}

const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

export function formatForPath(filePath: string): DocumentFormat | undefined {
  return EXTENSION_FORMATS[path.extname(filePath).toLowerCase()];
}

function contentSchema(format: DocumentFormat, maxSize: number) {
  const label = format === 'json' ? 'JSON' : 'YAML';
  return z
    .string({
      required_error: `${label} content is required`,
      invalid_type_error: `${label} content must be a string`,
    })
    .refine((value) => value.trim().length > 0, `${label} content cannot be empty`)
    .refine((value) => Buffer.byteLength(value, 'utf8') <= maxSize, `${label} content exceeds maximum allowed size`)
    .refine((value) => !value.includes('\0'), 'Content cannot contain null bytes');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse timetable text into a generic value tree.
 *
 * YAML input also accepts JSON. In YAML, duplicate mapping keys are a parse
 * failure; JSON keeps the last occurrence.
 *
 * @throws TimetableParseError when the text is empty, too large, contains
 * NUL bytes or is not well-formed
 */
export function parseTimetableDocument(rawContent: string, options: ParseDocumentOptions = {}): unknown {
  const format = options.format ?? 'json';
  const context = options.source ? { source: options.source, format } : { format };

  const checked = contentSchema(format, options.maxSize ?? DEFAULT_MAX_CONTENT_SIZE).safeParse(rawContent);
  if (!checked.success) {
    throw new TimetableParseError(normalizeValidationError(checked.error).message, context, checked.error);
  }

  try {
    if (format === 'json') {
      return JSON.parse(checked.data);
    }
    return YAML.parse(checked.data, { uniqueKeys: true });
  } catch (error) {
    throw new TimetableParseError(errorMessage(error), context, error);
  }
}
