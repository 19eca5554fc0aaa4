import { describe, expect, test } from '@jest/globals';
import { z } from 'zod';
import { TimetableError } from '../../src/errors/timetable-error';
import { normalizeError } from '../../src/errors/utils';

describe('error utils', () => {
  test('normalizeError merges context on TimetableError', () => {
    const existing = new TimetableError({
      message: 'existing',
      code: 'SYSTEM_INTERNAL_FAILURE',
      category: 'system',
      context: { module: 'existing' },
    });

    const normalized = normalizeError(existing, { context: { operation: 'test-op' } });

    expect(normalized).toBe(existing);
    expect(normalized.context?.module).toBe('existing');
    expect(normalized.context?.operation).toBe('test-op');
  });

  test('normalizeError wraps standard Error with defaults', () => {
    const err = new Error('boom');
    const normalized = normalizeError(err, { context: { module: 'tests' } });

    expect(normalized.message).toBe('boom');
    expect(normalized.code).toBe('INTERNAL_UNEXPECTED');
    expect(normalized.category).toBe('internal');
    expect(normalized.context?.module).toBe('tests');
    expect(normalized.context?.cause).toBe(err.stack);
    expect(normalized.cause).toBe(err);
  });

  test('normalizeError applies overrides to standard errors', () => {
    const err = new Error('boom');
    err.stack = undefined;
    const normalized = normalizeError(err, {
      message: 'override',
      category: 'io',
      code: 'IO_NOT_FOUND',
      severity: 'warning',
      retryable: true,
    });

    expect(normalized.message).toBe('override');
    expect(normalized.code).toBe('IO_NOT_FOUND');
    expect(normalized.severity).toBe('warning');
    expect(normalized.context?.cause).toBe('boom');
    expect(normalized.retryable).toBe(true);
  });

  test('normalizeError keeps a ZodError as the cause', () => {
    const result = z.object({ name: z.string().min(2) }).safeParse({ name: '' });
    expect(result.success).toBe(false);
    const zodError = result.success ? undefined : result.error;

    const normalized = normalizeError(zodError, { message: 'fallback' });
    expect(normalized.message).toBe('fallback');
    expect(normalized.code).toBe('INTERNAL_UNEXPECTED');
    expect(normalized.cause).toBe(zodError);
  });

  test('normalizeError handles unknown values', () => {
    const normalized = normalizeError({ room: '101' }, { message: 'unknown fallback' });
    expect(normalized.message).toBe('unknown fallback');
    expect(normalized.code).toBe('UNKNOWN');
    expect(normalized.category).toBe('unknown');
  });

  test('normalizeError applies default message and retryable fallback', () => {
    const normalized = normalizeError('string failure');
    expect(normalized.message).toBe('Unknown error');
    expect(normalized.retryable).toBe(false);
    expect(normalized.toJSON().cause).toBe('string failure');
  });
});
