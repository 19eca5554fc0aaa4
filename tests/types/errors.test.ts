import { describe, expect, test } from '@jest/globals';
import {
  PathTraversalError,
  SchemaDefinitionError,
  TimetableLoaderError,
  TimetableParseError,
  TimetableValidationError,
} from '../../src/types/errors';

describe('types/errors', () => {
  test('TimetableLoaderError preserves message and context', () => {
    const error = new TimetableLoaderError('Base failure', { file: 'week.json' }, 'CONFIG_INVALID', 'config');
    expect(error.message).toBe('Base failure');
    expect(error.name).toBe('TimetableLoaderError');
    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.category).toBe('config');
    expect(error.context?.file).toBe('week.json');
  });

  test('TimetableLoaderError defaults to system failure metadata', () => {
    const error = new TimetableLoaderError('Defaulted');
    expect(error.code).toBe('SYSTEM_INTERNAL_FAILURE');
    expect(error.category).toBe('system');
  });

  test('PathTraversalError sets IO-specific metadata', () => {
    const error = new PathTraversalError('../etc/passwd');
    expect(error.name).toBe('PathTraversalError');
    expect(error.code).toBe('IO_PERMISSION_DENIED');
    expect(error.category).toBe('io');
    expect(error.context?.attemptedPath).toBe('../etc/passwd');
    expect(error.message).toBe('Path traversal attempt detected: ../etc/passwd');
  });

  test('TimetableParseError prefixes the message and keeps the cause', () => {
    const cause = new Error('Unexpected end of JSON input');
    const error = new TimetableParseError(cause.message, { source: 'week.json' }, cause);
    expect(error.message).toBe('Failed to parse timetable document: Unexpected end of JSON input');
    expect(error.code).toBe('VALIDATION_PARSE_FAILURE');
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(TimetableLoaderError);
  });

  test('TimetableValidationError stores the violations', () => {
    const violations = [
      { path: 'name', kind: 'MissingField' as const, message: 'Missing required field "name"' },
      { path: 'subjects', kind: 'MissingField' as const, message: 'Missing required field "subjects"' },
    ];
    const error = new TimetableValidationError('week.json', violations);
    expect(error.message).toBe('Timetable week.json failed validation with 2 violations');
    expect(error.violations).toBe(violations);
    expect(error.context?.violations).toBe(violations);
    expect(error.context?.source).toBe('week.json');
    expect(error.code).toBe('VALIDATION_SCHEMA_MISMATCH');
    expect(error.category).toBe('validation');
  });

  test('SchemaDefinitionError uses the schema-definition code', () => {
    const error = new SchemaDefinitionError('keyword "minLength" is not supported for string at #');
    expect(error.message).toBe('Invalid schema definition: keyword "minLength" is not supported for string at #');
    expect(error.code).toBe('VALIDATION_SCHEMA_DEFINITION');
  });
});
