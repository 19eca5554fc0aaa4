/**
 * Timetable Contract
 *
 * Structural validation of school timetable documents, plus loading,
 * model building and reporting on top of it.
 *
 * @module index
 */

export { validate, TimetableValidator, ROOT_PATH, appendPath } from './validation/timetable-validator';
export type { ValidationResult, Violation, ViolationKind, ValidatorOptions } from './types/validation';
export { VIOLATION_KINDS } from './types/validation';

export { TIMETABLE_SCHEMA, TIME_OF_DAY_PATTERN } from './schemas/timetable-schema';
export type { JSONSchema } from './types/schemas';
export { compileSchema, assertWellFormedSchema } from './validation/rule-compiler';

export {
  parseTimetableDocument,
  formatForPath,
  DEFAULT_MAX_CONTENT_SIZE,
} from './validation/common';
export type { DocumentFormat, ParseDocumentOptions } from './validation/common';
export { formatViolations, summarizeResult, ROOT_LABEL } from './validation/report';
export type { ValidationSummary } from './validation/report';

export { buildTimetable, toTimetableDocument, serializeTimetable } from './model/timetable-model';
export type { BuildTimetableOptions } from './model/timetable-model';
export { SCHOOL_DAY_COUNT, SCHOOL_DAY_LABELS } from './types/timetable';
export type {
  Period,
  PeriodDocument,
  PeriodTime,
  PeriodTimeDocument,
  SchoolDayLabel,
  Subject,
  SubjectDocument,
  Timetable,
  TimetableDay,
  TimetableDayDocument,
  TimetableDocument,
} from './types/timetable';

export { TimetableLoader } from './loaders/timetable-loader';
export type { LoadedDocument, TimetableLoaderOptions } from './loaders/timetable-loader';

export { loadConfig, resolveConfig, getDefaultConfig, mergeConfig, CONFIG_PATHS } from './config';
export type { LoadedConfig, TimetableConfig, TimetableConfigInput } from './config';

export { TimetableError } from './errors/timetable-error';
export { ValidationError } from './errors/validation-error';
export { IOError } from './errors/io-error';
export { ConfigError } from './errors/config-error';
export { ErrorHandler } from './errors/handler';
export { ErrorLogger } from './errors/logger';
export { normalizeError } from './errors/utils';
export type { LogSink } from './errors/logger';
export type { ErrorCategory, ErrorCode, ErrorContext, ErrorSeverity } from './errors/types';
export {
  TimetableLoaderError,
  PathTraversalError,
  TimetableParseError,
  TimetableValidationError,
  SchemaDefinitionError,
} from './types/errors';
export { SchemaError } from './validation/errors';
