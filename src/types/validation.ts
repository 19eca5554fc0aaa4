/**
 * Validation result types
 *
 * @module types/validation
 */

/**
 * Kinds of structural defect the validator reports.
 * `FormatMismatch` is only produced when time-format checking is enabled.
 */
export type ViolationKind =
  | 'TypeMismatch'
  | 'MissingField'
  | 'ArityMismatch'
  | 'UnexpectedField'
  | 'ReferentialIntegrityError'
  | 'FormatMismatch';

export const VIOLATION_KINDS: readonly ViolationKind[] = [
  'TypeMismatch',
  'MissingField',
  'ArityMismatch',
  'UnexpectedField',
  'ReferentialIntegrityError',
  'FormatMismatch',
];

export interface Violation {
  /** Location from the document root, e.g. `timetable[2].p1.subject`; `""` is the root */
  path: string;
  kind: ViolationKind;
  message: string;
}

export type ValidationResult =
  | { valid: true; violations: readonly [] }
  | { valid: false; violations: readonly Violation[] };

export interface ValidatorOptions {
  /** Report `Period.subject` values that name no entry of `subjects` (default: true) */
  checkReferences?: boolean;
  /** Require `start`/`end` of period times to be 24-hour HHMM literals (default: false) */
  checkTimeFormat?: boolean;
}
