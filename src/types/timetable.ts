/**
 * Timetable Type Definitions
 *
 * Two views of the same data: the document layout as stored on disk
 * (`TimetableDocument`) and the resolved, read-only model built from a
 * valid document (`Timetable`).
 *
 * @module types/timetable
 */

/** Number of school days in every timetable, Monday to Friday */
export const SCHOOL_DAY_COUNT = 5;

export const SCHOOL_DAY_LABELS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'] as const;

export type SchoolDayLabel = (typeof SCHOOL_DAY_LABELS)[number];

/**
 * One scheduled slot as stored in a day object
 */
export interface PeriodDocument {
  /** Subject identifier, a key of `subjects` */
  subject: string;
  room: string;
}

export interface SubjectDocument {
  name: string;
  teacher: string;
}

export interface PeriodTimeDocument {
  /** Display name, e.g. "Period 1" */
  name: string;
  /** 24-hour HHMM, e.g. "0800" */
  start: string;
  end: string;
}

/** Period id -> period for one school day */
export type TimetableDayDocument = Record<string, PeriodDocument>;

/**
 * On-disk timetable layout
 */
export interface TimetableDocument {
  name: string;
  timetable: TimetableDayDocument[];
  subjects: Record<string, SubjectDocument>;
  period_times: Record<string, PeriodTimeDocument>;
}

export interface Subject {
  readonly id: string;
  readonly name: string;
  readonly teacher: string;
}

export interface Period {
  readonly subject: Subject;
  readonly room: string;
}

export interface PeriodTime {
  readonly id: string;
  readonly name: string;
  readonly start: string;
  readonly end: string;
}

export interface TimetableDay {
  readonly index: number;
  readonly label: SchoolDayLabel;
  /** Insertion-ordered as in the source document */
  readonly periods: ReadonlyMap<string, Period>;
}

/**
 * Resolved timetable with subject references replaced by subjects
 */
export interface Timetable {
  readonly name: string;
  /** Source file, or null when built from an in-memory document */
  readonly filename: string | null;
  readonly days: readonly TimetableDay[];
  readonly subjects: ReadonlyMap<string, Subject>;
  readonly periodTimes: ReadonlyMap<string, PeriodTime>;
}
