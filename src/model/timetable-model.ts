/**
 * Timetable Model
 *
 * Builds the resolved, read-only timetable from a document and writes a
 * model back to the on-disk layout.
 *
 * @module model/timetable-model
 */

import { TimetableValidationError } from '../types/errors';
import {
  Period,
  PeriodDocument,
  PeriodTime,
  PeriodTimeDocument,
  SCHOOL_DAY_LABELS,
  Subject,
  SubjectDocument,
  Timetable,
  TimetableDay,
  TimetableDocument,
} from '../types/timetable';
import { ValidationResult, Violation } from '../types/validation';
import { appendPath, TimetableValidator } from '../validation/timetable-validator';

export interface BuildTimetableOptions {
  /** Source file recorded on the model */
  filename?: string | null;
  /** Validator to run first; referential integrity is enforced regardless */
  validator?: TimetableValidator;
}

const referenceValidator = new TimetableValidator({ checkReferences: true });

// Narrowing holds only as far as the validator checks every value the
// model reads; a gap there surfaces as a crash in buildTimetable.
function conforms(_document: unknown, result: ValidationResult): _document is TimetableDocument {
  return result.valid;
}

function resolveSubjects(document: TimetableDocument): Map<string, Subject> {
  const subjects = new Map<string, Subject>();
  for (const [id, subject] of Object.entries(document.subjects)) {
    subjects.set(id, Object.freeze({ id, name: subject.name, teacher: subject.teacher }));
  }
  return subjects;
}

function resolvePeriodTimes(document: TimetableDocument): Map<string, PeriodTime> {
  const periodTimes = new Map<string, PeriodTime>();
  for (const [id, periodTime] of Object.entries(document.period_times)) {
    periodTimes.set(
      id,
      Object.freeze({ id, name: periodTime.name, start: periodTime.start, end: periodTime.end })
    );
  }
  return periodTimes;
}

/**
 * Validate a document and resolve it into a timetable model.
 *
 * @throws TimetableValidationError when the document is invalid or a period
 * names an unknown subject
 */
export function buildTimetable(document: unknown, options: BuildTimetableOptions = {}): Timetable {
  const filename = options.filename ?? null;
  const source = filename ?? 'document';
  const result = (options.validator ?? referenceValidator).validate(document);
  if (!conforms(document, result)) {
    throw new TimetableValidationError(source, result.violations);
  }

  const subjects = resolveSubjects(document);
  const unresolved: Violation[] = [];

  const days = document.timetable.map((day, index): TimetableDay => {
    const periods = new Map<string, Period>();
    for (const [periodId, period] of Object.entries(day)) {
      const subject = subjects.get(period.subject);
      if (!subject) {
        unresolved.push({
          path: appendPath(appendPath(appendPath('timetable', index), periodId), 'subject'),
          kind: 'ReferentialIntegrityError',
          message: `Subject "${period.subject}" is not defined in subjects`,
        });
        continue;
      }
      periods.set(periodId, Object.freeze({ subject, room: period.room }));
    }
    return Object.freeze({ index, label: SCHOOL_DAY_LABELS[index], periods });
  });

  if (unresolved.length > 0) {
    throw new TimetableValidationError(source, unresolved);
  }

  return Object.freeze({
    name: document.name,
    filename,
    days: Object.freeze(days),
    subjects,
    periodTimes: resolvePeriodTimes(document),
  });
}

/**
 * Convert a model back to the on-disk document layout
 */
export function toTimetableDocument(timetable: Timetable): TimetableDocument {
  return {
    name: timetable.name,
    timetable: timetable.days.map((day) =>
      Object.fromEntries(
        Array.from(day.periods, ([periodId, period]): [string, PeriodDocument] => [
          periodId,
          { subject: period.subject.id, room: period.room },
        ])
      )
    ),
    subjects: Object.fromEntries(
      Array.from(timetable.subjects, ([id, subject]): [string, SubjectDocument] => [
        id,
        { name: subject.name, teacher: subject.teacher },
      ])
    ),
    period_times: Object.fromEntries(
      Array.from(timetable.periodTimes, ([id, periodTime]): [string, PeriodTimeDocument] => [
        id,
        { name: periodTime.name, start: periodTime.start, end: periodTime.end },
      ])
    ),
  };
}

/**
 * Serialize a model as the JSON file layout, indented by four spaces
 */
export function serializeTimetable(timetable: Timetable): string {
  return JSON.stringify(toTimetableDocument(timetable), null, 4);
}
