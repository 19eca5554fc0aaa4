/**
 * Timetable Document Schema
 *
 * Draft-07 JSON Schema describing a school timetable file: a name, five
 * school days of periods, a subject table and a period-time table.
 *
 * Every `required` list sits inside the sub-schema it constrains, so the
 * fields really are required. Period, subject and period-time objects reject
 * unknown fields; the top-level object and the id-keyed mappings do not.
 *
 * @version 1.0
 */

import { SCHOOL_DAY_COUNT } from '../types/timetable';
import { JSONSchema } from '../types/schemas';

/** Any string is accepted as a period, subject or period-time id */
export const ANY_KEY_PATTERN = '^.*$';

export const periodSchema = {
  type: 'object',
  description: 'One scheduled slot within a school day',
  properties: {
    subject: { type: 'string', description: 'Identifier of an entry in subjects' },
    room: { type: 'string' },
  },
  required: ['subject', 'room'],
  additionalProperties: false,
} as const satisfies JSONSchema;

export const timetableDaySchema = {
  type: 'object',
  description: 'Period id to period for one school day',
  patternProperties: {
    [ANY_KEY_PATTERN]: periodSchema,
  },
} as const satisfies JSONSchema;

export const subjectSchema = {
  type: 'object',
  description: 'A course of instruction with its teacher',
  properties: {
    name: { type: 'string' },
    teacher: { type: 'string' },
  },
  required: ['name', 'teacher'],
  additionalProperties: false,
} as const satisfies JSONSchema;

export const periodTimeSchema = {
  type: 'object',
  description: 'Named time-of-day window shared by the same period on every day',
  properties: {
    name: { type: 'string' },
    start: { type: 'string', description: '24-hour HHMM' },
    end: { type: 'string', description: '24-hour HHMM' },
  },
  required: ['name', 'start', 'end'],
  additionalProperties: false,
} as const satisfies JSONSchema;

/**
 * JSON Schema definition for validating timetable documents
 */
export const TIMETABLE_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'Timetable',
  type: 'object',
  properties: {
    name: { type: 'string', description: 'Display name of the timetable' },
    timetable: {
      type: 'array',
      description: 'One entry per school day, Monday to Friday',
      items: timetableDaySchema,
      minItems: SCHOOL_DAY_COUNT,
      maxItems: SCHOOL_DAY_COUNT,
    },
    subjects: {
      type: 'object',
      patternProperties: {
        [ANY_KEY_PATTERN]: subjectSchema,
      },
    },
    period_times: {
      type: 'object',
      patternProperties: {
        [ANY_KEY_PATTERN]: periodTimeSchema,
      },
    },
  },
  required: ['name', 'timetable', 'subjects', 'period_times'],
} as const satisfies JSONSchema;

/** 24-hour HHMM, 0000 to 2359 */
export const TIME_OF_DAY_PATTERN = /^([01][0-9]|2[0-3])[0-5][0-9]$/;
