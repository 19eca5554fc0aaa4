/**
 * Timetable Validator
 *
 * Recursive descent over the compiled rule tree. Every defect is collected;
 * only a non-object root stops the walk early, since nothing below it can be
 * checked.
 *
 * @module validation/timetable-validator
 */

import { TIMETABLE_SCHEMA, TIME_OF_DAY_PATTERN } from '../schemas/timetable-schema';
import { JSONSchema } from '../types/schemas';
import { ValidationResult, ValidatorOptions, Violation, ViolationKind } from '../types/validation';
import { classify, describeKind, DocumentValue } from './document-value';
import { ArrayRule, compileSchema, LeafRule, ObjectRule, Rule } from './rule-compiler';

export const ROOT_PATH = '';

export function appendPath(parent: string, key: string | number): string {
  if (typeof key === 'number') {
    return `${parent}[${key}]`;
  }
  if (!parent) {
    return key;
  }
  return `${parent}.${key}`;
}

/**
 * Same schema with `start` and `end` restricted to HHMM times
 */
export function withTimeFormat(schema: typeof TIMETABLE_SCHEMA): JSONSchema {
  const periodTime = schema.properties.period_times.patternProperties['^.*$'];
  const timeProperty = { type: 'string', pattern: TIME_OF_DAY_PATTERN.source } as const;
  return {
    ...schema,
    properties: {
      ...schema.properties,
      period_times: {
        ...schema.properties.period_times,
        patternProperties: {
          '^.*$': {
            ...periodTime,
            properties: {
              ...periodTime.properties,
              start: { ...periodTime.properties.start, ...timeProperty },
              end: { ...periodTime.properties.end, ...timeProperty },
            },
          },
        },
      },
    },
  };
}

const DEFAULT_RULES = compileSchema(TIMETABLE_SCHEMA);
const TIME_FORMAT_RULES = compileSchema(withTimeFormat(TIMETABLE_SCHEMA));

class ViolationCollector {
  readonly violations: Violation[] = [];

  add(path: string, kind: ViolationKind, message: string): void {
    this.violations.push({ path, kind, message });
  }
}

function matchesLeaf(rule: LeafRule, value: DocumentValue): boolean {
  switch (rule.type) {
    case 'integer':
      return value.kind === 'number' && Number.isInteger(value.value);
    default:
      return value.kind === rule.type;
  }
}

function checkLeaf(rule: LeafRule, value: DocumentValue, path: string, out: ViolationCollector): void {
  if (!matchesLeaf(rule, value)) {
    out.add(path, 'TypeMismatch', `Expected ${describeType(rule)} but received ${describeKind(value.kind)}`);
    return;
  }
  if (rule.pattern && value.kind === 'string' && !rule.pattern.test(value.value)) {
    out.add(
      path,
      'FormatMismatch',
      `Value ${JSON.stringify(value.value)} does not match the expected format ${rule.pattern.source}`
    );
  }
}

function describeType(rule: Rule): string {
  switch (rule.type) {
    case 'integer':
      return 'an integer';
    case 'null':
      return 'null';
    default:
      return describeKind(rule.type);
  }
}

function arityMessage(rule: ArrayRule, length: number): string | undefined {
  const { minItems, maxItems } = rule;
  if (minItems !== undefined && minItems === maxItems && length !== minItems) {
    return `Expected exactly ${minItems} items but received ${length}`;
  }
  if (minItems !== undefined && length < minItems) {
    return `Expected at least ${minItems} items but received ${length}`;
  }
  if (maxItems !== undefined && length > maxItems) {
    return `Expected at most ${maxItems} items but received ${length}`;
  }
  return undefined;
}

function checkArray(
  rule: ArrayRule,
  items: readonly unknown[],
  path: string,
  out: ViolationCollector
): void {
  const arity = arityMessage(rule, items.length);
  if (arity) {
    out.add(path, 'ArityMismatch', arity);
  }
  if (!rule.items) {
    return;
  }
  for (let index = 0; index < items.length; index++) {
    checkValue(rule.items, classify(items[index]), appendPath(path, index), out);
  }
}

function checkObject(
  rule: ObjectRule,
  entries: ReadonlyArray<readonly [string, unknown]>,
  path: string,
  out: ViolationCollector
): void {
  const present = new Map(entries);

  for (const property of rule.properties) {
    const childPath = appendPath(path, property.name);
    if (present.has(property.name)) {
      checkValue(property.rule, classify(present.get(property.name)), childPath, out);
    } else if (property.required) {
      out.add(childPath, 'MissingField', `Missing required field "${property.name}"`);
    }
  }

  for (const [key, child] of entries) {
    if (rule.properties.some((property) => property.name === key)) {
      continue;
    }
    const childPath = appendPath(path, key);
    const matching = rule.patternProperties.filter((candidate) => candidate.pattern.test(key));
    if (matching.length > 0) {
      for (const candidate of matching) {
        checkValue(candidate.rule, classify(child), childPath, out);
      }
    } else if (!rule.additionalProperties) {
      out.add(childPath, 'UnexpectedField', `Unexpected field "${key}"`);
    }
  }
}

function checkValue(rule: Rule, value: DocumentValue, path: string, out: ViolationCollector): void {
  switch (rule.type) {
    case 'object':
      if (value.kind !== 'object') {
        out.add(path, 'TypeMismatch', `Expected an object but received ${describeKind(value.kind)}`);
        return;
      }
      checkObject(rule, value.entries, path, out);
      return;
    case 'array':
      if (value.kind !== 'array') {
        out.add(path, 'TypeMismatch', `Expected an array but received ${describeKind(value.kind)}`);
        return;
      }
      checkArray(rule, value.items, path, out);
      return;
    default:
      checkLeaf(rule, value, path, out);
  }
}

function entriesOf(value: unknown): ReadonlyArray<readonly [string, unknown]> | undefined {
  const classified = classify(value);
  return classified.kind === 'object' ? classified.entries : undefined;
}

/**
 * Period subjects must name an entry of `subjects`. Skipped when `subjects`
 * or `timetable` has the wrong shape, which is already reported.
 */
function checkSubjectReferences(root: ReadonlyArray<readonly [string, unknown]>, out: ViolationCollector): void {
  const fields = new Map(root);
  const subjects = entriesOf(fields.get('subjects'));
  const days = classify(fields.get('timetable'));
  if (!subjects || days.kind !== 'array') {
    return;
  }

  const subjectIds = new Set(subjects.map(([id]) => id));
  const timetablePath = appendPath(ROOT_PATH, 'timetable');

  days.items.forEach((day, dayIndex) => {
    for (const [periodId, period] of entriesOf(day) ?? []) {
      const subject = classify(entriesOf(period)?.find(([key]) => key === 'subject')?.[1]);
      if (subject.kind === 'string' && !subjectIds.has(subject.value)) {
        out.add(
          appendPath(appendPath(appendPath(timetablePath, dayIndex), periodId), 'subject'),
          'ReferentialIntegrityError',
          `Subject "${subject.value}" is not defined in subjects`
        );
      }
    }
  });
}

/**
 * Validates candidate documents against the timetable schema.
 *
 * The rule trees are compiled when this module loads and shared by every
 * instance.
 */
export class TimetableValidator {
  private readonly rules: Rule;
  private readonly checkReferences: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.checkReferences = options.checkReferences ?? true;
    this.rules = options.checkTimeFormat ? TIME_FORMAT_RULES : DEFAULT_RULES;
  }

  validate(document: unknown): ValidationResult {
    const out = new ViolationCollector();
    const root = classify(document);

    checkValue(this.rules, root, ROOT_PATH, out);

    if (this.checkReferences && root.kind === 'object') {
      checkSubjectReferences(root.entries, out);
    }

    if (out.violations.length === 0) {
      return { valid: true, violations: [] };
    }
    return { valid: false, violations: out.violations };
  }
}

const defaultValidator = new TimetableValidator();

/**
 * Validate a parsed document with the default options.
 */
export function validate(document: unknown): ValidationResult {
  return defaultValidator.validate(document);
}
