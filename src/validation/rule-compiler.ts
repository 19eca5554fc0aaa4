/**
 * Rule Compiler
 *
 * Turns a declarative JSON Schema into an immutable rule tree the validator
 * walks. The schema is first compiled by Ajv in strict mode, so misplaced or
 * unknown keywords fail when the rule tree is built rather than being
 * silently ignored at validation time.
 *
 * @module validation/rule-compiler
 */

import Ajv from 'ajv';
import { SchemaDefinitionError } from '../types/errors';
import { JSONSchema, JSONSchemaTypeName } from '../types/schemas';

export type LeafType = Exclude<JSONSchemaTypeName, 'object' | 'array'>;

export interface LeafRule {
  readonly type: LeafType;
  /** Only meaningful for strings */
  readonly pattern?: RegExp;
}

export interface PropertyRule {
  readonly name: string;
  readonly rule: Rule;
  readonly required: boolean;
}

export interface PatternPropertyRule {
  readonly source: string;
  readonly pattern: RegExp;
  readonly rule: Rule;
}

export interface ObjectRule {
  readonly type: 'object';
  /** In declaration order */
  readonly properties: readonly PropertyRule[];
  readonly patternProperties: readonly PatternPropertyRule[];
  readonly additionalProperties: boolean;
}

export interface ArrayRule {
  readonly type: 'array';
  readonly items?: Rule;
  readonly minItems?: number;
  readonly maxItems?: number;
}

export type Rule = LeafRule | ObjectRule | ArrayRule;

const ANNOTATION_KEYWORDS = new Set(['$schema', 'title', 'description']);

const SUPPORTED_KEYWORDS: Record<JSONSchemaTypeName, ReadonlySet<string>> = {
  object: new Set(['type', 'properties', 'patternProperties', 'required', 'additionalProperties']),
  array: new Set(['type', 'items', 'minItems', 'maxItems']),
  string: new Set(['type', 'pattern']),
  number: new Set(['type']),
  integer: new Set(['type']),
  boolean: new Set(['type']),
  null: new Set(['type']),
};

function appendSchemaPath(parent: string, segment: string): string {
  return `${parent}/${segment}`;
}

function ensureSupportedKeywords(schema: JSONSchema, type: JSONSchemaTypeName, at: string): void {
  const supported = SUPPORTED_KEYWORDS[type];
  for (const keyword of Object.keys(schema)) {
    if (!supported.has(keyword) && !ANNOTATION_KEYWORDS.has(keyword)) {
      throw new SchemaDefinitionError(`keyword "${keyword}" is not supported for ${type} at ${at}`, {
        schemaPath: at,
        keyword,
      });
    }
  }
}

/**
 * `.` also matches line terminators, so `^.*$` accepts every key.
 */
function compilePattern(source: string, at: string): RegExp {
  try {
    return new RegExp(source, 'su');
  } catch (error) {
    throw new SchemaDefinitionError(`invalid pattern ${JSON.stringify(source)} at ${at}`, { schemaPath: at }, error);
  }
}

function compileCount(value: number | undefined, keyword: string, at: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new SchemaDefinitionError(`${keyword} must be a non-negative integer at ${at}`, {
      schemaPath: at,
    });
  }
  return value;
}

function compileObject(schema: JSONSchema, at: string): ObjectRule {
  const required = new Set(schema.required ?? []);

  const properties = Object.entries(schema.properties ?? {}).map(([name, child]) =>
    Object.freeze({
      name,
      rule: compileRule(child, appendSchemaPath(at, `properties/${name}`)),
      required: required.has(name),
    })
  );

  for (const name of required) {
    if (!properties.some((property) => property.name === name)) {
      throw new SchemaDefinitionError(`required field "${name}" has no property definition at ${at}`, {
        schemaPath: at,
      });
    }
  }

  const patternProperties = Object.entries(schema.patternProperties ?? {}).map(([source, child]) =>
    Object.freeze({
      source,
      pattern: compilePattern(source, at),
      rule: compileRule(child, appendSchemaPath(at, `patternProperties/${source}`)),
    })
  );

  return Object.freeze({
    type: 'object',
    properties: Object.freeze(properties),
    patternProperties: Object.freeze(patternProperties),
    additionalProperties: schema.additionalProperties ?? true,
  });
}

function compileArray(schema: JSONSchema, at: string): ArrayRule {
  const minItems = compileCount(schema.minItems, 'minItems', at);
  const maxItems = compileCount(schema.maxItems, 'maxItems', at);
  if (minItems !== undefined && maxItems !== undefined && minItems > maxItems) {
    throw new SchemaDefinitionError(`minItems exceeds maxItems at ${at}`, { schemaPath: at });
  }

  return Object.freeze({
    type: 'array',
    items: schema.items ? compileRule(schema.items, appendSchemaPath(at, 'items')) : undefined,
    minItems,
    maxItems,
  });
}

function compileRule(schema: JSONSchema, at: string): Rule {
  const type = schema.type;
  if (type === undefined) {
    throw new SchemaDefinitionError(`every sub-schema must declare a type (missing at ${at})`, {
      schemaPath: at,
    });
  }

  ensureSupportedKeywords(schema, type, at);

  switch (type) {
    case 'object':
      return compileObject(schema, at);
    case 'array':
      return compileArray(schema, at);
    default:
      return Object.freeze({
        type,
        pattern: schema.pattern === undefined ? undefined : compilePattern(schema.pattern, at),
      });
  }
}

/**
 * Vet the schema with Ajv in strict mode.
 */
export function assertWellFormedSchema(schema: JSONSchema): void {
  const ajv = new Ajv({ strict: true, allErrors: true });
  try {
    ajv.compile(schema);
  } catch (error) {
    throw new SchemaDefinitionError(
      error instanceof Error ? error.message : String(error),
      { schemaPath: '#' },
      error
    );
  }
}

/**
 * Compile a schema into a frozen rule tree.
 *
 * @throws SchemaDefinitionError when the schema is rejected by Ajv or uses
 * keywords the rule tree cannot express
 */
export function compileSchema(schema: JSONSchema): Rule {
  assertWellFormedSchema(schema);
  return compileRule(schema, '#');
}
