/**
 * JSON Schema type definitions for the declarative timetable contract
 */

export type JSONSchemaTypeName = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JSONSchema {
  $schema?: string;
  title?: string;
  description?: string;
  type?: JSONSchemaTypeName;
  properties?: Readonly<Record<string, JSONSchema>>;
  patternProperties?: Readonly<Record<string, JSONSchema>>;
  required?: readonly string[];
  items?: JSONSchema;
  additionalProperties?: boolean;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
  [keyword: string]: unknown;
}
