/**
 * Document Value Classification
 *
 * Arbitrary input is classified one level at a time into a closed tagged
 * union so the validator can match on `kind` instead of probing `typeof`.
 * Children stay unclassified until the validator descends into them, which
 * keeps cyclic or very large inputs from being walked beyond what the rule
 * tree reaches.
 *
 * @module validation/document-value
 */

export type DocumentValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'array'; readonly items: readonly unknown[] }
  | { readonly kind: 'object'; readonly entries: ReadonlyArray<readonly [string, unknown]> };

export type DocumentKind = DocumentValue['kind'];

const NULL_VALUE: DocumentValue = { kind: 'null' };

/**
 * True for values JSON serialization drops from objects
 */
export function isAbsent(value: unknown): boolean {
  return value === undefined || typeof value === 'function' || typeof value === 'symbol';
}

export function classify(value: unknown): DocumentValue {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
      return { kind: 'number', value };
    case 'bigint':
      return { kind: 'number', value: Number(value) };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'object':
      if (value === null) {
        return NULL_VALUE;
      }
      if (Array.isArray(value)) {
        return { kind: 'array', items: value };
      }
      return {
        kind: 'object',
        entries: Object.entries(value).filter(([, child]) => !isAbsent(child)),
      };
    default:
      return NULL_VALUE;
  }
}

/**
 * Human-readable kind name used in violation messages
 */
export function describeKind(kind: DocumentKind): string {
  switch (kind) {
    case 'null':
      return 'null';
    case 'boolean':
      return 'a boolean';
    case 'number':
      return 'a number';
    case 'string':
      return 'a string';
    case 'array':
      return 'an array';
    case 'object':
      return 'an object';
  }
}
