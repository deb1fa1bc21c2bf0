import { UnsupportedOperatorError } from '../errors.js';
import type { FieldType, ResolvedField } from '../model/schema.js';
import type { OperatorToken } from './types.js';

export type BackendKind = 'mongodb';

export type ValueShape = 'scalar' | 'list' | 'pattern' | 'none';

export interface OperatorSpec {
  readonly shape: ValueShape;
  /** Field types the operator applies to. */
  readonly appliesTo: ReadonlySet<FieldType>;
}

const ALL_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  'id',
  'string',
  'integer',
  'float',
  'decimal',
  'boolean',
  'datetime',
  'json',
  'list',
]);
const ORDERED_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  'id',
  'string',
  'integer',
  'float',
  'decimal',
  'datetime',
]);
const TEXT_TYPES: ReadonlySet<FieldType> = new Set<FieldType>(['string', 'list']);

export const OPERATOR_TABLE: Readonly<Record<OperatorToken, OperatorSpec>> = {
  eq: { shape: 'scalar', appliesTo: ALL_TYPES },
  neq: { shape: 'scalar', appliesTo: ALL_TYPES },
  gt: { shape: 'scalar', appliesTo: ORDERED_TYPES },
  gte: { shape: 'scalar', appliesTo: ORDERED_TYPES },
  lt: { shape: 'scalar', appliesTo: ORDERED_TYPES },
  lte: { shape: 'scalar', appliesTo: ORDERED_TYPES },
  in: { shape: 'list', appliesTo: ALL_TYPES },
  not_in: { shape: 'list', appliesTo: ALL_TYPES },
  like: { shape: 'pattern', appliesTo: TEXT_TYPES },
  ilike: { shape: 'pattern', appliesTo: TEXT_TYPES },
  is_null: { shape: 'none', appliesTo: ALL_TYPES },
  is_not_null: { shape: 'none', appliesTo: ALL_TYPES },
};

const NATIVE_OPERATORS: Readonly<Record<BackendKind, Readonly<Record<OperatorToken, string>>>> = {
  mongodb: {
    eq: '$eq',
    neq: '$ne',
    gt: '$gt',
    gte: '$gte',
    lt: '$lt',
    lte: '$lte',
    in: '$in',
    not_in: '$nin',
    like: '$regex',
    ilike: '$regex',
    is_null: '$eq',
    is_not_null: '$ne',
  },
};

export function nativeOperator(operator: OperatorToken, backend: BackendKind = 'mongodb'): string {
  return NATIVE_OPERATORS[backend][operator];
}

/**
 * Throws UnsupportedOperatorError when the operator cannot apply to the
 * field. `like`/`ilike` on a list only make sense for lists of strings.
 */
export function assertOperatorApplies(operator: OperatorToken, field: ResolvedField): void {
  const spec = OPERATOR_TABLE[operator];
  const listOfText =
    field.type !== 'list' ||
    spec.shape !== 'pattern' ||
    (field.definition.elementType ?? 'string') === 'string';
  if (!spec.appliesTo.has(field.type) || !listOfText) {
    const fieldType =
      field.type === 'list' && field.definition.elementType !== undefined
        ? `list<${field.definition.elementType}>`
        : field.type;
    throw new UnsupportedOperatorError(operator, field.name, fieldType);
  }
}
