import { Decimal128, Double, Int32, Long, ObjectId } from 'mongodb';
import { MalformedDomainError, MappingError } from '../errors.js';
import type { FieldDefinition, FieldType, ModelSchema, ScalarFieldType } from '../model/schema.js';

/** Caller-visible value of a mapped field. */
export type FieldValue =
  | string
  | number
  | boolean
  | Date
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a caller value to its wire form for the declared type.
 * Throws MalformedDomainError when the value is not representable.
 */
export function coerce(value: unknown, type: FieldType, definition?: FieldDefinition): unknown {
  if (value === null) return null;

  switch (type) {
    case 'id':
      if (value instanceof ObjectId) return new ObjectId(value.toHexString());
      if (typeof value === 'string' && OBJECT_ID_PATTERN.test(value)) {
        return ObjectId.createFromHexString(value);
      }
      return rejectValue(value, type);
    case 'string':
      return typeof value === 'string' ? value : rejectValue(value, type);
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value)
        ? value
        : rejectValue(value, type);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value) ? value : rejectValue(value, type);
    case 'decimal':
      return coerceDecimal(value);
    case 'boolean':
      return typeof value === 'boolean' ? value : rejectValue(value, type);
    case 'datetime':
      return coerceDate(value);
    case 'json':
      return value;
    case 'list':
      if (Array.isArray(value)) return value.map((item) => coerceElement(item, definition));
      return coerceElement(value, definition);
  }
}

function coerceElement(value: unknown, definition: FieldDefinition | undefined): unknown {
  if (definition?.model !== undefined) return value;
  return coerce(value, definition?.elementType ?? 'json');
}

/**
 * Strings must already be in the form `Decimal128#toString()` prints
 * (`"1E+3"`, not `"1e3"`; `"0.5"`, not `".5"`), so that decoding returns
 * the caller's string unchanged.
 */
function coerceDecimal(value: unknown): Decimal128 {
  if (value instanceof Decimal128) return Decimal128.fromString(value.toString());
  const text = typeof value === 'number' && Number.isFinite(value) ? String(value) : value;
  if (typeof text !== 'string' || !DECIMAL_PATTERN.test(text)) {
    return rejectValue(value, 'decimal');
  }
  let decimal: Decimal128;
  try {
    decimal = Decimal128.fromString(text);
  } catch (err) {
    throw new MalformedDomainError(`Value ${JSON.stringify(text)} is not a valid decimal`, null, err);
  }
  if (typeof value === 'string' && decimal.toString() !== value) {
    throw new MalformedDomainError(
      `Value ${JSON.stringify(value)} is not a canonical decimal; write it as ${JSON.stringify(decimal.toString())}`,
    );
  }
  return decimal;
}

function coerceDate(value: unknown): Date {
  const date =
    value instanceof Date ? new Date(value.getTime()) : typeof value === 'string' ? new Date(value) : null;
  if (date === null || Number.isNaN(date.getTime())) {
    return rejectValue(value, 'datetime');
  }
  return date;
}

function rejectValue(value: unknown, type: FieldType): never {
  const shown = typeof value === 'string' ? JSON.stringify(value) : typeof value;
  throw new MalformedDomainError(`Value ${shown} is not a valid ${type}`);
}

/**
 * Inverse of {@link coerce}: converts a raw backend value to the caller
 * representation. `context` names the field in MappingError.
 */
export function decoerce(
  raw: unknown,
  type: FieldType,
  definition?: FieldDefinition,
  context: { field: string; collection: string | null } = { field: '?', collection: null },
): FieldValue {
  if (raw === null || raw === undefined) {
    return type === 'list' ? [] : null;
  }

  const fail = (): never => {
    throw new MappingError(context.field, type, raw, context.collection);
  };

  switch (type) {
    case 'id':
      if (raw instanceof ObjectId) return raw.toHexString();
      return typeof raw === 'string' ? raw : fail();
    case 'string':
      return typeof raw === 'string' ? raw : fail();
    case 'integer': {
      const n = numeric(raw);
      return n !== null && Number.isSafeInteger(n) ? n : fail();
    }
    case 'float': {
      const n = numeric(raw);
      return n !== null ? n : fail();
    }
    case 'decimal':
      if (raw instanceof Decimal128) return raw.toString();
      if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
      return typeof raw === 'string' && DECIMAL_PATTERN.test(raw) ? raw : fail();
    case 'boolean':
      return typeof raw === 'boolean' ? raw : fail();
    case 'datetime':
      return raw instanceof Date ? new Date(raw.getTime()) : fail();
    case 'json':
      return toPlain(raw);
    case 'list':
      if (!Array.isArray(raw)) return fail();
      return raw.map((item: unknown, index) =>
        decoerceElement(item, definition, { ...context, field: `${context.field}.${index}` }),
      );
  }
}

function decoerceElement(
  raw: unknown,
  definition: FieldDefinition | undefined,
  context: { field: string; collection: string | null },
): FieldValue {
  const model: ModelSchema | undefined = definition?.model;
  if (model !== undefined) {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new MappingError(context.field, `document of ${model.collection}`, raw, context.collection);
    }
    const mapped: Record<string, FieldValue> = {};
    for (const [name, field] of Object.entries(model.fields)) {
      const storageName = field.storageName ?? name;
      mapped[name] = decoerce(readKey(raw, storageName), field.type, field, {
        field: `${context.field}.${name}`,
        collection: context.collection,
      });
    }
    return mapped;
  }
  const elementType: ScalarFieldType = definition?.elementType ?? 'json';
  return decoerce(raw, elementType, undefined, context);
}

function readKey(source: object, key: string): unknown {
  const value: unknown = Object.getOwnPropertyDescriptor(source, key)?.value;
  return value;
}

function numeric(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (raw instanceof Int32 || raw instanceof Double) return raw.valueOf();
  if (raw instanceof Long) {
    const n = raw.toNumber();
    return Number.isSafeInteger(n) ? n : null;
  }
  return null;
}

/** Recursively replaces BSON wrapper types with plain caller values. */
function toPlain(raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return raw;
  if (raw instanceof Date) return new Date(raw.getTime());
  if (raw instanceof ObjectId) return raw.toHexString();
  if (raw instanceof Decimal128) return raw.toString();
  if (raw instanceof Int32 || raw instanceof Double) return raw.valueOf();
  if (raw instanceof Long) return raw.toNumber();
  if (Array.isArray(raw)) return raw.map((item: unknown) => toPlain(item));
  if (typeof raw === 'object') {
    const plain: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(raw)) {
      plain[key] = toPlain(value);
    }
    return plain;
  }
  return String(raw);
}
