import type { Document } from 'mongodb';
import { decoerce } from '../domain/coercion.js';
import type { ModelSchema } from '../model/schema.js';
import type { TypedRecord } from '../types.js';

function readPath(document: Document, path: string): unknown {
  let current: unknown = document;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

/**
 * Builds a fresh record holding every declared field of `model`. Raw
 * fields the model does not declare are dropped; declared fields missing
 * from the document map to `[]` for lists and `null` otherwise.
 */
export function mapDocument(raw: Document, model: ModelSchema): TypedRecord {
  const record: TypedRecord = {};
  for (const [name, field] of Object.entries(model.fields)) {
    const value = readPath(raw, field.storageName ?? name);
    record[name] = decoerce(value, field.type, field, { field: name, collection: model.collection });
  }
  return record;
}
