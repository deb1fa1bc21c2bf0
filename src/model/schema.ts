import { CompilationError } from '../errors.js';

export type ScalarFieldType =
  | 'id'
  | 'string'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'datetime'
  | 'json';

export type FieldType = ScalarFieldType | 'list';

export interface FieldDefinition {
  readonly type: FieldType;
  /** Name of the attribute in stored documents. Defaults to the field name. */
  readonly storageName?: string;
  /** Element type of a `list` field. Ignored for other types. */
  readonly elementType?: ScalarFieldType;
  /** Embedded document schema for each element of a `list` field. */
  readonly model?: ModelSchema;
}

/**
 * Field metadata for one collection. Produced by the model layer;
 * the query engine only reads it.
 */
export interface ModelSchema {
  readonly collection: string;
  readonly fields: Readonly<Record<string, FieldDefinition>>;
}

export interface ResolvedField {
  readonly name: string;
  readonly type: FieldType;
  readonly storagePath: string;
  readonly definition: FieldDefinition;
}

export const ID_FIELD = 'id';
export const ID_STORAGE_NAME = '_id';

const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FIELD_TYPES: ReadonlySet<string> = new Set<FieldType>([
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

/**
 * Validates field declarations and returns a frozen schema. An `id` field
 * stored as `_id` is added unless the caller declares one.
 */
export function defineModel(
  collection: string,
  fields: Record<string, FieldDefinition>,
): ModelSchema {
  if (!collection || collection.trim() === '') {
    throw new CompilationError('defineModel: collection must be a non-empty string');
  }

  const declared: Record<string, FieldDefinition> = {};
  const storageNames = new Set<string>();
  for (const [name, definition] of Object.entries(fields)) {
    if (!FIELD_NAME_PATTERN.test(name)) {
      throw new CompilationError(`defineModel: invalid field name "${name}" in "${collection}"`);
    }
    if (!FIELD_TYPES.has(definition.type)) {
      throw new CompilationError(
        `defineModel: field "${name}" in "${collection}" has unknown type "${String(definition.type)}"`,
      );
    }
    const storageName = definition.storageName ?? name;
    if (storageNames.has(storageName)) {
      throw new CompilationError(
        `defineModel: storage name "${storageName}" is used twice in "${collection}"`,
      );
    }
    storageNames.add(storageName);
    declared[name] = Object.freeze({ ...definition });
  }

  if (!(ID_FIELD in declared) && !storageNames.has(ID_STORAGE_NAME)) {
    declared[ID_FIELD] = Object.freeze({ type: 'id', storageName: ID_STORAGE_NAME });
  }

  return Object.freeze({ collection, fields: Object.freeze(declared) });
}

/**
 * Looks a field up by name. A dotted path below a `json` field resolves to
 * that field's storage path with type `json`.
 */
export function resolveField(model: ModelSchema, name: string): ResolvedField {
  const direct = model.fields[name];
  if (direct !== undefined) {
    return {
      name,
      type: direct.type,
      storagePath: direct.storageName ?? name,
      definition: direct,
    };
  }

  const dot = name.indexOf('.');
  if (dot > 0) {
    const head = name.slice(0, dot);
    const parent = model.fields[head];
    if (parent !== undefined && parent.type === 'json') {
      return {
        name,
        type: 'json',
        storagePath: `${parent.storageName ?? head}${name.slice(dot)}`,
        definition: { type: 'json' },
      };
    }
  }

  throw new CompilationError(`Unknown field "${name}" in "${model.collection}"`);
}
