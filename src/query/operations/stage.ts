import type { Document } from 'mongodb';
import { CompilationError } from '../../errors.js';
import type { FieldDefinition, ModelSchema } from '../../model/schema.js';

/** Stages emitted by one operation and the row shape they leave behind. */
export interface StageResult {
  readonly stages: Document[];
  readonly model: ModelSchema;
}

const ALIAS_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** `$path` reference to a stored field inside an aggregation expression. */
export function fieldRef(storagePath: string): string {
  return `$${storagePath}`;
}

export function assertAlias(alias: string, what: string): void {
  if (!ALIAS_PATTERN.test(alias)) {
    throw new CompilationError(`${what} "${alias}" must be a plain identifier`);
  }
}

/** Returns a copy of `model` with one more top-level field stored under its own name. */
export function withField(model: ModelSchema, name: string, definition: FieldDefinition): ModelSchema {
  if (name in model.fields) {
    throw new CompilationError(`Output field "${name}" already exists in "${model.collection}"`);
  }
  return {
    collection: model.collection,
    fields: { ...model.fields, [name]: { ...definition, storageName: name } },
  };
}
