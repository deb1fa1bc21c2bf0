import type { Document } from 'mongodb';
import { CompilationError } from '../../errors.js';
import {
  ID_STORAGE_NAME,
  resolveField,
  type FieldDefinition,
  type ModelSchema,
} from '../../model/schema.js';
import type { JoinSpec } from '../types.js';
import { assertAlias, withField, type StageResult } from './stage.js';

export function validateJoin(spec: JoinSpec): void {
  if (!spec.collection || spec.collection.trim() === '') {
    throw new CompilationError('Join needs a target collection');
  }
  if (!spec.localField || !spec.foreignField) {
    throw new CompilationError(`Join with "${spec.collection}" needs on(localField, foreignField)`);
  }
  assertAlias(spec.as, 'Join alias');
  if (spec.select !== null && spec.select.length === 0) {
    throw new CompilationError(`Join with "${spec.collection}" selects no fields`);
  }
  if (spec.model !== null && spec.model.collection !== spec.collection) {
    throw new CompilationError(
      `Join model describes "${spec.model.collection}" but the join targets "${spec.collection}"`,
    );
  }
}

function restrict(model: ModelSchema, select: readonly string[]): ModelSchema {
  const fields: Record<string, FieldDefinition> = {};
  for (const name of select) {
    if (name.includes('.')) {
      throw new CompilationError(`Join select takes top-level fields of "${model.collection}", got "${name}"`);
    }
    const field = resolveField(model, name);
    fields[name] = { ...field.definition, storageName: field.storagePath };
  }
  return { collection: model.collection, fields };
}

function selectProjection(spec: JoinSpec, select: readonly string[]): Document {
  const paths = select.map((name) =>
    spec.model === null ? name : resolveField(spec.model, name).storagePath,
  );
  const projection: Document = {};
  if (!paths.includes(ID_STORAGE_NAME)) projection[ID_STORAGE_NAME] = 0;
  for (const path of paths) projection[path] = 1;
  return projection;
}

/**
 * `$lookup` of `localField` against `foreignField` in the target collection.
 * An inner join then drops rows whose joined set is empty; a left join keeps
 * them with an empty array.
 */
export function compileJoin(spec: JoinSpec, model: ModelSchema): StageResult {
  validateJoin(spec);

  const local = resolveField(model, spec.localField);
  const foreignPath =
    spec.model === null ? spec.foreignField : resolveField(spec.model, spec.foreignField).storagePath;

  const lookup: Document = {
    from: spec.collection,
    localField: local.storagePath,
    foreignField: foreignPath,
    as: spec.as,
  };
  if (spec.select !== null) {
    lookup['pipeline'] = [{ $project: selectProjection(spec, spec.select) }];
  }

  const stages: Document[] = [{ $lookup: lookup }];
  if (spec.joinKind === 'inner') {
    stages.push({ $match: { [spec.as]: { $ne: [] } } });
  }

  let joined: FieldDefinition = { type: 'list', elementType: 'json' };
  if (spec.model !== null) {
    const rowModel = spec.select === null ? spec.model : restrict(spec.model, spec.select);
    joined = { type: 'list', model: rowModel };
  }

  return { stages, model: withField(model, spec.as, joined) };
}
