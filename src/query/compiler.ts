import type { Document } from 'mongodb';
import { compileDomain } from '../domain/compiler.js';
import { normalizeDomain } from '../domain/normalizer.js';
import { CompilationError, InvalidRangeError } from '../errors.js';
import {
  ID_STORAGE_NAME,
  resolveField,
  type FieldDefinition,
  type ModelSchema,
} from '../model/schema.js';
import { compileAggregate } from './operations/aggregate.js';
import { compileJoin } from './operations/join.js';
import type { StageResult } from './operations/stage.js';
import { compileWindow } from './operations/window.js';
import { deepFreeze } from './snapshot.js';
import type {
  AggregateOptions,
  CompiledQuery,
  FindOptions,
  OperationSpec,
  OrderTerm,
  QuerySpecification,
} from './types.js';

/** Stage used for `limit(0)`: MongoDB reads `limit: 0` as "no limit". */
export const EMPTY_RESULT_STAGE: Document = Object.freeze({ $match: Object.freeze({ $expr: false }) });

function compileOperation(op: OperationSpec, model: ModelSchema): StageResult {
  switch (op.kind) {
    case 'aggregate':
      return compileAggregate(op, model);
    case 'join':
      return compileJoin(op, model);
    case 'window':
      return compileWindow(op, model);
  }
}

function compileSort(order: readonly OrderTerm[], model: ModelSchema): Document | null {
  if (order.length === 0) return null;
  const sort: Document = {};
  for (const term of order) {
    const field = resolveField(model, term.field);
    if (field.storagePath in sort) {
      throw new CompilationError(`Field "${term.field}" appears twice in the sort order`);
    }
    sort[field.storagePath] = term.direction === 'asc' ? 1 : -1;
  }
  return sort;
}

function compileProjection(
  projection: readonly string[],
  model: ModelSchema,
): { projection: Document; model: ModelSchema } {
  if (projection.length === 0) {
    throw new CompilationError('select() needs at least one field');
  }
  const document: Document = {};
  const fields: Record<string, FieldDefinition> = {};
  for (const name of projection) {
    const field = resolveField(model, name);
    document[field.storagePath] = 1;
    fields[name] = { ...field.definition, storageName: field.storagePath };
  }
  if (!(ID_STORAGE_NAME in document)) document[ID_STORAGE_NAME] = 0;
  return { projection: document, model: { collection: model.collection, fields } };
}

function checkRange(parameter: 'limit' | 'offset', value: number | null): void {
  if (value !== null && (!Number.isSafeInteger(value) || value < 0)) {
    throw new InvalidRangeError(parameter, value);
  }
}

/**
 * Compiles a specification into a find query, or into an aggregation
 * pipeline when operations are present or `limit(0)` must be emulated.
 * Pipeline order: `$match`, `$sort`, `$skip`, `$limit`, operations in
 * declaration order, then the projection.
 */
export function compileQuery(spec: QuerySpecification): CompiledQuery {
  checkRange('limit', spec.limit);
  checkRange('offset', spec.offset);

  const baseModel = spec.target.model;
  const filter = compileDomain(normalizeDomain(spec.filter), baseModel);
  const sort = compileSort(spec.order, baseModel);
  const usePipeline = spec.operations.length > 0 || spec.limit === 0;

  if (!usePipeline) {
    const options: FindOptions = {};
    let resultModel = baseModel;
    if (spec.projection !== null) {
      const projected = compileProjection(spec.projection, baseModel);
      options.projection = projected.projection;
      resultModel = projected.model;
    }
    if (sort !== null) options.sort = sort;
    if (spec.offset !== null) options.skip = spec.offset;
    if (spec.limit !== null) options.limit = spec.limit;
    if (spec.options.hint !== undefined) options.hint = hintOf(spec.options.hint);
    if (spec.options.batchSize !== undefined) options.batchSize = spec.options.batchSize;
    return sealed({
      artifact: { kind: 'find', collection: spec.target.collection, filter, options },
      resultModel,
    });
  }

  const pipeline: Document[] = [];
  if (Object.keys(filter).length > 0) pipeline.push({ $match: filter });
  if (sort !== null) pipeline.push({ $sort: sort });
  if (spec.offset !== null && spec.offset > 0) pipeline.push({ $skip: spec.offset });
  if (spec.limit === 0) pipeline.push(EMPTY_RESULT_STAGE);
  else if (spec.limit !== null) pipeline.push({ $limit: spec.limit });

  let model = baseModel;
  for (const op of spec.operations) {
    const result = compileOperation(op, model);
    pipeline.push(...result.stages);
    model = result.model;
  }

  if (spec.projection !== null) {
    const projected = compileProjection(spec.projection, model);
    pipeline.push({ $project: projected.projection });
    model = projected.model;
  }

  const options: AggregateOptions = {};
  if (spec.options.allowDiskUse !== undefined) options.allowDiskUse = spec.options.allowDiskUse;
  if (spec.options.hint !== undefined) options.hint = hintOf(spec.options.hint);
  if (spec.options.batchSize !== undefined) options.batchSize = spec.options.batchSize;

  return sealed({
    artifact: { kind: 'aggregate', collection: spec.target.collection, pipeline, options },
    resultModel: model,
  });
}

/** Compiled queries are cached and shared between executions. */
function sealed(compiled: CompiledQuery): CompiledQuery {
  deepFreeze(compiled);
  return compiled;
}

function hintOf(hint: string | Readonly<Record<string, 1 | -1>>): string | Document {
  return typeof hint === 'string' ? hint : { ...hint };
}
