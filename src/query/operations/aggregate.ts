import type { Document } from 'mongodb';
import { compileDomain } from '../../domain/compiler.js';
import { normalizeDomain } from '../../domain/normalizer.js';
import { CompilationError } from '../../errors.js';
import {
  resolveField,
  type FieldDefinition,
  type ModelSchema,
  type ResolvedField,
} from '../../model/schema.js';
import type { AggregateSpec, Metric } from '../types.js';
import { assertAlias, fieldRef, type StageResult } from './stage.js';

const SUMMABLE = new Set(['integer', 'float', 'decimal']);
const ORDERED = new Set(['id', 'string', 'integer', 'float', 'decimal', 'datetime']);

/** Checks that need no model: run when the sub-builder is finalised. */
export function validateAggregate(spec: AggregateSpec): void {
  if (spec.groupBy.length === 0 && spec.metrics.length === 0) {
    throw new CompilationError('Aggregate needs at least one group field or metric');
  }
  const names = new Set<string>();
  for (const field of spec.groupBy) {
    if (field.includes('.')) {
      throw new CompilationError(`Cannot group by nested path "${field}"`);
    }
    if (names.has(field)) throw new CompilationError(`Group field "${field}" is listed twice`);
    names.add(field);
  }
  for (const metric of spec.metrics) {
    assertAlias(metric.alias, 'Metric alias');
    if (names.has(metric.alias)) {
      throw new CompilationError(`Metric alias "${metric.alias}" clashes with another output field`);
    }
    names.add(metric.alias);
    if (metric.field === '*' && metric.fn !== 'count') {
      throw new CompilationError(`"${metric.fn}" needs a source field, "*" is only valid for count`);
    }
  }
}

function accumulator(metric: Metric, source: ResolvedField | null): Document {
  if (source === null) return { $sum: 1 };
  const ref = fieldRef(source.storagePath);
  switch (metric.fn) {
    case 'count':
      return { $sum: { $cond: [{ $eq: [{ $ifNull: [ref, null] }, null] }, 0, 1] } };
    case 'sum':
      return { $sum: ref };
    case 'avg':
      return { $avg: ref };
    case 'min':
      return { $min: ref };
    case 'max':
      return { $max: ref };
  }
}

function metricDefinition(metric: Metric, source: ResolvedField | null): FieldDefinition {
  if (metric.fn === 'count' || source === null) return { type: 'integer' };

  const allowed = metric.fn === 'sum' || metric.fn === 'avg' ? SUMMABLE : ORDERED;
  if (!allowed.has(source.type)) {
    throw new CompilationError(
      `Cannot compute ${metric.fn} over ${source.type} field "${source.name}"`,
    );
  }
  if (metric.fn === 'avg') return { type: source.type === 'decimal' ? 'decimal' : 'float' };
  return { type: source.type };
}

/**
 * `$group` keyed by the group fields, then the `having` filter over the
 * grouped namespace, then a `$project` lifting the group key to top-level
 * fields.
 */
export function compileAggregate(spec: AggregateSpec, model: ModelSchema): StageResult {
  validateAggregate(spec);

  const groupFields = spec.groupBy.map((name) => resolveField(model, name));
  const groupId: Document | null =
    groupFields.length === 0
      ? null
      : Object.fromEntries(groupFields.map((f) => [f.name, fieldRef(f.storagePath)]));

  const group: Document = { _id: groupId };
  const havingFields: Record<string, FieldDefinition> = {};
  const outputFields: Record<string, FieldDefinition> = {};
  const project: Document = { _id: 0 };

  for (const field of groupFields) {
    havingFields[field.name] = { ...field.definition, storageName: `_id.${field.name}` };
    outputFields[field.name] = { ...field.definition, storageName: field.name };
    project[field.name] = `$_id.${field.name}`;
  }

  for (const metric of spec.metrics) {
    const source = metric.field === '*' ? null : resolveField(model, metric.field);
    group[metric.alias] = accumulator(metric, source);
    const definition = metricDefinition(metric, source);
    havingFields[metric.alias] = { ...definition, storageName: metric.alias };
    outputFields[metric.alias] = { ...definition, storageName: metric.alias };
    project[metric.alias] = 1;
  }

  const stages: Document[] = [{ $group: group }];

  const having = normalizeDomain(spec.having);
  if (having.kind !== 'true') {
    const havingModel: ModelSchema = { collection: model.collection, fields: havingFields };
    stages.push({ $match: compileDomain(having, havingModel) });
  }

  stages.push({ $project: project });

  return { stages, model: { collection: model.collection, fields: outputFields } };
}
