import type { Document } from 'mongodb';
import { coerce } from '../../domain/coercion.js';
import { CompilationError } from '../../errors.js';
import { resolveField, type FieldDefinition, type ModelSchema } from '../../model/schema.js';
import type { FrameBound, WindowFunction, WindowSpec } from '../types.js';
import { assertAlias, fieldRef, withField, type StageResult } from './stage.js';

const RANKING: ReadonlySet<WindowFunction> = new Set<WindowFunction>(['row_number', 'rank', 'dense_rank']);
const SHIFTING: ReadonlySet<WindowFunction> = new Set<WindowFunction>(['lag', 'lead']);
const SUMMABLE = new Set(['integer', 'float', 'decimal']);
const ORDERED = new Set(['id', 'string', 'integer', 'float', 'decimal', 'datetime']);

function boundValue(bound: FrameBound, side: 'start' | 'end'): number {
  if (bound === 'current') return 0;
  if (bound === 'unbounded') return side === 'start' ? -Infinity : Infinity;
  return bound;
}

/** Checks that need no model: run when the sub-builder is finalised. */
export function validateWindow(spec: WindowSpec): void {
  assertAlias(spec.alias, 'Window alias');

  const needsOrder = RANKING.has(spec.fn) || SHIFTING.has(spec.fn);
  if (needsOrder && spec.orderBy.length === 0) {
    throw new CompilationError(`Window function "${spec.fn}" needs an orderBy`);
  }
  if ((spec.fn === 'rank' || spec.fn === 'dense_rank') && spec.orderBy.length > 1) {
    throw new CompilationError(`Window function "${spec.fn}" takes exactly one orderBy field`);
  }
  if (!RANKING.has(spec.fn) && spec.field === null) {
    throw new CompilationError(`Window function "${spec.fn}" needs a source field`);
  }
  if (SHIFTING.has(spec.fn) && (!Number.isSafeInteger(spec.offset) || spec.offset < 1)) {
    throw new CompilationError(`Window function "${spec.fn}" needs a positive integer offset`);
  }

  const frame = spec.frame;
  if (frame === null) return;
  if (needsOrder) {
    throw new CompilationError(`Window function "${spec.fn}" does not take a frame`);
  }
  for (const bound of [frame.start, frame.end]) {
    if (typeof bound === 'number' && !Number.isFinite(bound)) {
      throw new CompilationError(`Window frame bound ${bound} is not a finite number`);
    }
    if (typeof bound === 'number' && frame.unit === 'rows' && !Number.isInteger(bound)) {
      throw new CompilationError(`Row frame bound ${bound} must be an integer`);
    }
  }
  if (boundValue(frame.start, 'start') > boundValue(frame.end, 'end')) {
    throw new CompilationError(
      `Window frame start ${String(frame.start)} is after its end ${String(frame.end)}`,
    );
  }
  if (
    frame.unit === 'rows' &&
    spec.orderBy.length === 0 &&
    !(frame.start === 'unbounded' && frame.end === 'unbounded')
  ) {
    throw new CompilationError('A rows frame with bounded ends needs an orderBy');
  }
  if (frame.unit === 'range' && spec.orderBy.length !== 1) {
    throw new CompilationError('A range frame needs exactly one orderBy field');
  }
}

function outputExpression(spec: WindowSpec, model: ModelSchema): Document {
  switch (spec.fn) {
    case 'row_number':
      return { $documentNumber: {} };
    case 'rank':
      return { $rank: {} };
    case 'dense_rank':
      return { $denseRank: {} };
    default:
      break;
  }

  const source = resolveField(model, spec.field ?? '');
  const ref = fieldRef(source.storagePath);

  if (spec.fn === 'lag' || spec.fn === 'lead') {
    const fallback =
      spec.defaultValue === undefined || spec.defaultValue === null
        ? null
        : coerce(spec.defaultValue, source.type, source.definition);
    return {
      $shift: {
        output: ref,
        by: spec.fn === 'lag' ? -spec.offset : spec.offset,
        default: fallback,
      },
    };
  }

  const expression: Document = { [`$${spec.fn}`]: ref };
  if (spec.frame !== null) {
    const key = spec.frame.unit === 'rows' ? 'documents' : 'range';
    expression['window'] = { [key]: [spec.frame.start, spec.frame.end] };
  }
  return expression;
}

function outputDefinition(spec: WindowSpec, model: ModelSchema): FieldDefinition {
  if (RANKING.has(spec.fn)) return { type: 'integer' };

  const source = resolveField(model, spec.field ?? '');
  if (SHIFTING.has(spec.fn)) return { ...source.definition };

  const allowed = spec.fn === 'sum' || spec.fn === 'avg' ? SUMMABLE : ORDERED;
  if (!allowed.has(source.type)) {
    throw new CompilationError(`Cannot compute ${spec.fn} over ${source.type} field "${source.name}"`);
  }
  if (spec.fn === 'avg') return { type: source.type === 'decimal' ? 'decimal' : 'float' };
  return { type: source.type };
}

/**
 * `$setWindowFields` computing one output per input row. Without a frame an
 * aggregate-style function covers the whole partition.
 */
export function compileWindow(spec: WindowSpec, model: ModelSchema): StageResult {
  validateWindow(spec);

  const stage: Document = {};
  const partition = spec.partitionBy.map((name) => resolveField(model, name));
  const [onlyPartition] = partition;
  if (partition.length === 1 && onlyPartition !== undefined) {
    stage['partitionBy'] = fieldRef(onlyPartition.storagePath);
  } else if (partition.length > 1) {
    stage['partitionBy'] = Object.fromEntries(partition.map((f) => [f.name, fieldRef(f.storagePath)]));
  }

  if (spec.orderBy.length > 0) {
    const sortBy: Document = {};
    for (const term of spec.orderBy) {
      const field = resolveField(model, term.field);
      sortBy[field.storagePath] = term.direction === 'asc' ? 1 : -1;
    }
    if (spec.frame?.unit === 'range') {
      const [term] = spec.orderBy;
      const sortField = term === undefined ? null : resolveField(model, term.field);
      if (sortField === null || !['integer', 'float', 'decimal'].includes(sortField.type)) {
        throw new CompilationError('A range frame needs a numeric orderBy field');
      }
    }
    stage['sortBy'] = sortBy;
  }

  const definition = outputDefinition(spec, model);
  stage['output'] = { [spec.alias]: outputExpression(spec, model) };

  return { stages: [{ $setWindowFields: stage }], model: withField(model, spec.alias, definition) };
}
