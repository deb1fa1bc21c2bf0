import { CompilationError } from '../errors.js';
import type { DomainExpression, DomainTerm } from '../domain/types.js';
import type { ModelSchema } from '../model/schema.js';
import type { QueryBuilder } from './builder.js';
import { cloneDomain, cloneUnknown } from './snapshot.js';
import { validateAggregate } from './operations/aggregate.js';
import { validateJoin } from './operations/join.js';
import { validateWindow } from './operations/window.js';
import type {
  AggregateSpec,
  FrameBound,
  JoinKind,
  JoinSpec,
  Metric,
  MetricFunction,
  OperationSpec,
  OrderTerm,
  SortDirection,
  WindowFrame,
  WindowFunction,
  WindowSpec,
} from './types.js';

/** Hands a finalised operation back to the parent builder. */
export type FinishOperation = (operation: OperationSpec) => QueryBuilder;

abstract class OperationBuilder {
  private ended = false;

  constructor(private readonly finish: FinishOperation) {}

  protected assertOpen(): void {
    if (this.ended) {
      throw new CompilationError(`${this.describe()} was already finalised with end()`);
    }
  }

  protected abstract describe(): string;

  protected abstract toSpec(): OperationSpec;

  /** Validates the operation and returns to the parent query builder. */
  end(): QueryBuilder {
    this.assertOpen();
    const spec = this.toSpec();
    this.ended = true;
    return this.finish(spec);
  }
}

function defaultAlias(fn: string, field: string): string {
  return field === '*' ? fn : `${fn}_${field.replace(/\./g, '_')}`;
}

/**
 * Collects group fields, metrics and a `having` filter. `having` terms
 * accumulate like {@link QueryBuilder.filter}; metric aliases default to
 * `<fn>_<field>` (`count` for `count('*')`).
 */
export class AggregateBuilder extends OperationBuilder {
  private readonly metrics: Metric[] = [];
  private readonly havingTerms: DomainTerm[] = [];

  constructor(
    private readonly groupFields: readonly string[],
    finish: FinishOperation,
  ) {
    super(finish);
  }

  protected describe(): string {
    return 'groupBy()';
  }

  private metric(fn: MetricFunction, field: string, alias: string | undefined): this {
    this.assertOpen();
    this.metrics.push({ fn, field, alias: alias ?? defaultAlias(fn, field) });
    return this;
  }

  count(field = '*', alias?: string): this {
    return this.metric('count', field, alias);
  }

  sum(field: string, alias?: string): this {
    return this.metric('sum', field, alias);
  }

  avg(field: string, alias?: string): this {
    return this.metric('avg', field, alias);
  }

  min(field: string, alias?: string): this {
    return this.metric('min', field, alias);
  }

  max(field: string, alias?: string): this {
    return this.metric('max', field, alias);
  }

  /** Filter over group fields and metric aliases. */
  having(domain: DomainExpression): this {
    this.assertOpen();
    this.havingTerms.push(...domain);
    return this;
  }

  protected toSpec(): AggregateSpec {
    const spec: AggregateSpec = {
      kind: 'aggregate',
      groupBy: Object.freeze([...this.groupFields]),
      metrics: Object.freeze(this.metrics.map((m) => Object.freeze({ ...m }))),
      having: cloneDomain(this.havingTerms),
    };
    validateAggregate(spec);
    return Object.freeze(spec);
  }
}

export class JoinBuilder extends OperationBuilder {
  private localField = '';
  private foreignField = '';
  private joinKind: JoinKind = 'inner';
  private selected: readonly string[] | null = null;
  private alias: string;
  private joinedModel: ModelSchema | null = null;

  constructor(
    private readonly collection: string,
    finish: FinishOperation,
  ) {
    super(finish);
    this.alias = collection;
  }

  protected describe(): string {
    return `join("${this.collection}")`;
  }

  on(localField: string, foreignField: string): this {
    this.assertOpen();
    this.localField = localField;
    this.foreignField = foreignField;
    return this;
  }

  inner(): this {
    this.assertOpen();
    this.joinKind = 'inner';
    return this;
  }

  /** Keeps rows without a match, with an empty joined list. */
  left(): this {
    this.assertOpen();
    this.joinKind = 'left';
    return this;
  }

  select(...fields: string[]): this {
    this.assertOpen();
    this.selected = [...fields];
    return this;
  }

  as(alias: string): this {
    this.assertOpen();
    this.alias = alias;
    return this;
  }

  /** Schema of the joined collection; without one joined rows are mapped as plain JSON. */
  model(schema: ModelSchema): this {
    this.assertOpen();
    this.joinedModel = schema;
    return this;
  }

  protected toSpec(): JoinSpec {
    const spec: JoinSpec = {
      kind: 'join',
      collection: this.collection,
      localField: this.localField,
      foreignField: this.foreignField,
      joinKind: this.joinKind,
      select: this.selected === null ? null : Object.freeze([...this.selected]),
      as: this.alias,
      model: this.joinedModel,
    };
    validateJoin(spec);
    return Object.freeze(spec);
  }
}

export interface ShiftOptions {
  /** Rows to look back (`lag`) or ahead (`lead`). Defaults to 1. */
  offset?: number;
  /** Value used past the partition edge. Defaults to null. */
  default?: unknown;
  alias?: string;
}

interface WindowCall {
  fn: WindowFunction;
  field: string | null;
  alias: string;
  offset: number;
  defaultValue: unknown;
}

/**
 * One window function over `partitionBy`/`orderBy`. Without `rows()` or
 * `range()` the function covers the whole partition.
 */
export class WindowBuilder extends OperationBuilder {
  private readonly partitions: string[] = [];
  private readonly order: OrderTerm[] = [];
  private frame: WindowFrame | null = null;
  private call: WindowCall | null = null;

  protected describe(): string {
    return 'window()';
  }

  partitionBy(...fields: string[]): this {
    this.assertOpen();
    this.partitions.push(...fields);
    return this;
  }

  orderBy(field: string, direction: SortDirection = 'asc'): this {
    this.assertOpen();
    this.order.push({ field, direction });
    return this;
  }

  /** Frame of rows relative to the current row; negative offsets look back. */
  rows(start: FrameBound, end: FrameBound): this {
    this.assertOpen();
    this.frame = { unit: 'rows', start, end };
    return this;
  }

  /** Frame of sort-key values relative to the current row's value. */
  range(start: FrameBound, end: FrameBound): this {
    this.assertOpen();
    this.frame = { unit: 'range', start, end };
    return this;
  }

  private fn(call: WindowCall): this {
    this.assertOpen();
    if (this.call !== null) {
      throw new CompilationError(
        `window() already computes ${this.call.fn}; start another window() for ${call.fn}`,
      );
    }
    this.call = call;
    return this;
  }

  rowNumber(alias = 'row_number'): this {
    return this.fn({ fn: 'row_number', field: null, alias, offset: 1, defaultValue: null });
  }

  rank(alias = 'rank'): this {
    return this.fn({ fn: 'rank', field: null, alias, offset: 1, defaultValue: null });
  }

  denseRank(alias = 'dense_rank'): this {
    return this.fn({ fn: 'dense_rank', field: null, alias, offset: 1, defaultValue: null });
  }

  sum(field: string, alias?: string): this {
    return this.moving('sum', field, alias);
  }

  avg(field: string, alias?: string): this {
    return this.moving('avg', field, alias);
  }

  min(field: string, alias?: string): this {
    return this.moving('min', field, alias);
  }

  max(field: string, alias?: string): this {
    return this.moving('max', field, alias);
  }

  lag(field: string, options: ShiftOptions = {}): this {
    return this.shift('lag', field, options);
  }

  lead(field: string, options: ShiftOptions = {}): this {
    return this.shift('lead', field, options);
  }

  private moving(fn: 'sum' | 'avg' | 'min' | 'max', field: string, alias?: string): this {
    return this.fn({ fn, field, alias: alias ?? defaultAlias(fn, field), offset: 1, defaultValue: null });
  }

  private shift(fn: 'lag' | 'lead', field: string, options: ShiftOptions): this {
    return this.fn({
      fn,
      field,
      alias: options.alias ?? defaultAlias(fn, field),
      offset: options.offset ?? 1,
      defaultValue: cloneUnknown(options.default ?? null),
    });
  }

  protected toSpec(): WindowSpec {
    if (this.call === null) {
      throw new CompilationError('window() needs a function such as rowNumber() or sum()');
    }
    const spec: WindowSpec = {
      kind: 'window',
      partitionBy: Object.freeze([...this.partitions]),
      orderBy: Object.freeze(this.order.map((term) => Object.freeze({ ...term }))),
      frame: this.frame === null ? null : Object.freeze({ ...this.frame }),
      fn: this.call.fn,
      field: this.call.field,
      alias: this.call.alias,
      offset: this.call.offset,
      defaultValue: this.call.defaultValue,
    };
    validateWindow(spec);
    return Object.freeze(spec);
  }
}
