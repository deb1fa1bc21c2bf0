import type { DomainExpression, DomainTerm } from '../domain/types.js';
import { CompilationError, InvalidRangeError } from '../errors.js';
import type { ModelSchema } from '../model/schema.js';
import type { QueryRunner, RunOptions, TypedRecord } from '../types.js';
import { compileQuery } from './compiler.js';
import { AggregateBuilder, JoinBuilder, WindowBuilder } from './operation-builders.js';
import { cloneDomain } from './snapshot.js';
import type {
  CompiledQuery,
  OperationSpec,
  OrderTerm,
  QueryOptions,
  QuerySpecification,
  SortDirection,
} from './types.js';

function checkRange(parameter: 'limit' | 'offset', value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidRangeError(parameter, value);
  }
  return value;
}

/**
 * Fluent, mutable query builder. Every method returns the same instance.
 *
 * Accumulation rules differ per method:
 * - `filter` and `orderBy` accumulate: each call appends (filters are
 *   joined by implicit AND, the first `orderBy` is the primary key).
 * - `select`, `limit` and `offset` replace: the last call wins.
 *
 * `build()` returns a frozen snapshot that later calls cannot change.
 */
export class QueryBuilder {
  private readonly terms: DomainTerm[] = [];
  private readonly order: OrderTerm[] = [];
  private projection: readonly string[] | null = null;
  private limitValue: number | null = null;
  private offsetValue: number | null = null;
  private readonly operations: OperationSpec[] = [];
  private options: QueryOptions = {};
  private openOperation: string | null = null;
  private cached: { spec: QuerySpecification; compiled: CompiledQuery } | null = null;

  constructor(
    readonly model: ModelSchema,
    private readonly runner: QueryRunner | null = null,
  ) {}

  private touch(): this {
    this.cached = null;
    return this;
  }

  private assertNoOpenOperation(action: string): void {
    if (this.openOperation !== null) {
      throw new CompilationError(`Cannot ${action} while ${this.openOperation} is open; call end() first`);
    }
  }

  filter(domain: DomainExpression): this {
    this.terms.push(...domain);
    return this.touch();
  }

  orderBy(field: string, direction: SortDirection = 'asc'): this {
    this.order.push({ field, direction });
    return this.touch();
  }

  limit(n: number): this {
    this.limitValue = checkRange('limit', n);
    return this.touch();
  }

  offset(n: number): this {
    this.offsetValue = checkRange('offset', n);
    return this.touch();
  }

  select(...fields: string[]): this {
    this.projection = [...fields];
    return this.touch();
  }

  /** Lets the server spill large sorts and groups to disk. Pipeline queries only. */
  allowDiskUse(enabled = true): this {
    this.options = { ...this.options, allowDiskUse: enabled };
    return this.touch();
  }

  hint(index: string | Readonly<Record<string, 1 | -1>>): this {
    this.options = { ...this.options, hint: typeof index === 'string' ? index : { ...index } };
    return this.touch();
  }

  batchSize(size: number): this {
    if (!Number.isSafeInteger(size) || size < 1) {
      throw new CompilationError(`batchSize must be a positive integer, got ${size}`);
    }
    this.options = { ...this.options, batchSize: size };
    return this.touch();
  }

  private attach(kind: string): (operation: OperationSpec) => QueryBuilder {
    this.assertNoOpenOperation(`start ${kind}`);
    this.openOperation = kind;
    this.touch();
    return (operation) => {
      this.operations.push(operation);
      this.openOperation = null;
      return this.touch();
    };
  }

  groupBy(...fields: string[]): AggregateBuilder {
    return new AggregateBuilder([...fields], this.attach('groupBy()'));
  }

  join(collection: string): JoinBuilder {
    return new JoinBuilder(collection, this.attach(`join("${collection}")`));
  }

  window(): WindowBuilder {
    return new WindowBuilder(this.attach('window()'));
  }

  /**
   * Freezes the current state into a specification and compiles it, so
   * malformed domains, bad coercions and inconsistent operations fail here.
   */
  build(): QuerySpecification {
    return this.prepare().spec;
  }

  compile(): CompiledQuery {
    return this.prepare().compiled;
  }

  private prepare(): { spec: QuerySpecification; compiled: CompiledQuery } {
    this.assertNoOpenOperation('build');
    if (this.cached !== null) return this.cached;

    const spec: QuerySpecification = Object.freeze({
      target: Object.freeze({ collection: this.model.collection, model: this.model }),
      filter: cloneDomain(this.terms),
      projection: this.projection === null ? null : Object.freeze([...this.projection]),
      order: Object.freeze(this.order.map((term) => Object.freeze({ ...term }))),
      limit: this.limitValue,
      offset: this.offsetValue,
      operations: Object.freeze([...this.operations]),
      options: Object.freeze({ ...this.options }),
    });
    this.cached = { spec, compiled: compileQuery(spec) };
    return this.cached;
  }

  private boundRunner(): QueryRunner {
    if (this.runner === null) {
      throw new CompilationError('This query is not bound to an engine; use engine.from(model)');
    }
    return this.runner;
  }

  /** Streams mapped rows. Breaking out of the loop releases the connection. */
  execute(options: RunOptions = {}): AsyncGenerator<TypedRecord> {
    const runner = this.boundRunner();
    return runner.run(this.compile(), options);
  }

  async toArray(options: RunOptions = {}): Promise<TypedRecord[]> {
    const rows: TypedRecord[] = [];
    for await (const row of this.execute(options)) rows.push(row);
    return rows;
  }

  async first(options: RunOptions = {}): Promise<TypedRecord | null> {
    for await (const row of this.execute(options)) return row;
    return null;
  }

  /**
   * Whether the query yields at least one row. Plain queries are capped at
   * one document; the stream is closed after the first row either way.
   */
  async exists(options: RunOptions = {}): Promise<boolean> {
    const runner = this.boundRunner();
    const { spec, compiled } = this.prepare();
    const capped =
      spec.operations.length === 0 && (spec.limit === null || spec.limit > 1)
        ? compileQuery({ ...spec, limit: 1 })
        : compiled;
    const rows = runner.run(capped, options);
    const next = await rows.next();
    await rows.return(undefined);
    return next.done !== true;
  }

  /** Number of rows the query yields, counted by the server. */
  async count(options: RunOptions = {}): Promise<number> {
    const runner = this.boundRunner();
    const { spec } = this.prepare();
    const counted: QuerySpecification = {
      ...spec,
      projection: null,
      operations: [
        ...spec.operations,
        { kind: 'aggregate', groupBy: [], metrics: [{ fn: 'count', field: '*', alias: 'count' }], having: [] },
      ],
    };
    for await (const row of runner.run(compileQuery(counted), options)) {
      return typeof row['count'] === 'number' ? row['count'] : 0;
    }
    return 0;
  }
}
