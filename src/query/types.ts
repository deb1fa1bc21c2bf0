import type { Document } from 'mongodb';
import type { DomainExpression } from '../domain/types.js';
import type { ModelSchema } from '../model/schema.js';

export type SortDirection = 'asc' | 'desc';

export interface OrderTerm {
  readonly field: string;
  readonly direction: SortDirection;
}

export type MetricFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface Metric {
  readonly fn: MetricFunction;
  /** Source field, or `'*'` for `count` over rows. */
  readonly field: string;
  readonly alias: string;
}

export interface AggregateSpec {
  readonly kind: 'aggregate';
  readonly groupBy: readonly string[];
  readonly metrics: readonly Metric[];
  readonly having: DomainExpression;
}

export type JoinKind = 'inner' | 'left';

export interface JoinSpec {
  readonly kind: 'join';
  readonly collection: string;
  readonly localField: string;
  readonly foreignField: string;
  readonly joinKind: JoinKind;
  /** Joined-document fields to keep. Null keeps whole documents. */
  readonly select: readonly string[] | null;
  /** Output field holding the joined documents. Defaults to the collection name. */
  readonly as: string;
  /** Schema of the joined collection, used to type the joined rows. */
  readonly model: ModelSchema | null;
}

export type WindowFunction =
  | 'row_number'
  | 'rank'
  | 'dense_rank'
  | 'sum'
  | 'avg'
  | 'min'
  | 'max'
  | 'lag'
  | 'lead';

export type FrameBound = number | 'unbounded' | 'current';

export interface WindowFrame {
  readonly unit: 'rows' | 'range';
  readonly start: FrameBound;
  readonly end: FrameBound;
}

export interface WindowSpec {
  readonly kind: 'window';
  readonly partitionBy: readonly string[];
  readonly orderBy: readonly OrderTerm[];
  readonly frame: WindowFrame | null;
  readonly fn: WindowFunction;
  /** Source field; ignored by `row_number`, `rank` and `dense_rank`. */
  readonly field: string | null;
  readonly alias: string;
  /** Row distance for `lag`/`lead`. */
  readonly offset: number;
  /** Value used by `lag`/`lead` past the partition edge. */
  readonly defaultValue: unknown;
}

export type OperationSpec = AggregateSpec | JoinSpec | WindowSpec;

export interface QueryOptions {
  readonly allowDiskUse?: boolean;
  readonly hint?: string | Readonly<Record<string, 1 | -1>>;
  readonly batchSize?: number;
}

/**
 * Immutable snapshot of a query. Produced by {@link QueryBuilder.build};
 * later builder calls do not affect it.
 */
export interface QuerySpecification {
  readonly target: { readonly collection: string; readonly model: ModelSchema };
  readonly filter: DomainExpression;
  readonly projection: readonly string[] | null;
  readonly order: readonly OrderTerm[];
  readonly limit: number | null;
  readonly offset: number | null;
  readonly operations: readonly OperationSpec[];
  readonly options: QueryOptions;
}

export interface FindOptions {
  projection?: Document;
  sort?: Document;
  skip?: number;
  limit?: number;
  hint?: string | Document;
  batchSize?: number;
}

export interface AggregateOptions {
  allowDiskUse?: boolean;
  hint?: string | Document;
  batchSize?: number;
}

export type CompiledArtifact =
  | {
      readonly kind: 'find';
      readonly collection: string;
      readonly filter: Document;
      readonly options: FindOptions;
    }
  | {
      readonly kind: 'aggregate';
      readonly collection: string;
      readonly pipeline: Document[];
      readonly options: AggregateOptions;
    };

export interface CompiledQuery {
  readonly artifact: CompiledArtifact;
  /** Shape of the rows the artifact produces, consumed by the result mapper. */
  readonly resultModel: ModelSchema;
}
