import type { Document } from 'mongodb';
import type { FieldValue } from './domain/coercion.js';
import type { CompiledArtifact, CompiledQuery } from './query/types.js';

/** One mapped result row, built fresh per raw document. */
export type TypedRecord = Record<string, FieldValue>;

export interface RunOptions {
  /** Aborting stops the stream and releases the connection. */
  signal?: AbortSignal;
}

/** A backend session able to stream the raw documents of a compiled query. */
export interface Connection {
  run(artifact: CompiledArtifact, options?: RunOptions): AsyncIterable<Document>;
}

/**
 * Source of connections. Retry and timeout policy live here; the engine
 * acquires one connection per execution and always releases it.
 */
export interface ConnectionPool {
  acquire(): Promise<Connection>;
  release(connection: Connection): void | Promise<void>;
  close?(): Promise<void>;
}

/** What a bound {@link QueryBuilder} calls to run itself. */
export interface QueryRunner {
  run(compiled: CompiledQuery, options?: RunOptions): AsyncGenerator<TypedRecord>;
}
