import type { Document } from 'mongodb';
import type { CompiledArtifact } from '../../src/query/types.js';
import type { Connection, ConnectionPool, RunOptions } from '../../src/types.js';
import { evaluateArtifact } from './pipeline-evaluator.js';

export interface InMemoryPoolOptions {
  /** Fails the stream with this error after yielding `failAfter` documents. */
  failWith?: Error;
  failAfter?: number;
}

class InMemoryConnection implements Connection {
  constructor(private readonly pool: InMemoryPool) {}

  async *run(artifact: CompiledArtifact, options: RunOptions = {}): AsyncGenerator<Document> {
    this.pool.artifacts.push(artifact);
    const documents = evaluateArtifact(artifact, this.pool.collections);
    let yielded = 0;
    for (const document of documents) {
      if (this.pool.options.failWith !== undefined && yielded === (this.pool.options.failAfter ?? 0)) {
        throw this.pool.options.failWith;
      }
      options.signal?.throwIfAborted();
      yielded += 1;
      this.pool.yielded += 1;
      yield document;
    }
    if (this.pool.options.failWith !== undefined && yielded === (this.pool.options.failAfter ?? 0)) {
      throw this.pool.options.failWith;
    }
  }
}

/** ConnectionPool serving documents from memory, counting acquire/release calls. */
export class InMemoryPool implements ConnectionPool {
  acquired = 0;
  released = 0;
  yielded = 0;
  closed = false;
  readonly artifacts: CompiledArtifact[] = [];

  constructor(
    readonly collections: Record<string, Document[]>,
    readonly options: InMemoryPoolOptions = {},
  ) {}

  async acquire(): Promise<Connection> {
    this.acquired += 1;
    return new InMemoryConnection(this);
  }

  release(_connection: Connection): void {
    this.released += 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
