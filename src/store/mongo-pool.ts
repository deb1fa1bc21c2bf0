import { MongoClient, type AbstractCursor, type Db, type Document } from 'mongodb';
import type { CompiledArtifact } from '../query/types.js';
import type { Connection, ConnectionPool, RunOptions } from '../types.js';

async function* drain<T extends Document>(
  cursor: AbstractCursor<T>,
  signal: AbortSignal | undefined,
): AsyncGenerator<Document> {
  try {
    for await (const document of cursor) {
      signal?.throwIfAborted();
      yield document;
    }
  } finally {
    await cursor.close();
  }
}

/** Session over one database. The driver pools sockets underneath. */
export class MongoConnection implements Connection {
  constructor(private readonly db: Db) {}

  run(artifact: CompiledArtifact, options: RunOptions = {}): AsyncGenerator<Document> {
    const collection = this.db.collection(artifact.collection);
    if (artifact.kind === 'find') {
      return drain(collection.find(artifact.filter, { ...artifact.options }), options.signal);
    }
    return drain(collection.aggregate([...artifact.pipeline], { ...artifact.options }), options.signal);
  }
}

export interface MongoPoolConfig {
  client: MongoClient;
  database: string;
}

/**
 * ConnectionPool over a MongoClient. Connections are cheap handles on
 * the client's own pool, so `release` has nothing to return.
 */
export class MongoConnectionPool implements ConnectionPool {
  private readonly client: MongoClient;
  private readonly database: string;
  private connected: Promise<MongoClient> | null = null;

  constructor(config: MongoPoolConfig) {
    this.client = config.client;
    this.database = config.database;
  }

  static fromUrl(url: string, database: string): MongoConnectionPool {
    return new MongoConnectionPool({ client: new MongoClient(url), database });
  }

  async acquire(): Promise<Connection> {
    this.connected ??= this.client.connect().catch((err: unknown) => {
      this.connected = null;
      throw err;
    });
    const client = await this.connected;
    return new MongoConnection(client.db(this.database));
  }

  release(_connection: Connection): void {}

  async close(): Promise<void> {
    this.connected = null;
    await this.client.close();
  }
}
