import type { Logger } from 'pino';
import { loadConfig, type EngineConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { ModelSchema } from '../model/schema.js';
import { QueryBuilder } from '../query/builder.js';
import type { CompiledQuery } from '../query/types.js';
import type { ConnectionPool, QueryRunner, RunOptions, TypedRecord } from '../types.js';
import { executeArtifact } from './executor.js';
import { MongoConnectionPool } from './mongo-pool.js';
import { mapDocument } from './result-mapper.js';

export interface QueryEngineConfig {
  pool: ConnectionPool;
  logger?: Logger;
  /** Applied to every builder created by {@link QueryEngine.from}. */
  batchSize?: number;
  allowDiskUse?: boolean;
}

export class QueryEngine implements QueryRunner {
  private readonly pool: ConnectionPool;
  private readonly logger: Logger;
  private readonly batchSize: number | undefined;
  private readonly allowDiskUse: boolean;

  constructor(config: QueryEngineConfig) {
    this.pool = config.pool;
    this.logger = config.logger ?? createLogger();
    this.batchSize = config.batchSize;
    this.allowDiskUse = config.allowDiskUse ?? false;
  }

  /** Builder bound to this engine, so `execute()`, `toArray()` and friends work. */
  from(model: ModelSchema): QueryBuilder {
    const builder = new QueryBuilder(model, this);
    if (this.batchSize !== undefined) builder.batchSize(this.batchSize);
    if (this.allowDiskUse) builder.allowDiskUse();
    return builder;
  }

  /**
   * Executes a compiled query and maps each document to the result model.
   * A MappingError ends the stream at the failing row; rows yielded before
   * it stay with the caller.
   */
  async *run(compiled: CompiledQuery, options: RunOptions = {}): AsyncGenerator<TypedRecord> {
    const documents = executeArtifact(compiled.artifact, this.pool, {
      logger: this.logger,
      ...(options.signal === undefined ? {} : { signal: options.signal }),
    });
    for await (const document of documents) {
      yield mapDocument(document, compiled.resultModel);
    }
  }

  async close(): Promise<void> {
    await this.pool.close?.();
  }
}

/** Engine over MongoDB built from {@link loadConfig} settings. */
export function createMongoEngine(config: EngineConfig = loadConfig(), logger?: Logger): QueryEngine {
  if (config.mongoUrl === null) {
    throw new ConfigError('DOCQUERY_MONGO_URL is required to connect to MongoDB');
  }
  return new QueryEngine({
    pool: MongoConnectionPool.fromUrl(config.mongoUrl, config.database),
    logger: logger ?? createLogger(config.logLevel),
    batchSize: config.batchSize,
    allowDiskUse: config.allowDiskUse,
  });
}
