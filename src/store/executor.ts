import type { Document } from 'mongodb';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { ExecutionError, QueryEngineError } from '../errors.js';
import type { CompiledArtifact } from '../query/types.js';
import type { Connection, ConnectionPool } from '../types.js';

export interface ExecuteOptions {
  logger: Logger;
  signal?: AbortSignal;
  /** Correlates the log lines of one execution. Generated when absent. */
  executionId?: string;
}

function wrap(err: unknown, collection: string, signal: AbortSignal | undefined): unknown {
  if (err instanceof QueryEngineError) return err;
  if (signal?.aborted && err === signal.reason) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ExecutionError(`Query on "${collection}" failed: ${detail}`, err);
}

/**
 * Streams the raw documents of `artifact` over one pooled connection.
 *
 * The connection is released exactly once on every exit path: completion,
 * failure, the consumer leaving the loop early, or `signal` aborting.
 * Backend failures surface as ExecutionError; nothing is retried.
 */
export async function* executeArtifact(
  artifact: CompiledArtifact,
  pool: ConnectionPool,
  options: ExecuteOptions,
): AsyncGenerator<Document> {
  const log = options.logger.child({
    executionId: options.executionId ?? uuidv4(),
    collection: artifact.collection,
  });
  options.signal?.throwIfAborted();

  let connection: Connection;
  try {
    connection = await pool.acquire();
  } catch (err) {
    log.error({ err }, 'failed to acquire connection');
    throw wrap(err, artifact.collection, options.signal);
  }

  const started = Date.now();
  let rows = 0;
  let settled = false;
  log.debug({ kind: artifact.kind }, 'query started');
  try {
    const runOptions = options.signal === undefined ? {} : { signal: options.signal };
    for await (const document of connection.run(artifact, runOptions)) {
      options.signal?.throwIfAborted();
      rows += 1;
      yield document;
    }
    settled = true;
    log.debug({ rows, durationMs: Date.now() - started }, 'query finished');
  } catch (err) {
    settled = true;
    log.error({ err, rows, durationMs: Date.now() - started }, 'query failed');
    throw wrap(err, artifact.collection, options.signal);
  } finally {
    if (!settled) log.debug({ rows }, 'query stopped before the end of the stream');
    try {
      await pool.release(connection);
    } catch (releaseErr) {
      log.error({ err: releaseErr }, 'failed to release connection');
    }
  }
}
