export { query } from './query/query-object.js';
export { QueryBuilder } from './query/builder.js';
export { AggregateBuilder, JoinBuilder, WindowBuilder } from './query/operation-builders.js';
export type { ShiftOptions } from './query/operation-builders.js';
export { compileQuery } from './query/compiler.js';
export type {
  AggregateSpec,
  CompiledArtifact,
  CompiledQuery,
  FrameBound,
  JoinKind,
  JoinSpec,
  Metric,
  MetricFunction,
  OperationSpec,
  OrderTerm,
  QueryOptions,
  QuerySpecification,
  SortDirection,
  WindowFrame,
  WindowFunction,
  WindowSpec,
} from './query/types.js';
export { normalizeDomain, toOperatorToken, toPrefix } from './domain/normalizer.js';
export type { NormalizeOptions } from './domain/normalizer.js';
export { compileDomain, likeToRegex } from './domain/compiler.js';
export { OPERATOR_TABLE, nativeOperator, assertOperatorApplies } from './domain/operators.js';
export type { BackendKind } from './domain/operators.js';
export { coerce, decoerce } from './domain/coercion.js';
export type { FieldValue } from './domain/coercion.js';
export type {
  Combinator,
  DomainExpression,
  DomainLeafTuple,
  DomainNode,
  DomainTerm,
  DomainValue,
  OperatorInput,
  OperatorToken,
} from './domain/types.js';
export { defineModel, resolveField } from './model/schema.js';
export type { FieldDefinition, FieldType, ModelSchema, ScalarFieldType } from './model/schema.js';
export { QueryEngine, createMongoEngine } from './store/query-engine.js';
export type { QueryEngineConfig } from './store/query-engine.js';
export { executeArtifact } from './store/executor.js';
export type { ExecuteOptions } from './store/executor.js';
export { mapDocument } from './store/result-mapper.js';
export { MongoConnection, MongoConnectionPool } from './store/mongo-pool.js';
export type { MongoPoolConfig } from './store/mongo-pool.js';
export { loadConfig } from './config.js';
export type { EngineConfig } from './config.js';
export { createLogger } from './logger.js';
export type { LogLevel } from './logger.js';
export type { Connection, ConnectionPool, QueryRunner, RunOptions, TypedRecord } from './types.js';
export {
  QueryEngineError,
  MalformedDomainError,
  UnsupportedOperatorError,
  InvalidRangeError,
  CompilationError,
  ExecutionError,
  MappingError,
  ConfigError,
} from './errors.js';
