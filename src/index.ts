export { query } from './query/query-object.js';
export { QueryBuilder } from './query/builder.js';
export { param, eq, cmp, gt, lt, gte, lte, ne, isIn, and, or, isPlaceholder } from './query/predicate.js';
export { compile, DEFAULT_SCAN_LIMIT, RANGE_END_SENTINEL } from './query/compiler.js';
export type { CompileResult } from './query/compiler.js';
export type {
  Placeholder,
  ComparisonOperator,
  Predicate,
  OrderBy,
  QueryDefinition,
  SelectorOptions,
  CompiledQuery,
} from './query/types.js';

export { project, zeroValue } from './result/projector.js';

export { defineSchema } from './schema.js';
export type {
  FieldType,
  FieldMeta,
  UniqueSpec,
  ForeignKeySpec,
  ConstraintSpec,
  SchemaDefinition,
  Schema,
} from './schema.js';
export { namespaceOf, qualify, unqualify, encodeDocumentId, decodeDocumentId } from './namespace.js';

export { ConstraintEngine, collectViolations, markerIdFor } from './constraints/engine.js';
export type { ConstraintEngineConfig } from './constraints/engine.js';
export type {
  UniqueConstraint,
  ForeignKeyConstraint,
  ConstraintDefinition,
  ConstraintKind,
  ConstraintOk,
  ConstraintPending,
  ConstraintInvalid,
  ConstraintFailure,
  ConstraintResult,
  MarkerDocument,
} from './constraints/types.js';

export { DocumentWriter, DEFAULT_RETURNING } from './writer/document-writer.js';
export type { DocumentWriterConfig } from './writer/document-writer.js';
export { DocumentRepository } from './repository.js';
export type { RepositoryConfig, ReadOptions } from './repository.js';

export {
  ValidationError,
  ConstraintViolationError,
  NotFoundError,
  StoreError,
  ConfigurationError,
} from './errors.js';
export type { ValidationErrorCode } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';

export type {
  DocumentId,
  Fields,
  RawDocument,
  WriteResult,
  BulkWriteResult,
  AllDocsRow,
  AllDocsResponse,
  FindResponse,
  StoreErrorPayload,
  SortDirection,
  SortEntry,
  Selector,
  FindRequest,
  RangeScanRequest,
  DocumentStore,
  StoreResponse,
  ProjectionResult,
  ReturnedValues,
  BulkInsertOutcome,
  DeleteAllResult,
} from './types.js';
