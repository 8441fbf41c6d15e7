import type { Logger } from 'pino';
import { ConstraintEngine } from './constraints/engine.js';
import type { ConstraintResult } from './constraints/types.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { qualify, unqualify } from './namespace.js';
import { compile, DEFAULT_SCAN_LIMIT } from './query/compiler.js';
import type { CompiledQuery, QueryDefinition } from './query/types.js';
import { project } from './result/projector.js';
import type { Schema } from './schema.js';
import type {
  AllDocsResponse,
  AllDocsRow,
  BulkInsertOutcome,
  DeleteAllResult,
  DocumentStore,
  Fields,
  FindRequest,
  FindResponse,
  ProjectionResult,
  RawDocument,
  ReturnedValues,
  StoreResponse,
  WriteResult,
} from './types.js';
import { DocumentWriter } from './writer/document-writer.js';

export interface RepositoryConfig {
  /** Caller-held store handle; the repository keeps no other state. */
  store: DocumentStore;
  logger?: Logger;
  /** Collection-scan limit when a query sets none. */
  defaultLimit?: number;
}

export interface ReadOptions {
  /** Per-field fallbacks used when rows are not typed. */
  defaults?: Readonly<Record<string, unknown>>;
  /** Fill absent fields with their type's zero value. Defaults to true. */
  typed?: boolean;
}

/**
 * Wires the query compiler, result projector, constraint engine and
 * document writer to one store handle.
 */
export class DocumentRepository {
  private readonly store: DocumentStore;
  private readonly log: Logger;
  private readonly defaultLimit: number;
  readonly constraints: ConstraintEngine;
  readonly writer: DocumentWriter;

  constructor(config: RepositoryConfig) {
    const logger = config.logger ?? createLogger();
    this.store = config.store;
    this.log = logger.child({ component: 'repository' });
    this.defaultLimit = config.defaultLimit ?? DEFAULT_SCAN_LIMIT;
    this.constraints = new ConstraintEngine({ store: config.store, logger });
    this.writer = new DocumentWriter({ store: config.store, constraints: this.constraints, logger });
  }

  /**
   * Runs a query and returns fixed-arity rows: the selected fields, or the
   * primary key followed by every schema field. Throws the ValidationError
   * when the query does not compile.
   */
  async all(
    schema: Schema,
    definition: QueryDefinition,
    params: readonly unknown[] = [],
    options: ReadOptions = {},
  ): Promise<ProjectionResult> {
    if (definition._namespace !== schema.namespace) {
      throw new ConfigurationError(
        `Query targets namespace "${definition._namespace}" but schema "${schema.name}" is "${schema.namespace}"`,
      );
    }

    const compiled = compile(definition, params);
    if (!compiled.ok) throw compiled.error;
    const directive = this.withDefaultLimit(compiled.query, definition);
    this.log.debug({ query: directive }, 'compiled query');

    const response = await this.execute(directive, schema.namespace);
    return this.shape(schema, response, definition._fields, options);
  }

  /** Sends one compiled directive to the store. */
  async execute(compiled: CompiledQuery, namespace: string): Promise<StoreResponse> {
    switch (compiled.kind) {
      case 'point_get':
        return this.store.get(compiled.id);
      case 'batch_get':
        return this.store.getMany(compiled.ids);
      case 'selector':
        return this.store.find({ selector: compiled.selector, ...compiled.options });
      case 'range_scan':
        return this.scanNamespace(compiled, namespace);
    }
  }

  /** Runs a Mango request as given, scoped to the schema's documents. */
  async find(schema: Schema, request: FindRequest): Promise<FindResponse> {
    return this.store.find({ ...request, selector: { ...request.selector, type: schema.namespace } });
  }

  async get(schema: Schema, id: string): Promise<RawDocument | null> {
    return this.store.get(qualify(schema.namespace, id));
  }

  validate(schema: Schema, newFields: Fields, prevFields?: Fields): Promise<ConstraintResult[]> {
    return this.constraints.validate(schema, newFields, prevFields);
  }

  insert(schema: Schema, fields: Fields, returning?: readonly string[]): Promise<ReturnedValues> {
    return this.writer.insert(schema, fields, returning);
  }

  update(schema: Schema, id: string, newFields: Fields, returning?: readonly string[]): Promise<ReturnedValues> {
    return this.writer.update(schema, id, newFields, returning);
  }

  bulkInsert(schema: Schema, items: readonly Fields[], returning?: readonly string[]): Promise<BulkInsertOutcome[]> {
    return this.writer.bulkInsert(schema, items, returning);
  }

  delete(schema: Schema, id: string): Promise<WriteResult> {
    return this.writer.delete(schema, id);
  }

  deleteAll(schema: Schema): Promise<DeleteAllResult> {
    return this.writer.deleteAll(schema);
  }

  /**
   * Marker ids such as `"note-x"` collate inside `[note, note/{}]`. Rows of
   * other types are dropped and the scan pages on from the last key seen
   * until `skip + limit` namespace rows are collected or the range ends.
   */
  private async scanNamespace(
    scan: Extract<CompiledQuery, { kind: 'range_scan' }>,
    namespace: string,
  ): Promise<AllDocsResponse> {
    const skip = scan.skip ?? 0;
    const wanted = skip + scan.limit;
    const kept: AllDocsRow[] = [];
    let startKey = scan.startKey;
    let resume = false;

    while (kept.length < wanted) {
      const limit = wanted - kept.length;
      const page = await this.store.rangeScan({
        startKey,
        endKey: scan.endKey,
        limit,
        descending: scan.descending,
        includeDocs: true,
        ...(resume ? { skip: 1 } : {}),
      });
      kept.push(...page.rows.filter((row) => row.doc?.type === namespace));

      const last = page.rows[page.rows.length - 1];
      if (last === undefined || page.rows.length < limit) break;
      startKey = last.id;
      resume = true;
    }

    return { offset: skip, rows: kept.slice(skip, wanted) };
  }

  private withDefaultLimit(compiled: CompiledQuery, definition: QueryDefinition): CompiledQuery {
    if (compiled.kind === 'range_scan' && definition._limit === null) {
      return { ...compiled, limit: this.defaultLimit };
    }
    return compiled;
  }

  private shape(
    schema: Schema,
    response: StoreResponse,
    selected: readonly string[] | null,
    options: ReadOptions,
  ): ProjectionResult {
    const fields = selected ?? [schema.primaryKey, ...schema.fieldNames.filter((f) => f !== schema.primaryKey)];
    // Documents key on _id only; a differently named primary key is read back from it.
    const backfill = schema.primaryKey !== '_id' ? fields.indexOf(schema.primaryKey) : -1;
    const requested = fields.map((f, i) => (i === backfill ? '_id' : f));

    const result =
      options.typed === false
        ? project(response, requested, undefined, options.defaults)
        : project(response, requested, schema.fields, options.defaults);

    if (backfill >= 0) {
      for (const row of result.rows) {
        const id = row[backfill];
        if (typeof id === 'string') row[backfill] = unqualify(schema.namespace, id);
      }
    }
    return result;
  }
}
