import type { Logger } from 'pino';
import { ConfigurationError, ConstraintViolationError, StoreError } from '../errors.js';
import { createLogger } from '../logger.js';
import { qualify } from '../namespace.js';
import type { Schema } from '../schema.js';
import type { DocumentStore, Fields } from '../types.js';
import type {
  ConstraintFailure,
  ConstraintInvalid,
  ConstraintPending,
  ConstraintResult,
  ForeignKeyConstraint,
  MarkerDocument,
  UniqueConstraint,
} from './types.js';

export interface ConstraintEngineConfig {
  store: DocumentStore;
  logger?: Logger;
}

/**
 * Emulates unique and foreign-key constraints on a store that has none.
 *
 * Uniqueness is held by a marker document at `"<source>-<values>"`. A write
 * is validated first, then its markers are reserved, then the caller writes
 * the document. The phases are not atomic: a failure after reservation
 * leaves an orphaned marker, which the next validation reports as taken.
 */
export class ConstraintEngine {
  private readonly store: DocumentStore;
  private readonly log: Logger;

  constructor(config: ConstraintEngineConfig) {
    this.store = config.store;
    this.log = (config.logger ?? createLogger()).child({ component: 'constraints' });
  }

  /**
   * Evaluates every declared constraint of `schema`, in declaration order.
   * `prevFields` is the stored state on update. Throws ConfigurationError
   * when a unique constraint's fields are only partly present.
   */
  async validate(schema: Schema, newFields: Fields, prevFields?: Fields): Promise<ConstraintResult[]> {
    const results: ConstraintResult[] = [];
    for (const constraint of schema.constraints) {
      results.push(
        constraint.kind === 'unique'
          ? await this.checkUnique(constraint, newFields, prevFields)
          : await this.checkForeignKey(constraint, newFields),
      );
    }
    return results;
  }

  /**
   * Validates, then reserves pending markers and returns their ids. Throws
   * ConstraintViolationError with every violated constraint, or StoreError
   * when a probe failed; nothing is persisted in either case.
   */
  async enforce(schema: Schema, newFields: Fields, prevFields?: Fields): Promise<string[]> {
    const results = await this.validate(schema, newFields, prevFields);

    const violations = collectViolations(results);
    if (violations.length > 0) {
      throw new ConstraintViolationError(violations);
    }

    const failures = results.filter((r): r is ConstraintFailure => r.status === 'error');
    if (failures.length > 0) {
      throw new StoreError(
        `Constraint probe failed: ${failures.map((f) => `${f.constraint.name}: ${f.reason}`).join('; ')}`,
        failures,
        'constraint_probe_failed',
      );
    }

    return this.reserve(results);
  }

  /**
   * Persists a marker document for every `ok_pending` result. A marker taken
   * by a concurrent writer turns into a unique violation; markers already
   * reserved by this call are released again.
   */
  async reserve(results: readonly ConstraintResult[]): Promise<string[]> {
    const pending = results.filter((r): r is ConstraintPending => r.status === 'ok_pending');
    const reserved: string[] = [];

    for (const result of pending) {
      const marker: MarkerDocument = {
        _id: result.markerId,
        type: 'constraint',
        constraint: result.constraint.name,
      };
      try {
        await this.store.put(result.markerId, marker);
      } catch (err) {
        await this.release(reserved);
        if (err instanceof StoreError && err.code === 'conflict') {
          throw new ConstraintViolationError([
            { status: 'invalid', kind: 'unique', constraint: result.constraint, detail: result.markerId },
          ]);
        }
        throw err;
      }
      reserved.push(result.markerId);
      this.log.debug({ markerId: result.markerId }, 'reserved uniqueness marker');
    }

    return reserved;
  }

  /**
   * Removes marker documents. Failures are logged, not thrown: the
   * document write they belong to has already happened.
   */
  async release(markerIds: readonly string[]): Promise<void> {
    for (const markerId of markerIds) {
      try {
        const marker = await this.store.get(markerId);
        if (marker?._rev !== undefined) {
          await this.store.remove(markerId, marker._rev);
        }
      } catch (err) {
        this.log.warn({ err, markerId }, 'failed to release uniqueness marker, leaving it orphaned');
      }
    }
  }

  /** Marker ids of every unique constraint fully present in `fields`. */
  markerIds(schema: Schema, fields: Fields): string[] {
    return uniqueConstraints(schema).flatMap((c) => {
      const id = tryMarkerId(c, fields);
      return id === null ? [] : [id];
    });
  }

  /** Markers held by `prevFields` that the merged update no longer holds. */
  staleMarkerIds(schema: Schema, prevFields: Fields, newFields: Fields): string[] {
    const merged = { ...prevFields, ...newFields };
    return uniqueConstraints(schema).flatMap((c) => {
      const previous = tryMarkerId(c, prevFields);
      return previous !== null && previous !== tryMarkerId(c, merged) ? [previous] : [];
    });
  }

  private async checkUnique(
    constraint: UniqueConstraint,
    newFields: Fields,
    prevFields?: Fields,
  ): Promise<ConstraintResult> {
    const current = prevFields === undefined ? newFields : { ...prevFields, ...newFields };
    const markerId = markerIdFor(constraint, current);

    // Unchanged key on update: the existing marker is this document's own.
    if (prevFields !== undefined && tryMarkerId(constraint, prevFields) === markerId) {
      return { status: 'ok', constraint };
    }

    let existing: unknown;
    try {
      existing = await this.store.get(markerId);
    } catch (err) {
      return probeFailure(constraint, err);
    }

    if (existing === null) {
      return { status: 'ok_pending', constraint, markerId };
    }
    return { status: 'invalid', kind: 'unique', constraint, detail: markerId };
  }

  private async checkForeignKey(constraint: ForeignKeyConstraint, newFields: Fields): Promise<ConstraintResult> {
    const value = newFields[constraint.field];
    if (!isPresent(value)) {
      return { status: 'ok', constraint };
    }

    const referencedId = qualify(constraint.target, markerPart(value));
    let existing: unknown;
    try {
      existing = await this.store.get(referencedId);
    } catch (err) {
      return probeFailure(constraint, err);
    }

    if (existing === null) {
      return { status: 'invalid', kind: 'foreign_key', constraint, detail: referencedId };
    }
    return { status: 'ok', constraint };
  }
}

export function collectViolations(results: readonly ConstraintResult[]): ConstraintInvalid[] {
  return results.filter((r): r is ConstraintInvalid => r.status === 'invalid');
}

/** A partial key cannot name one marker unambiguously. */
export function markerIdFor(constraint: UniqueConstraint, fields: Fields): string {
  const id = tryMarkerId(constraint, fields);
  if (id === null) {
    const missing = constraint.fields.filter((f) => !isPresent(fields[f]));
    throw new ConfigurationError(
      `Unique constraint "${constraint.name}" needs all of [${constraint.fields.join(', ')}]; missing ${missing.join(', ')}`,
    );
  }
  return id;
}

function tryMarkerId(constraint: UniqueConstraint, fields: Fields): string | null {
  const values = constraint.fields.map((f) => fields[f]);
  if (!values.every(isPresent)) return null;
  return `${constraint.source}-${values.map(markerPart).join('-')}`;
}

function uniqueConstraints(schema: Schema): UniqueConstraint[] {
  return schema.constraints.filter((c): c is UniqueConstraint => c.kind === 'unique');
}

function probeFailure(constraint: UniqueConstraint | ForeignKeyConstraint, err: unknown): ConstraintFailure {
  // Only a StoreError is a probe outcome; anything else is a bug and propagates.
  if (!(err instanceof StoreError)) throw err;
  return { status: 'error', constraint, reason: err.message };
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function markerPart(value: unknown): string {
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}
