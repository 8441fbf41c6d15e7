import { ConfigurationError } from './errors.js';
import { namespaceOf } from './namespace.js';
import type {
  ConstraintDefinition,
  ForeignKeyConstraint,
  UniqueConstraint,
} from './constraints/types.js';

/** Semantic field types; each has a zero value used to fill schemaless gaps. */
export type FieldType =
  | 'string'
  | 'binary_id'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'list'
  | 'map';

export type FieldMeta = Readonly<Record<string, FieldType>>;

export interface UniqueSpec {
  fields: readonly string[];
  name?: string;
}

export interface ForeignKeySpec {
  field: string;
  /** Namespace of the referenced documents, e.g. `'team'`. */
  target: string;
  name?: string;
}

export interface ConstraintSpec {
  unique?: ReadonlyArray<readonly string[] | UniqueSpec>;
  foreignKey?: readonly ForeignKeySpec[];
}

export interface SchemaDefinition {
  /** Type name, e.g. `'User'`. The namespace is derived from it. */
  name: string;
  /** Collection name, e.g. `'users'`. Prefixes uniqueness marker ids. */
  source: string;
  /** Query-facing primary key. Stored documents always key on `_id`. */
  primaryKey?: string;
  fields: Record<string, FieldType>;
  constraints?: ConstraintSpec;
}

/**
 * Schema as loaded once by defineSchema(). Frozen and shared read-only
 * by every engine call for the schema's lifetime.
 */
export interface Schema {
  readonly name: string;
  readonly source: string;
  readonly namespace: string;
  readonly primaryKey: string;
  readonly fields: FieldMeta;
  readonly fieldNames: readonly string[];
  readonly constraints: readonly ConstraintDefinition[];
}

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.]*$/;

/**
 * Validates a SchemaDefinition and resolves it into a Schema.
 * Throws ConfigurationError on any authoring mistake.
 */
export function defineSchema(def: SchemaDefinition): Schema {
  if (!NAME_PATTERN.test(def.name)) {
    throw new ConfigurationError(`defineSchema: name "${def.name}" is not a valid type name`);
  }
  if (def.source.trim() === '') {
    throw new ConfigurationError(`defineSchema: "${def.name}" must have a non-empty source`);
  }

  const primaryKey = def.primaryKey ?? '_id';
  const fieldNames = Object.keys(def.fields);
  const declared = new Set([...fieldNames, primaryKey, '_id']);
  const constraints: ConstraintDefinition[] = [];

  for (const spec of def.constraints?.unique ?? []) {
    const { fields, name } = isUniqueSpec(spec) ? spec : { fields: spec, name: undefined };
    if (fields.length === 0) {
      throw new ConfigurationError(`defineSchema: "${def.name}" declares a unique constraint with no fields`);
    }
    const missing = fields.filter((f) => !declared.has(f));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `defineSchema: unique constraint on "${def.name}" names undeclared fields: ${missing.join(', ')}`,
      );
    }
    const unique: UniqueConstraint = {
      kind: 'unique',
      name: name ?? `${fields.join('-')}-index`,
      fields: Object.freeze([...fields]),
      source: def.source,
    };
    constraints.push(Object.freeze(unique));
  }

  for (const fk of def.constraints?.foreignKey ?? []) {
    if (!declared.has(fk.field)) {
      throw new ConfigurationError(
        `defineSchema: foreign key on "${def.name}" names undeclared field "${fk.field}"`,
      );
    }
    const foreignKey: ForeignKeyConstraint = {
      kind: 'foreign_key',
      name: fk.name ?? `${def.source}_${fk.field}_fkey`,
      field: fk.field,
      target: fk.target,
      source: def.source,
    };
    constraints.push(Object.freeze(foreignKey));
  }

  return Object.freeze({
    name: def.name,
    source: def.source,
    namespace: namespaceOf(def),
    primaryKey,
    fields: Object.freeze({ ...def.fields }),
    fieldNames: Object.freeze(fieldNames),
    constraints: Object.freeze(constraints),
  });
}

function isUniqueSpec(spec: readonly string[] | UniqueSpec): spec is UniqueSpec {
  return !Array.isArray(spec);
}
