export interface UniqueConstraint {
  readonly kind: 'unique';
  readonly name: string;
  readonly fields: readonly string[];
  /** Collection name used as the marker id prefix. */
  readonly source: string;
}

export interface ForeignKeyConstraint {
  readonly kind: 'foreign_key';
  readonly name: string;
  readonly field: string;
  /** Namespace of the referenced documents. */
  readonly target: string;
  readonly source: string;
}

export type ConstraintDefinition = UniqueConstraint | ForeignKeyConstraint;

export type ConstraintKind = ConstraintDefinition['kind'];

export interface ConstraintOk {
  readonly status: 'ok';
  readonly constraint: ConstraintDefinition;
}

/** Accepted only if the marker reservation that follows succeeds. */
export interface ConstraintPending {
  readonly status: 'ok_pending';
  readonly constraint: UniqueConstraint;
  readonly markerId: string;
}

export interface ConstraintInvalid {
  readonly status: 'invalid';
  readonly kind: ConstraintKind;
  readonly constraint: ConstraintDefinition;
  /** Marker id (unique) or referenced document id (foreign key). */
  readonly detail: string;
}

export interface ConstraintFailure {
  readonly status: 'error';
  readonly constraint: ConstraintDefinition;
  readonly reason: string;
}

export type ConstraintResult =
  | ConstraintOk
  | ConstraintPending
  | ConstraintInvalid
  | ConstraintFailure;

/** Document persisted at a marker id to hold a unique value. */
export interface MarkerDocument {
  _id: string;
  type: 'constraint';
  constraint: string;
  [key: string]: unknown;
}
