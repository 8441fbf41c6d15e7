import type { RawDocument } from '../types.js';

export interface DocumentRow {
  id: string;
  rev: string;
  body: Record<string, unknown>; // pg auto-parses JSONB
}

export function mapRow(row: DocumentRow): RawDocument {
  return {
    ...row.body,
    _id: row.id,
    _rev: row.rev,
  };
}
