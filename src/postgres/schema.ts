import type pg from 'pg';
import { ConfigurationError } from '../errors.js';

const IDENTIFIER = /^[a-z_][a-z0-9_]{0,62}$/;

export function assertTableName(table: string): string {
  if (!IDENTIFIER.test(table)) {
    throw new ConfigurationError(`Invalid table name "${table}"`);
  }
  return table;
}

// Ids collate bytewise ("C") so range scans order like the document store's raw collation.
export function ddlCreateTable(table: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${table} (
  id          TEXT COLLATE "C" PRIMARY KEY,
  rev         TEXT         NOT NULL,
  body        JSONB        NOT NULL,
  updated_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();
}

export function ddlCreateTypeIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_type
  ON ${table} ((body ->> 'type'))
`.trim();
}

export function ddlCreateGinIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_body_gin
  ON ${table} USING GIN (body jsonb_path_ops)
`.trim();
}

export async function applySchema(client: pg.ClientBase, table: string): Promise<void> {
  await client.query(ddlCreateTable(table));
  await client.query(ddlCreateTypeIndex(table));
  await client.query(ddlCreateGinIndex(table));
}
