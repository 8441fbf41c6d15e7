export { PostgresDocumentStore, nextRevision } from './document-store.js';
export type { PostgresDocumentStoreConfig } from './document-store.js';
export { applySchema, ddlCreateTable, ddlCreateTypeIndex, ddlCreateGinIndex } from './schema.js';
