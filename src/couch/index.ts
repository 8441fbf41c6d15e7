export { CouchDocumentStore } from './couch-store.js';
export type { CouchDocumentStoreConfig } from './couch-store.js';
