import pluralize from 'pluralize';
import type { DocumentId } from './types.js';

/**
 * Derives the collection namespace from a type name: last dotted segment,
 * underscored, lowercased and singularized.
 *
 * @example
 * namespaceOf({ name: 'User' })          // 'user'
 * namespaceOf({ name: 'App.UserProfiles' }) // 'user_profile'
 */
export function namespaceOf(schema: { readonly name: string }): string {
  const segments = schema.name.split('.');
  const last = segments[segments.length - 1] ?? schema.name;
  return pluralize.singular(underscore(last));
}

function underscore(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
}

/** Prefixes `localId` with `"<namespace>/"` unless it already carries it. */
export function qualify(namespace: string, localId: string): DocumentId {
  const prefix = `${namespace}/`;
  return localId.startsWith(prefix) ? localId : `${prefix}${localId}`;
}

/** Strips a single leading `"<namespace>/"`, if present. */
export function unqualify(namespace: string, id: DocumentId): string {
  const prefix = `${namespace}/`;
  return id.startsWith(prefix) ? id.slice(prefix.length) : id;
}

// Store boundary only: everything above this layer works with unencoded ids.
export function encodeDocumentId(id: DocumentId): string {
  return encodeURIComponent(id);
}

export function decodeDocumentId(encoded: string): DocumentId {
  return decodeURIComponent(encoded);
}
