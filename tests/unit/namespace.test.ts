import { describe, it, expect } from 'vitest';
import {
  decodeDocumentId,
  encodeDocumentId,
  namespaceOf,
  qualify,
  unqualify,
} from '../../src/namespace.js';

describe('namespaceOf', () => {
  it.each([
    ['User', 'user'],
    ['Users', 'user'],
    ['App.UserProfiles', 'user_profile'],
    ['HTTPRequest', 'http_request'],
    ['People', 'person'],
    ['Blog.Categories', 'category'],
  ])('%s -> %s', (name, expected) => {
    expect(namespaceOf({ name })).toBe(expected);
  });
});

describe('qualify / unqualify', () => {
  it('prefixes a local id', () => {
    expect(qualify('user', '42')).toBe('user/42');
  });

  it('is idempotent', () => {
    expect(qualify('user', qualify('user', '42'))).toBe('user/42');
  });

  it('prefixes ids that belong to another namespace', () => {
    expect(qualify('user', 'team/1')).toBe('user/team/1');
  });

  it('strips exactly one prefix', () => {
    expect(unqualify('user', 'user/42')).toBe('42');
    expect(unqualify('user', 'user/user/42')).toBe('user/42');
  });

  it('leaves foreign ids alone', () => {
    expect(unqualify('user', 'team/1')).toBe('team/1');
  });

  it('round-trips a local id through repeated qualification', () => {
    expect(unqualify('user', qualify('user', qualify('user', 'abc')))).toBe('abc');
  });
});

describe('encodeDocumentId / decodeDocumentId', () => {
  it('percent-encodes the namespace separator', () => {
    expect(encodeDocumentId('user/a b')).toBe('user%2Fa%20b');
  });

  it('decodes back to the raw id', () => {
    expect(decodeDocumentId('user%2Fa%20b')).toBe('user/a b');
  });
});
