import { describe, it, expect } from 'vitest';
import { parseBasicAuthHeader, safeCompare } from '../src/middleware/basic-auth.js';

const encode = (value: string): string => Buffer.from(value).toString('base64');

describe('parseBasicAuthHeader', () => {
  it('should decode username and password', () => {
    expect(parseBasicAuthHeader(`Basic ${encode('alice:s3cret')}`)).toEqual({
      username: 'alice',
      password: 's3cret',
    });
  });

  it('should keep colons in the password', () => {
    expect(parseBasicAuthHeader(`basic ${encode('alice:a:b:c')}`)).toEqual({
      username: 'alice',
      password: 'a:b:c',
    });
  });

  it('should reject other schemes and malformed payloads', () => {
    expect(parseBasicAuthHeader(undefined)).toBeNull();
    expect(parseBasicAuthHeader('Bearer token')).toBeNull();
    expect(parseBasicAuthHeader(`Basic ${encode('no-colon')}`)).toBeNull();
  });
});

describe('safeCompare', () => {
  it('should compare strings of any length', () => {
    expect(safeCompare('test-secret', 'test-secret')).toBe(true);
    expect(safeCompare('test-secret', 'test-secre')).toBe(false);
    expect(safeCompare('', 'test-secret')).toBe(false);
  });
});
