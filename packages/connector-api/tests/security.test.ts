import { describe, expect, it } from 'vitest';
import { MdmError } from '@mdm-mcp/core';
import { assertSecureConnection } from '../src/reltio/security.js';

function reasonOf(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err instanceof MdmError ? err.context?.['reason'] : err;
  }
  return undefined;
}

describe('assertSecureConnection', () => {
  it('accepts https urls without an Origin header', () => {
    expect(() => assertSecureConnection('https://dev.reltio.com/reltio/api/tenant1', {})).not.toThrow();
  });

  it('accepts an allow-listed Origin', () => {
    expect(() =>
      assertSecureConnection('https://dev.reltio.com/reltio/api/tenant1', { Origin: 'https://app.reltio.com' })
    ).not.toThrow();
  });

  it('rejects plain http with a generic message', () => {
    expect(() => assertSecureConnection('http://dev.reltio.com/reltio/api/tenant1', {})).toThrow(
      'Security requirements not met'
    );
    expect(reasonOf(() => assertSecureConnection('http://dev.reltio.com/x', {}))).toBe(
      'TLS is required for all connections'
    );
  });

  it('rejects an Origin outside the allow-list', () => {
    expect(
      reasonOf(() =>
        assertSecureConnection('https://dev.reltio.com/x', { Origin: 'https://evil.example' })
      )
    ).toBe('Origin https://evil.example is not allowed');
  });

  it('rejects a malformed url', () => {
    expect(reasonOf(() => assertSecureConnection('not a url', {}))).toBe('Malformed URL: not a url');
  });

  it('follows a custom policy', () => {
    expect(() =>
      assertSecureConnection('http://localhost:8080/reltio/api/tenant1', {}, {
        requireTls: false,
        allowedOrigins: [],
      })
    ).not.toThrow();
  });
});
