import { describe, it, expect } from 'vitest';
import { canonicalJson, fingerprint } from '../../src/utils/fingerprint.js';

describe('fingerprint', () => {
  it('should be a 64-character hex digest', () => {
    expect(fingerprint('claim text')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore surrounding whitespace', () => {
    expect(fingerprint('  claim text\n')).toBe(fingerprint('claim text'));
  });

  it('should treat composed and decomposed characters alike', () => {
    expect(fingerprint('caf\u00e9')).toBe(fingerprint('cafe\u0301'));
  });

  it('should separate texts that differ only in scoring inputs', () => {
    const low = fingerprint('same text', { claimAmount: 100 });
    const high = fingerprint('same text', { claimAmount: 90_000 });
    expect(low).not.toBe(high);
  });

  it('should not depend on key order', () => {
    expect(fingerprint('x', { claimAmount: 1, previousClaims: 2 })).toBe(
      fingerprint('x', { previousClaims: 2, claimAmount: 1 })
    );
  });

  it('should match the bare text when every extra value is undefined', () => {
    expect(fingerprint('x', { claimAmount: undefined })).toBe(fingerprint('x'));
  });
});

describe('canonicalJson', () => {
  it('should sort keys at every depth and drop undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, 1], c: undefined, e: null } })).toBe(
      '{"a":{"d":[2,1],"e":null},"b":1}'
    );
  });
});
