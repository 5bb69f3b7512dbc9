import { describe, it, expect } from 'vitest';
import { fingerprint } from './fingerprint.js';

describe('fingerprint', () => {
  it('is stable and depends on dimensions and data', () => {
    const data = Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(fingerprint(2, 1, data)).toBe(fingerprint(2, 1, data));
    expect(fingerprint(2, 1, data)).not.toBe(fingerprint(1, 2, data));
    expect(fingerprint(2, 1, data)).not.toBe(fingerprint(2, 1, Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 9])));
    expect(typeof fingerprint(2, 1, data)).toBe('bigint');
  });
});
