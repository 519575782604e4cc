/**
 * Thenable detection tests
 */

import { describe, it, expect } from 'vitest';
import { isPromiseLike } from '../src/index.js';

describe('isPromiseLike', () => {
  it('accepts promises and thenables', () => {
    expect(isPromiseLike(Promise.resolve())).toBe(true);
    expect(isPromiseLike({ then: () => undefined })).toBe(true);
  });

  it('rejects plain values', () => {
    expect(isPromiseLike(undefined)).toBe(false);
    expect(isPromiseLike(null)).toBe(false);
    expect(isPromiseLike({ then: 'later' })).toBe(false);
    expect(isPromiseLike(() => undefined)).toBe(false);
  });
});
