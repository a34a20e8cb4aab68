import { describe, expect, it } from 'vitest';

import { truncate } from './http.js';

describe('truncate', () => {
  it('leaves text within the limit untouched', () => {
    expect(truncate('abcd', 4)).toBe('abcd');
  });

  it('cuts to the limit including the ellipsis', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
  });

  it('never splits a surrogate pair', () => {
    // 'ab😀c' is five UTF-16 units; the cut would land inside the emoji
    expect(truncate('ab😀c', 4)).toBe('ab…');
    expect(truncate('abc😀', 4)).toBe('abc…');
  });
});
