import { describe, expect, it } from 'vitest';

import { createIdentifier, identifierSchema, isIdentifier } from './ids.js';

describe('ids', () => {
  it('trims identifiers and enforces grammar', () => {
    expect(identifierSchema.parse('  resource/gold ')).toBe('resource/gold');
    expect(identifierSchema.safeParse(' invalid id ').success).toBe(false);
    expect(identifierSchema.safeParse('-leading-dash').success).toBe(false);
    expect(identifierSchema.safeParse('').success).toBe(false);
  });

  it('preserves identifier casing', () => {
    expect(identifierSchema.parse('Gold')).toBe('Gold');
  });

  it('generates fresh identifiers that satisfy the shared grammar', () => {
    const first = createIdentifier();
    const second = createIdentifier();

    expect(first).not.toBe(second);
    expect(isIdentifier(first)).toBe(true);
    expect(isIdentifier(second)).toBe(true);
  });
});
