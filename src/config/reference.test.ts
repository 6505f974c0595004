import { describe, it, expect } from 'vitest';
import { TakeoffError } from '../utils/takeoff-error';
import { createCategoryLookup, flattenReference, parseReferenceSet } from './reference';

describe('parseReferenceSet', () => {
  it('reads categories of item quantities', () => {
    expect(parseReferenceSet('fixtures:\n  F2: 40\n  X1: 6\ntechnology:\n  Cat 6 Jack: 92\n')).toEqual({
      fixtures: { F2: 40, X1: 6 },
      technology: { 'Cat 6 Jack': 92 },
    });
  });

  it('rejects negative quantities', () => {
    expect(() => parseReferenceSet('fixtures:\n  F2: -1\n')).toThrow(TakeoffError);
  });

  it('rejects flat item maps', () => {
    expect(() => parseReferenceSet('{"F2": 40}')).toThrow('Reference set must map categories to item quantities');
  });
});

describe('reference helpers', () => {
  const reference = { fixtures: { F2: 40 }, derived: { F2: 38, 'Power Pack': 12 } };

  it('flattens with later categories winning', () => {
    expect(flattenReference(reference)).toEqual({ F2: 38, 'Power Pack': 12 });
  });

  it('looks up categories by item', () => {
    const categoryOf = createCategoryLookup(reference);
    expect(categoryOf('Power Pack')).toBe('derived');
    expect(categoryOf('F2')).toBe('derived');
    expect(categoryOf('Canopy Kit')).toBe('Unknown');
  });
});
