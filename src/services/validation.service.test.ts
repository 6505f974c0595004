import { describe, it, expect } from 'vitest';
import { createCategoryLookup } from '../config/reference';
import { compareItem, scoreAccuracy, summarizeValidation, validateQuantities } from './validation.service';

describe('compareItem', () => {
  it('scores an exact match', () => {
    expect(compareItem('Cat 6 Jack', 92, 92)).toEqual({
      item: 'Cat 6 Jack',
      expected: 92,
      actual: 92,
      difference: 0,
      accuracyPct: 100,
      status: 'exact',
    });
  });

  it('treats a difference of two as close', () => {
    const record = compareItem('Cat 6 Jack', 92, 90);
    expect(record.difference).toBe(-2);
    expect(record.accuracyPct).toBe(97.8);
    expect(record.status).toBe('close');
  });

  it('grades larger differences by accuracy', () => {
    expect(compareItem('F2', 100, 85).status).toBe('acceptable');
    expect(compareItem('F2', 23, 0)).toMatchObject({ difference: -23, accuracyPct: 0, status: 'miss' });
  });

  it('classifies on the unrounded accuracy', () => {
    // 1 - 457 / 2282 = 79.97%, shown as 80
    expect(compareItem('Poly Pull Line (ft)', 2282, 1825)).toMatchObject({
      difference: -457,
      accuracyPct: 80,
      status: 'miss',
    });
    expect(compareItem('Poly Pull Line (ft)', 2000, 1700).status).toBe('acceptable');
  });

  it('handles a zero reference quantity', () => {
    expect(compareItem('X1', 0, 0)).toMatchObject({ accuracyPct: 100, status: 'exact' });
    expect(compareItem('X1', 0, 5)).toMatchObject({ accuracyPct: 0, status: 'miss' });
    expect(scoreAccuracy(0, 1)).toBe(0);
  });

  it('returns frozen records', () => {
    expect(Object.isFrozen(compareItem('F2', 1, 1))).toBe(true);
  });
});

describe('validateQuantities', () => {
  it('covers items from either side in sorted order', () => {
    const records = validateQuantities({ F8: 5, F2: 3 }, { F2: 3, X1: 2 });
    expect(records.map((record) => [record.item, record.status])).toEqual([
      ['F2', 'exact'],
      ['F8', 'miss'],
      ['X1', 'close'],
    ]);
  });
});

describe('summarizeValidation', () => {
  it('tallies per category and overall', () => {
    const reference = { fixtures: { F2: 3, X1: 2 }, technology: { 'Cat 6 Jack': 92 } };
    const records = validateQuantities(
      { F2: 3, X1: 2, 'Cat 6 Jack': 60, 'Power Pack': 4 },
      { F2: 3, X1: 2, 'Cat 6 Jack': 92 },
    );
    const summary = summarizeValidation(records, createCategoryLookup(reference));

    expect(summary.categories).toEqual([
      { category: 'fixtures', total: 2, exact: 2, close: 0, acceptable: 0, miss: 0, accuracyPct: 100 },
      { category: 'technology', total: 1, exact: 0, close: 0, acceptable: 0, miss: 1, accuracyPct: 0 },
      { category: 'Unknown', total: 1, exact: 0, close: 0, acceptable: 0, miss: 1, accuracyPct: 0 },
    ]);
    expect(summary.overall).toEqual({
      total: 4,
      exact: 2,
      close: 0,
      acceptable: 0,
      miss: 2,
      accuracyPct: 50,
    });
  });

  it('reports zero accuracy for an empty comparison', () => {
    expect(summarizeValidation([], () => 'Unknown')).toEqual({
      categories: [],
      overall: { total: 0, exact: 0, close: 0, acceptable: 0, miss: 0, accuracyPct: 0 },
    });
  });
});
