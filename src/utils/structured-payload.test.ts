import { describe, it, expect } from 'vitest';
import { deepMerge, parseStructuredPayload } from './structured-payload';
import { TakeoffError } from './takeoff-error';

describe('parseStructuredPayload', () => {
  it('reads YAML and JSON documents', () => {
    expect(parseStructuredPayload('floorCount: 3\n', 'INVALID_CONFIG', 'Config')).toEqual({
      floorCount: 3,
    });
    expect(parseStructuredPayload('{"floorCount": 1}', 'INVALID_CONFIG', 'Config')).toEqual({
      floorCount: 1,
    });
  });

  it('reads an empty document as an empty object', () => {
    expect(parseStructuredPayload('', 'INVALID_CONFIG', 'Config')).toEqual({});
  });

  it('rejects documents that are not key/value maps', () => {
    expect(() => parseStructuredPayload('- 1\n- 2\n', 'INVALID_REFERENCE', 'Reference')).toThrow(
      'Reference must be a key/value document',
    );
  });

  it('carries the error code', () => {
    try {
      parseStructuredPayload('a: [1, 2', 'INVALID_CONFIG', 'Config');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TakeoffError);
      expect(error instanceof TakeoffError && error.code).toBe('INVALID_CONFIG');
    }
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces lists', () => {
    const base = { ratios: { a: 1, b: 2 }, list: [1, 2], name: 'base' };
    expect(deepMerge(base, { ratios: { b: 3 }, list: [9], name: undefined })).toEqual({
      ratios: { a: 1, b: 3 },
      list: [9],
      name: 'base',
    });
    expect(base.ratios).toEqual({ a: 1, b: 2 });
  });
});
