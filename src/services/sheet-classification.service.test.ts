import { describe, it, expect } from 'vitest';
import { defaultProjectConfig } from '../config/default-project-config';
import type { PageContent, TextToken } from '../types/document';
import {
  classifyPage,
  classifySheetCode,
  detectSheetMap,
  findSheetCode,
  mergeSheetMap,
  parseSheetCode,
} from './sheet-classification.service';

const token = (text: string, x0: number, top: number, width = 30, height = 10): TextToken => ({
  text,
  x0,
  x1: x0 + width,
  top,
  bottom: top + height,
});

const page = (index: number, tokens: TextToken[]): PageContent => ({
  index,
  width: 1000,
  height: 800,
  tokens,
});

const classifier = defaultProjectConfig.classifier;

describe('classifySheetCode', () => {
  it('maps numeric blocks to roles', () => {
    expect(classifySheetCode('E001')).toBe('legend');
    expect(classifySheetCode('E100')).toBe('demolition');
    expect(classifySheetCode('E200')).toBe('new_work');
    expect(classifySheetCode('T201')).toBe('new_work');
    expect(classifySheetCode('E600')).toBe('schedule');
    expect(classifySheetCode('E700')).toBe('schedule');
    expect(classifySheetCode('E800')).toBe('reference');
  });

  it('only treats the exact demolition block as demolition', () => {
    expect(classifySheetCode('E101')).toBe('reference');
    expect(classifySheetCode('E150', 150)).toBe('demolition');
  });

  it('falls back to reference for malformed codes', () => {
    expect(classifySheetCode('E20')).toBe('reference');
    expect(classifySheetCode('')).toBe('reference');
  });

  it('parses codes case-insensitively', () => {
    expect(parseSheetCode(' e201 ')).toEqual({ prefix: 'E', number: 201 });
    expect(parseSheetCode('EE201')).toBeNull();
  });
});

describe('findSheetCode', () => {
  it('reads the code from the title block corner', () => {
    const sheet = page(0, [token('E200', 120, 100), token('E201', 900, 760)]);
    expect(findSheetCode(sheet, classifier)).toBe('E201');
  });

  it('retries with the widened region', () => {
    // centre (765, 665): outside 800/680, inside 700/640
    const sheet = page(0, [token('T200', 750, 660)]);
    expect(findSheetCode(sheet, classifier)).toBe('T200');
  });

  it('honours discipline prefixes', () => {
    const sheet = page(0, [token('A101', 850, 700), token('E600', 900, 740)]);
    expect(findSheetCode(sheet, { ...classifier, disciplinePrefixes: ['E'] })).toBe('E600');
  });

  it('returns null when nothing matches', () => {
    expect(findSheetCode(page(0, [token('NOTES', 900, 760)]), classifier)).toBeNull();
  });
});

describe('classifyPage', () => {
  const options = {
    sheetMap: {},
    sheetTitles: { E200: 'Lighting Plan' },
    classifier,
  };

  it('builds the sheet from the title block', () => {
    const sheet = page(3, [token('E200', 900, 760)]);
    expect(classifyPage(sheet, options)).toEqual({
      pageIndex: 3,
      sheetCode: 'E200',
      role: 'new_work',
      title: 'Lighting Plan',
    });
  });

  it('is deterministic', () => {
    const sheet = page(0, [token('E100', 900, 760)]);
    expect(classifyPage(sheet, options)).toEqual(classifyPage(sheet, options));
  });

  it('prefers the sheet map override', () => {
    const sheet = page(2, [token('E200', 900, 760)]);
    expect(classifyPage(sheet, { ...options, sheetMap: { E700: 2 } }).sheetCode).toBe('E700');
  });

  it('returns the unknown placeholder when no code is found', () => {
    expect(classifyPage(page(5, []), options)).toEqual({
      pageIndex: 5,
      sheetCode: 'UNKNOWN',
      role: 'reference',
      title: '',
    });
  });
});

describe('sheet maps', () => {
  it('lets a later page win a duplicated code', () => {
    const pages = [
      page(0, [token('E200', 900, 760)]),
      page(1, [token('E201', 900, 760)]),
      page(2, [token('E200', 900, 760)]),
    ];
    expect(detectSheetMap(pages, classifier)).toEqual({ E200: 2, E201: 1 });
  });

  it('gives manual entries precedence', () => {
    expect(mergeSheetMap({ E200: 0 }, { E200: 2, E201: 1 })).toEqual({ E200: 0, E201: 1 });
  });
});
