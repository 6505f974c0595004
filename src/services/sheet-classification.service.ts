import type { ClassifierConfig, ProjectConfig } from '../config/project-config.schema';
import type { PageContent, TextToken } from '../types/document';
import { type Sheet, type SheetRole, UNKNOWN_SHEET_CODE } from '../types/takeoff';

const SHEET_CODE_PATTERN = /\b([A-Z])(\d{3})\b/g;

type TitleBlockRegion = ClassifierConfig['titleBlock'];

export type SheetClassificationOptions = Pick<
  ProjectConfig,
  'sheetMap' | 'sheetTitles' | 'classifier'
>;

export interface ParsedSheetCode {
  prefix: string;
  number: number;
}

export const parseSheetCode = (code: string): ParsedSheetCode | null => {
  const match = /^([A-Z])(\d{3})$/.exec(code.trim().toUpperCase());
  if (!match) {
    return null;
  }
  return { prefix: match[1], number: Number(match[2]) };
};

/**
 * Role from the numeric block. Only the exact demolition block counts as
 * demolition; E101 and friends fall through to `reference`.
 */
export const classifySheetCode = (code: string, demolitionBlock = 100): SheetRole => {
  const parsed = parseSheetCode(code);
  if (!parsed) {
    return 'reference';
  }
  const { number } = parsed;
  if (number === demolitionBlock) {
    return 'demolition';
  }
  if (number >= 200 && number < 600) {
    return 'new_work';
  }
  if (number < 100) {
    return 'legend';
  }
  if (number >= 600 && number < 800) {
    return 'schedule';
  }
  return 'reference';
};

const inRegion = (token: TextToken, page: PageContent, region: TitleBlockRegion) => {
  const centerX = (token.x0 + token.x1) / 2;
  const centerY = (token.top + token.bottom) / 2;
  return centerX >= page.width * region.x0Fraction && centerY >= page.height * region.y0Fraction;
};

const searchRegion = (
  page: PageContent,
  region: TitleBlockRegion,
  prefixes: readonly string[],
): string | null => {
  const text = page.tokens
    .filter((token) => inRegion(token, page, region))
    .map((token) => token.text.toUpperCase())
    .join(' ');

  for (const match of text.matchAll(SHEET_CODE_PATTERN)) {
    if (prefixes.length === 0 || prefixes.includes(match[1])) {
      return match[0];
    }
  }
  return null;
};

/** Title-block search: primary corner region, then the widened one. */
export const findSheetCode = (page: PageContent, classifier: ClassifierConfig): string | null =>
  searchRegion(page, classifier.titleBlock, classifier.disciplinePrefixes) ??
  searchRegion(page, classifier.widenedTitleBlock, classifier.disciplinePrefixes);

const overrideFor = (pageIndex: number, sheetMap: Record<string, number>): string | null => {
  const entry = Object.entries(sheetMap).find(([, index]) => index === pageIndex);
  return entry ? entry[0] : null;
};

export const buildSheet = (
  pageIndex: number,
  sheetCode: string,
  options: SheetClassificationOptions,
): Sheet => ({
  pageIndex,
  sheetCode,
  role: classifySheetCode(sheetCode, options.classifier.demolitionBlock),
  title: options.sheetTitles[sheetCode] ?? '',
});

export const unknownSheet = (pageIndex: number): Sheet => ({
  pageIndex,
  sheetCode: UNKNOWN_SHEET_CODE,
  role: 'reference',
  title: '',
});

export const classifyPage = (page: PageContent, options: SheetClassificationOptions): Sheet => {
  const code = overrideFor(page.index, options.sheetMap) ?? findSheetCode(page, options.classifier);
  return code ? buildSheet(page.index, code, options) : unknownSheet(page.index);
};

/** Code → page index from title blocks. A later page repeating a code wins. */
export const detectSheetMap = (
  pages: readonly PageContent[],
  classifier: ClassifierConfig,
): Record<string, number> => {
  const detected: Record<string, number> = {};
  for (const page of pages) {
    const code = findSheetCode(page, classifier);
    if (code) {
      detected[code] = page.index;
    }
  }
  return detected;
};

export const mergeSheetMap = (
  manual: Record<string, number>,
  detected: Record<string, number>,
): Record<string, number> => ({ ...detected, ...manual });
