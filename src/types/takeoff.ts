export type SheetRole = 'legend' | 'demolition' | 'new_work' | 'schedule' | 'reference';

export const UNKNOWN_SHEET_CODE = 'UNKNOWN';

export interface Sheet {
  pageIndex: number;
  sheetCode: string;
  role: SheetRole;
  title: string;
}

export const COUNT_CATEGORIES = [
  'fixtures',
  'controls',
  'power',
  'demo',
  'technology',
  'panel',
] as const;

export type CountCategory = (typeof COUNT_CATEGORIES)[number];

export type ItemCounts = Record<string, number>;

/**
 * Category → item key → non-negative integer count. Absent keys are zero.
 */
export type CountSnapshot = Partial<Record<CountCategory, ItemCounts>>;

/** Size class (e.g. `3/4"`) → length in feet. */
export type LengthSnapshot = Record<string, number>;

/** Derived material name → integer quantity. */
export type DerivedSnapshot = Record<string, number>;

export interface TagMatch {
  rawToken: string;
  resolvedCategory: CountCategory;
  itemKey: string;
  pageRegion: 'drawing' | 'full_text';
  weight: number;
}

export type ValidationStatus = 'exact' | 'close' | 'acceptable' | 'miss';

export interface ValidationRecord {
  readonly item: string;
  readonly expected: number;
  readonly actual: number;
  readonly difference: number;
  readonly accuracyPct: number;
  readonly status: ValidationStatus;
}

export interface ValidationTally {
  total: number;
  exact: number;
  close: number;
  acceptable: number;
  miss: number;
  accuracyPct: number;
}

export interface CategoryValidationSummary extends ValidationTally {
  category: string;
}

export interface ValidationSummary {
  categories: CategoryValidationSummary[];
  overall: ValidationTally;
}

export type ConduitMethod = 'reference' | 'vector' | 'device' | 'none';

export interface ConduitResolution {
  method: ConduitMethod;
  lengths: LengthSnapshot;
}

export const FIXTURE_CATEGORIES = [
  'exit',
  'lay-in',
  'strip',
  'downlight',
  'surface',
  'linear',
  'pendant',
  'vapor-tight',
  'general',
] as const;

export type FixtureCategory = (typeof FIXTURE_CATEGORIES)[number];

export interface FixtureDefinition {
  description: string;
  category: FixtureCategory;
}
