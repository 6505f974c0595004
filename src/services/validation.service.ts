import type {
  CategoryValidationSummary,
  ValidationRecord,
  ValidationStatus,
  ValidationSummary,
  ValidationTally,
} from '../types/takeoff';

/** A difference of at most this many units still scores as `close`. */
export const CLOSE_TOLERANCE = 2;
export const ACCEPTABLE_ACCURACY_PCT = 80;

const roundToTenth = (value: number) => Math.round(value * 10) / 10;

const rawAccuracy = (expected: number, actual: number): number => {
  if (expected === 0) {
    return actual === 0 ? 100 : 0;
  }
  const difference = Math.abs(actual - expected);
  return Math.max(0, (1 - difference / expected) * 100);
};

/** Accuracy percentage as reported, to one decimal. */
export const scoreAccuracy = (expected: number, actual: number): number =>
  roundToTenth(rawAccuracy(expected, actual));

export const classifyStatus = (difference: number, accuracyPct: number): ValidationStatus => {
  if (difference === 0) return 'exact';
  if (Math.abs(difference) <= CLOSE_TOLERANCE) return 'close';
  if (accuracyPct >= ACCEPTABLE_ACCURACY_PCT) return 'acceptable';
  return 'miss';
};

export const compareItem = (item: string, expected: number, actual: number): ValidationRecord => {
  const difference = actual - expected;
  // status is decided on the unrounded value; 79.97% is still a miss
  const accuracy = rawAccuracy(expected, actual);
  return Object.freeze({
    item,
    expected,
    actual,
    difference,
    accuracyPct: roundToTenth(accuracy),
    status: classifyStatus(difference, accuracy),
  });
};

/**
 * One record per item on either side, sorted by item. An item only the
 * reference knows is scored against an actual of zero.
 */
export const validateQuantities = (
  generated: Record<string, number>,
  reference: Record<string, number>,
): ValidationRecord[] => {
  const items = Array.from(new Set([...Object.keys(generated), ...Object.keys(reference)])).sort();
  return items.map((item) => compareItem(item, reference[item] ?? 0, generated[item] ?? 0));
};

const tally = (records: readonly ValidationRecord[]): ValidationTally => {
  const counts = { exact: 0, close: 0, acceptable: 0, miss: 0 };
  for (const record of records) {
    counts[record.status] += 1;
  }
  const total = records.length;
  return {
    total,
    ...counts,
    accuracyPct: total > 0 ? roundToTenth(((counts.exact + counts.close) / total) * 100) : 0,
  };
};

export const summarizeValidation = (
  records: readonly ValidationRecord[],
  categoryOf: (item: string) => string,
): ValidationSummary => {
  const grouped = new Map<string, ValidationRecord[]>();
  for (const record of records) {
    const category = categoryOf(record.item);
    const bucket = grouped.get(category) ?? [];
    bucket.push(record);
    grouped.set(category, bucket);
  }

  const categories: CategoryValidationSummary[] = Array.from(grouped.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, bucket]) => ({ category, ...tally(bucket) }));

  return { categories, overall: tally(records) };
};
