import type { DedupRule } from '../config/project-config.schema';
import { COUNT_CATEGORIES, type CountCategory, type CountSnapshot, type ItemCounts } from '../types/takeoff';

/** Floor division by floor multiplicity; device families. */
export const dedupeFloorCount = (count: number, floors: number): number =>
  floors > 1 ? Math.floor(count / floors) : count;

/** Ceiling division by floor multiplicity; floor boxes. */
export const dedupeFloorBoxCount = (count: number, floors: number): number =>
  floors > 1 ? Math.floor((count + floors - 1) / floors) : count;

export const applyDedup = (count: number, rule: DedupRule, floors: number): number => {
  switch (rule) {
    case 'floor':
      return dedupeFloorCount(count, floors);
    case 'ceil':
      return dedupeFloorBoxCount(count, floors);
    case 'none':
      return count;
  }
};

/** Own entries only, so keys such as `constructor` read as zero. */
export const countOf = (counts: ItemCounts, key: string): number =>
  Object.hasOwn(counts, key) ? counts[key] : 0;

export const addCount = (counts: ItemCounts, key: string, amount: number): void => {
  counts[key] = countOf(counts, key) + amount;
};

export const sumCounts = (counts: ItemCounts | undefined, keys?: readonly string[]): number => {
  if (!counts) {
    return 0;
  }
  const selected = keys ?? Object.keys(counts);
  return selected.reduce((total, key) => total + countOf(counts, key), 0);
};

/** Drops zero entries; absent keys already read as zero. */
export const compactCounts = (counts: ItemCounts): ItemCounts =>
  Object.fromEntries(Object.entries(counts).filter(([, value]) => value > 0));

export const categorySnapshot = (category: CountCategory, counts: ItemCounts): CountSnapshot => {
  const snapshot: CountSnapshot = {};
  snapshot[category] = counts;
  return snapshot;
};

export const mergeCountSnapshots = (...snapshots: CountSnapshot[]): CountSnapshot => {
  const merged: CountSnapshot = {};
  for (const snapshot of snapshots) {
    for (const category of COUNT_CATEGORIES) {
      const items = snapshot[category];
      if (!items || Object.keys(items).length === 0) {
        continue;
      }
      const target = merged[category] ?? {};
      for (const [key, value] of Object.entries(items)) {
        addCount(target, key, value);
      }
      merged[category] = target;
    }
  }
  return merged;
};

/**
 * Item → quantity across every category. An item listed under two categories
 * is summed.
 */
export const flattenCounts = (snapshot: CountSnapshot): ItemCounts => {
  const flat: ItemCounts = {};
  for (const category of COUNT_CATEGORIES) {
    for (const [key, value] of Object.entries(snapshot[category] ?? {})) {
      addCount(flat, key, value);
    }
  }
  return flat;
};

export const isEmptySnapshot = (snapshot: CountSnapshot): boolean =>
  COUNT_CATEGORIES.every((category) => sumCounts(snapshot[category]) === 0);
