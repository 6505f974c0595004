import type {
  DedupRule,
  PatternSet,
  ProjectConfig,
  TagPattern,
} from '../../config/project-config.schema';
import type { PageContent, TextToken } from '../../types/document';
import type { CountSnapshot, ItemCounts, Sheet, TagMatch } from '../../types/takeoff';
import {
  addCount,
  applyDedup,
  categorySnapshot,
  compactCounts,
  countOf,
  mergeCountSnapshots,
  sumCounts,
} from '../../utils/count-snapshot';
import { countMatches, escapeRegExp } from '../../utils/regexp';

export type ExtractionOptions = Pick<
  ProjectConfig,
  'patternSets' | 'floorCount' | 'ratios' | 'demoKeynotes' | 'keynote'
>;

export interface PatternSetResult {
  name: string;
  counts: ItemCounts;
  matches: TagMatch[];
  usedFallback: boolean;
}

export interface SheetExtraction {
  counts: CountSnapshot;
  matches: TagMatch[];
  results: PatternSetResult[];
}

interface RawTally {
  counts: ItemCounts;
  dedup: Map<string, DedupRule>;
  matches: TagMatch[];
}

const tokenWidth = (token: TextToken) => token.x1 - token.x0;

const withinWidth = (token: TextToken, maxWidth: number | undefined) =>
  maxWidth === undefined || tokenWidth(token) < maxWidth;

const byTokenLength = (a: TagPattern, b: TagPattern) => b.token.length - a.token.length;

export const patternSetApplies = (set: PatternSet, sheet: Sheet): boolean => {
  const { roles, prefixes, sheetCodes } = set.appliesTo;
  if (!roles.includes(sheet.role)) {
    return false;
  }
  if (prefixes && !prefixes.includes(sheet.sheetCode.charAt(0))) {
    return false;
  }
  return !sheetCodes || sheetCodes.includes(sheet.sheetCode);
};

/** Drops tokens whose left or top edge lies in the trailing title-block/notes band. */
export const inDrawingArea = (
  token: TextToken,
  page: Pick<PageContent, 'width' | 'height'>,
  region: PatternSet['region'],
): boolean =>
  token.x0 <= page.width * region.maxXFraction && token.top <= page.height * region.maxYFraction;

/**
 * Scans text for every doubled tag. The alternation is ordered longest first so
 * `FF44EE` resolves to its own pattern and never to `FF44`.
 */
export const compileDoubledMatcher = (patterns: readonly TagPattern[]) => {
  const ordered = [...patterns].sort(byTokenLength);
  const byToken = new Map(ordered.map((pattern) => [pattern.token.toUpperCase(), pattern]));
  if (ordered.length === 0) {
    return (): TagPattern[] => [];
  }
  const expression = new RegExp(ordered.map((pattern) => escapeRegExp(pattern.token)).join('|'), 'gi');

  return (text: string): TagPattern[] => {
    const found: TagPattern[] = [];
    for (const match of text.matchAll(expression)) {
      const pattern = byToken.get(match[0].toUpperCase());
      if (pattern) {
        found.push(pattern);
      }
    }
    return found;
  };
};

export const plainTokenMatches = (text: string, pattern: TagPattern): boolean => {
  const token = pattern.token.toUpperCase();
  if (text === token) {
    return true;
  }
  return (
    pattern.numericSuffix === true &&
    text.length === token.length + 1 &&
    text.startsWith(token) &&
    /\d$/.test(text)
  );
};

export const matchPlainToken = (
  token: TextToken,
  patterns: readonly TagPattern[],
): TagPattern | null => {
  const text = token.text.trim().toUpperCase();
  return (
    patterns.find(
      (pattern) => plainTokenMatches(text, pattern) && withinWidth(token, pattern.maxWidth),
    ) ?? null
  );
};

const record = (
  tally: RawTally,
  set: PatternSet,
  rawToken: string,
  itemKey: string,
  weight: number,
  dedup: DedupRule,
) => {
  addCount(tally.counts, itemKey, weight);
  if (!tally.dedup.has(itemKey)) {
    tally.dedup.set(itemKey, dedup);
  }
  tally.matches.push({
    rawToken,
    resolvedCategory: set.category,
    itemKey,
    pageRegion: 'drawing',
    weight,
  });
};

const tallyDoubled = (set: PatternSet, tokens: readonly TextToken[], tally: RawTally) => {
  const scan = compileDoubledMatcher(set.patterns);
  for (const token of tokens) {
    for (const pattern of scan(token.text)) {
      if (!withinWidth(token, pattern.maxWidth)) {
        continue;
      }
      record(
        tally,
        set,
        token.text,
        pattern.itemKey,
        pattern.weight ?? 1,
        pattern.dedup ?? set.dedup,
      );
    }
  }
};

const tallyPlain = (
  set: PatternSet,
  tokens: readonly TextToken[],
  tally: RawTally,
  options: ExtractionOptions,
) => {
  const ordered = [...set.patterns].sort(byTokenLength);
  for (const token of tokens) {
    const pattern = matchPlainToken(token, ordered);
    if (pattern) {
      record(
        tally,
        set,
        token.text,
        pattern.itemKey,
        pattern.weight ?? 1,
        pattern.dedup ?? set.dedup,
      );
      continue;
    }
    if (!set.resolveKeynotes) {
      continue;
    }
    // whole-token equality plus width keeps dimension strings out
    const digits = token.text.trim();
    if (!Object.hasOwn(options.demoKeynotes, digits)) {
      continue;
    }
    if (tokenWidth(token) < options.keynote.maxTokenWidth) {
      record(tally, set, token.text, options.demoKeynotes[digits], 1, set.dedup);
    }
  }
};

const applySplits = (set: PatternSet, counts: ItemCounts, options: ExtractionOptions) => {
  for (const split of set.splits ?? []) {
    const total = counts[split.sourceKey] ?? 0;
    delete counts[split.sourceKey];
    const primary = Math.floor(total * options.ratios[split.ratioName]);
    addCount(counts, split.primaryKey, primary);
    addCount(counts, split.remainderKey, total - primary);
  }
};

/**
 * Spreads a source total over size variants when the sheet carries no explicit
 * variant tags. Each share is at least `minimum`; the last key takes what is left.
 */
const applyDistributions = (set: PatternSet, counts: ItemCounts, floors: number) => {
  for (const distribution of set.distributions ?? []) {
    const targets = [...Object.keys(distribution.shares), distribution.remainderKey];
    if (targets.some((key) => (counts[key] ?? 0) > 0)) {
      continue;
    }
    const source = applyDedup(counts[distribution.sourceKey] ?? 0, distribution.dedup, floors);
    const total = Math.floor(source * distribution.multiplier);
    if (total <= 0) {
      continue;
    }
    let assigned = 0;
    for (const [key, share] of Object.entries(distribution.shares)) {
      const quantity = Math.max(distribution.minimum, Math.floor(total * share));
      addCount(counts, key, quantity);
      assigned += quantity;
    }
    addCount(
      counts,
      distribution.remainderKey,
      Math.max(distribution.minimum, total - assigned),
    );
  }
};

const applyFloorBoxJacks = (
  set: PatternSet,
  tokens: readonly TextToken[],
  counts: ItemCounts,
  floors: number,
) => {
  const companion = set.floorBoxJacks;
  if (!companion) {
    return;
  }
  const boxToken = companion.token.toUpperCase();
  const raw = tokens.filter((token) => token.text.trim().toUpperCase() === boxToken).length;
  const boxes = Math.floor((raw * companion.dataShare) / Math.max(1, floors));
  addCount(counts, companion.itemKey, boxes * companion.jacksPerBox);
};

const sheetText = (page: PageContent) => page.tokens.map((token) => token.text).join(' ');

/**
 * Duplex receptacles from circuit-number references anywhere on the sheet,
 * raised to the configured minimum; GFI receptacles follow from the duplex
 * total. A sheet without references contributes nothing.
 */
const applyCircuitReceptacles = (
  set: PatternSet,
  page: PageContent,
  counts: ItemCounts,
  matches: TagMatch[],
  options: ExtractionOptions,
) => {
  const rule = set.circuitReceptacles;
  if (!rule) {
    return;
  }
  const references = countMatches(sheetText(page), new RegExp(rule.pattern, 'g'));
  if (references === 0) {
    return;
  }
  const duplex = Math.max(references, rule.minimum);
  addCount(counts, rule.itemKey, duplex);
  matches.push({
    rawToken: rule.pattern,
    resolvedCategory: set.category,
    itemKey: rule.itemKey,
    pageRegion: 'full_text',
    weight: duplex,
  });
  const gfi = Math.max(Math.floor(duplex / options.ratios.receptaclesPerGfi), rule.gfi.minimum);
  counts[rule.gfi.itemKey] = Math.max(countOf(counts, rule.gfi.itemKey), gfi);
};

/** Floors for items the drawing never tags, once the set found anything. */
const applyAllowances = (set: PatternSet, counts: ItemCounts) => {
  if (!set.allowances || sumCounts(counts) === 0) {
    return;
  }
  for (const [key, minimum] of Object.entries(set.allowances)) {
    counts[key] = Math.max(countOf(counts, key), minimum);
  }
};

const keynotePattern = (digits: string) =>
  new RegExp(`(?<![0-9])${escapeRegExp(digits)}(?![0-9])`, 'g');

/**
 * Low-confidence path for demolition sheets: isolated digit occurrences in the
 * sheet's full text, divided by floors and the overcounting factor. Pattern
 * counts (floor boxes) are kept.
 */
const applyKeynoteFallback = (
  set: PatternSet,
  page: PageContent,
  counts: ItemCounts,
  matches: TagMatch[],
  options: ExtractionOptions,
) => {
  const keynoteItems = new Set(Object.values(options.demoKeynotes));
  for (const item of keynoteItems) {
    delete counts[item];
  }
  const kept = matches.filter((match) => !keynoteItems.has(match.itemKey));
  matches.length = 0;
  matches.push(...kept);

  const fullText = sheetText(page);
  const divisor = Math.max(1, options.floorCount * options.keynote.overcountFactor);
  for (const [digits, item] of Object.entries(options.demoKeynotes)) {
    const occurrences = countMatches(fullText, keynotePattern(digits));
    const quantity = Math.floor(occurrences / divisor);
    if (quantity > 0) {
      addCount(counts, item, quantity);
      matches.push({
        rawToken: digits,
        resolvedCategory: set.category,
        itemKey: item,
        pageRegion: 'full_text',
        weight: quantity,
      });
    }
  }
};

export const extractPatternSet = (
  set: PatternSet,
  page: PageContent,
  options: ExtractionOptions,
): PatternSetResult => {
  const floors = options.floorCount;
  const tokens = page.tokens.filter((token) => inDrawingArea(token, page, set.region));
  const tally: RawTally = { counts: {}, dedup: new Map(), matches: [] };

  if (set.encoding === 'doubled') {
    tallyDoubled(set, tokens, tally);
  } else {
    tallyPlain(set, tokens, tally, options);
  }

  const counts: ItemCounts = {};
  for (const [key, raw] of Object.entries(tally.counts)) {
    counts[key] = applyDedup(raw, tally.dedup.get(key) ?? set.dedup, floors);
  }

  applyFloorBoxJacks(set, tokens, counts, floors);
  applySplits(set, counts, options);
  applyDistributions(set, counts, floors);
  applyCircuitReceptacles(set, page, counts, tally.matches, options);
  applyAllowances(set, counts);

  let usedFallback = false;
  if (set.resolveKeynotes && sumCounts(counts) < options.keynote.fallbackThreshold) {
    applyKeynoteFallback(set, page, counts, tally.matches, options);
    usedFallback = true;
  }

  return {
    name: set.name,
    counts: compactCounts(counts),
    matches: tally.matches,
    usedFallback,
  };
};

/** Runs every pattern set that applies to the sheet. Inert sheets yield `{}`. */
export const extractSheet = (
  sheet: Sheet,
  page: PageContent,
  options: ExtractionOptions,
): SheetExtraction => {
  const results = options.patternSets
    .filter((set) => patternSetApplies(set, sheet))
    .map((set) => ({ set, result: extractPatternSet(set, page, options) }));

  const counts = mergeCountSnapshots(
    ...results.map(({ set, result }) => categorySnapshot(set.category, result.counts)),
  );

  return {
    counts,
    matches: results.flatMap(({ result }) => result.matches),
    results: results.map(({ result }) => result),
  };
};

export const extractCounts = (
  sheet: Sheet,
  page: PageContent,
  options: ExtractionOptions,
): CountSnapshot => extractSheet(sheet, page, options).counts;
