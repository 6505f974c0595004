import type { ProjectConfig, SchedulesConfig } from '../../config/project-config.schema';
import type { PageContent, TableGrid, TextToken } from '../../types/document';
import type {
  CountSnapshot,
  FixtureCategory,
  FixtureDefinition,
  ItemCounts,
  Sheet,
} from '../../types/takeoff';
import { countMatches, escapeRegExp } from '../../utils/regexp';
import { parseSheetCode } from '../sheet-classification.service';

const FIXTURE_TAG = /^(F\d+E?|X\d+)$/;

export interface ScheduleExtraction {
  counts: CountSnapshot;
  fixtureDefinitions: Record<string, FixtureDefinition>;
}

export const categorizeFixture = (tag: string, description: string): FixtureCategory => {
  const text = description.toUpperCase();
  if (tag.toUpperCase().startsWith('X')) return 'exit';
  if (text.includes('LAY-IN') || text.includes('LAY IN')) return 'lay-in';
  if (text.includes('STRIP')) return 'strip';
  if (text.includes('DOWN')) return 'downlight';
  if (text.includes('SURFACE')) return 'surface';
  if (text.includes('LINEAR')) return 'linear';
  if (text.includes('PENDANT')) return 'pendant';
  if (text.includes('VAPOR')) return 'vapor-tight';
  return 'general';
};

export const readFixtureDefinitions = (
  tables: readonly TableGrid[],
): Record<string, FixtureDefinition> => {
  const definitions: Record<string, FixtureDefinition> = {};
  for (const table of tables) {
    for (const row of table) {
      const [first, ...rest] = row;
      const tag = (first ?? '').trim().toUpperCase();
      if (!FIXTURE_TAG.test(tag)) {
        continue;
      }
      const description = rest
        .map((cell) => cell.trim())
        .filter(Boolean)
        .join(' ');
      definitions[tag] = { description, category: categorizeFixture(tag, description) };
    }
  }
  return definitions;
};

const countWord = (text: string, word: string) =>
  countMatches(text, new RegExp(`\\b${escapeRegExp(word)}\\b`, 'g'));

/** Breaker and safety-switch counts read off a panel schedule's text. */
export const readPanelSchedule = (text: string, schedules: SchedulesConfig): ItemCounts => {
  const counts: ItemCounts = {};
  for (const breaker of schedules.breakers) {
    const quantity = Math.min(
      Math.floor(countWord(text, breaker.token) / breaker.divisor),
      breaker.cap,
    );
    if (quantity > 0) {
      counts[breaker.itemKey] = quantity;
    }
  }

  const upper = text.toUpperCase();
  const { keywords, rules } = schedules.safetySwitches;
  if (keywords.some((keyword) => upper.includes(keyword.toUpperCase()))) {
    for (const rule of rules) {
      if (new RegExp(`\\b${rule.amps}\\s?A\\b`).test(upper)) {
        counts[rule.itemKey] = 1;
      }
    }
  }
  return counts;
};

/**
 * Groups positioned tokens into rows (by top edge) and cells (split on wide
 * horizontal gaps). Used when the document source supplies no table grid.
 */
export const tablesFromTokens = (
  tokens: readonly TextToken[],
  rowTolerance = 3,
  cellGap = 12,
): TableGrid[] => {
  const sorted = [...tokens].sort((a, b) => a.top - b.top || a.x0 - b.x0);
  const rows: TextToken[][] = [];
  for (const token of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(current[0].top - token.top) <= rowTolerance) {
      current.push(token);
    } else {
      rows.push([token]);
    }
  }

  const grid: TableGrid = rows.map((row) => {
    const ordered = [...row].sort((a, b) => a.x0 - b.x0);
    const cells: string[] = [];
    let previous: TextToken | null = null;
    for (const token of ordered) {
      if (previous && token.x0 - previous.x1 <= cellGap) {
        cells[cells.length - 1] = `${cells[cells.length - 1]} ${token.text}`;
      } else {
        cells.push(token.text);
      }
      previous = token;
    }
    return cells;
  });

  return grid.length > 0 ? [grid] : [];
};

export const extractScheduleSheet = (
  sheet: Sheet,
  page: PageContent,
  project: Pick<ProjectConfig, 'schedules'>,
): ScheduleExtraction => {
  const parsed = parseSheetCode(sheet.sheetCode);
  const { fixtureBlock, panelBlock } = project.schedules;
  if (!parsed) {
    return { counts: {}, fixtureDefinitions: {} };
  }
  if (parsed.number === fixtureBlock) {
    const tables = page.tables ?? tablesFromTokens(page.tokens);
    return { counts: {}, fixtureDefinitions: readFixtureDefinitions(tables) };
  }
  if (parsed.number === panelBlock) {
    const text = page.tokens.map((token) => token.text).join(' ');
    const panel = readPanelSchedule(text, project.schedules);
    return {
      counts: Object.keys(panel).length > 0 ? { panel } : {},
      fixtureDefinitions: {},
    };
  }
  return { counts: {}, fixtureDefinitions: {} };
};
