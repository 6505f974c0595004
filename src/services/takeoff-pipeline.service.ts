import { defaultProjectConfig } from '../config/default-project-config';
import type { ProjectConfig } from '../config/project-config.schema';
import { createCategoryLookup, flattenReference, type ReferenceSet } from '../config/reference';
import type { DocumentSource, PageContent, PageImage } from '../types/document';
import {
  type ConduitResolution,
  type CountSnapshot,
  type DerivedSnapshot,
  type FixtureDefinition,
  type ItemCounts,
  type LengthSnapshot,
  type Sheet,
  UNKNOWN_SHEET_CODE,
  type ValidationRecord,
  type ValidationSummary,
} from '../types/takeoff';
import {
  addCount,
  flattenCounts,
  isEmptySnapshot,
  mergeCountSnapshots,
} from '../utils/count-snapshot';
import { createScopedLogger } from '../utils/logger';
import { describeError } from '../utils/takeoff-error';
import { extractScheduleSheet } from './extraction/schedule-extraction.service';
import { extractSheet } from './extraction/tag-extraction.service';
import {
  estimateLengths,
  mergeLengthSnapshots,
  resolveConduit,
  roundLengths,
} from './geometry/conduit-estimation.service';
import {
  type DerivationOptions,
  RulesEngineService,
  resolveFixtureGroups,
  rulesEngineService,
} from './rules-engine.service';
import { classifyPage, detectSheetMap, mergeSheetMap } from './sheet-classification.service';
import { summarizeValidation, validateQuantities } from './validation.service';
import { buildCountingInstructions } from './vision/counting-instructions';
import type { SymbolCounter } from './vision/symbol-counter.service';

export type SheetCountSource = 'tags' | 'schedule' | 'optical' | 'none';

export interface SheetReport {
  sheet: Sheet;
  counts: CountSnapshot;
  source: SheetCountSource;
  matchCount: number;
  usedKeynoteFallback: boolean;
  /** A later page carries the same sheet code; this page contributes nothing. */
  superseded: boolean;
}

export interface TakeoffRunOptions {
  project?: ProjectConfig;
  reference?: ReferenceSet | null;
  derivation?: DerivationOptions;
}

export interface TakeoffResult {
  projectName: string;
  sheets: SheetReport[];
  counts: CountSnapshot;
  fixtureDefinitions: Record<string, FixtureDefinition>;
  measuredLengths: LengthSnapshot;
  conduit: ConduitResolution;
  derived: DerivedSnapshot;
  /** Counts, derived materials and `<size> EMT` conduit lines in one item → quantity map. */
  merged: Record<string, number>;
  validation?: {
    records: ValidationRecord[];
    summary: ValidationSummary;
  };
}

export interface TakeoffPipelineDependencies {
  symbolCounter?: SymbolCounter;
  rulesEngine?: RulesEngineService;
}

export const conduitItem = (sizeClass: string) => `${sizeClass} EMT`;

const PLAN_ROLES: ReadonlySet<Sheet['role']> = new Set(['new_work', 'demolition']);

/** Optical demo counts may come back keyed by keynote number. */
const normalizeOpticalCounts = (
  counts: CountSnapshot,
  demoKeynotes: Record<string, string>,
): CountSnapshot => {
  const demo = counts.demo;
  if (!demo) {
    return counts;
  }
  const renamed: ItemCounts = {};
  for (const [key, value] of Object.entries(demo)) {
    addCount(renamed, Object.hasOwn(demoKeynotes, key) ? demoKeynotes[key] : key, value);
  }
  return { ...counts, demo: renamed };
};

export class TakeoffPipelineService {
  private readonly logger = createScopedLogger('TakeoffPipeline');
  private readonly symbolCounter?: SymbolCounter;
  private readonly rulesEngine: RulesEngineService;

  constructor(dependencies: TakeoffPipelineDependencies = {}) {
    this.symbolCounter = dependencies.symbolCounter;
    this.rulesEngine = dependencies.rulesEngine ?? rulesEngineService;
  }

  async run(source: DocumentSource, options: TakeoffRunOptions = {}): Promise<TakeoffResult> {
    const project = options.project ?? defaultProjectConfig;
    this.logger.info(`Starting takeoff "${project.name}" (${project.floorCount} floors)`);

    const pages = await this.loadPages(source);
    const sheetMap = mergeSheetMap(project.sheetMap, detectSheetMap(pages, project.classifier));

    const reports: SheetReport[] = [];
    const fixtureDefinitions: Record<string, FixtureDefinition> = {
      ...project.fixtureDefinitions,
    };
    const lengthSnapshots: LengthSnapshot[] = [];

    for (const page of pages) {
      const sheet = classifyPage(page, project);
      const superseded =
        sheet.sheetCode !== UNKNOWN_SHEET_CODE &&
        sheetMap[sheet.sheetCode] !== undefined &&
        sheetMap[sheet.sheetCode] !== page.index;
      this.logger.debug(
        `Page ${page.index} → ${sheet.sheetCode} (${sheet.role})${superseded ? ' superseded' : ''}`,
      );

      if (superseded) {
        reports.push(this.inertReport(sheet, true));
        continue;
      }

      const report = await this.processSheet(sheet, page, source, project, fixtureDefinitions);
      reports.push(report);

      if (project.conduit.sheetCodes.includes(sheet.sheetCode)) {
        lengthSnapshots.push(estimateLengths(page.paths, project.geometry));
      }
    }

    const counts = mergeCountSnapshots(
      ...reports.map((report) => report.counts),
      project.manualCounts,
    );
    const measuredLengths = mergeLengthSnapshots(...lengthSnapshots);
    const conduit = resolveConduit(measuredLengths, counts, project);
    const lengths = roundLengths(conduit.lengths);
    this.logger.info(`Conduit source: ${conduit.method}`, lengths);

    const derived = this.rulesEngine.deriveMaterials(
      {
        counts,
        lengths,
        fixtureGroups: resolveFixtureGroups(project.fixtureGroups, fixtureDefinitions),
      },
      project,
      options.derivation,
    );

    const merged: Record<string, number> = { ...flattenCounts(counts), ...derived };
    for (const [sizeClass, feet] of Object.entries(lengths)) {
      merged[conduitItem(sizeClass)] = feet;
    }

    const result: TakeoffResult = {
      projectName: project.name,
      sheets: reports,
      counts,
      fixtureDefinitions,
      measuredLengths,
      conduit: { method: conduit.method, lengths },
      derived,
      merged,
    };

    if (options.reference) {
      const records = validateQuantities(merged, flattenReference(options.reference));
      const summary = summarizeValidation(records, createCategoryLookup(options.reference));
      result.validation = { records, summary };
      this.logger.info(
        `Validation: ${summary.overall.exact + summary.overall.close}/${summary.overall.total} within tolerance (${summary.overall.accuracyPct}%)`,
      );
    }

    this.logger.info(
      `Takeoff complete: ${reports.length} sheets, ${Object.keys(merged).length} line items`,
    );
    return result;
  }

  private async loadPages(source: DocumentSource): Promise<PageContent[]> {
    const total = await source.pageCount();
    const pages: PageContent[] = [];
    for (let index = 0; index < total; index += 1) {
      try {
        const page = await source.getPage(index);
        if (page) {
          pages.push(page);
        }
      } catch (error) {
        this.logger.warn(`Skipping page ${index}: ${describeError(error)}`);
      }
    }
    return pages;
  }

  private inertReport(sheet: Sheet, superseded = false): SheetReport {
    return {
      sheet,
      counts: {},
      source: 'none',
      matchCount: 0,
      usedKeynoteFallback: false,
      superseded,
    };
  }

  private async processSheet(
    sheet: Sheet,
    page: PageContent,
    source: DocumentSource,
    project: ProjectConfig,
    fixtureDefinitions: Record<string, FixtureDefinition>,
  ): Promise<SheetReport> {
    if (sheet.role === 'schedule') {
      const schedule = extractScheduleSheet(sheet, page, project);
      Object.assign(fixtureDefinitions, schedule.fixtureDefinitions);
      const definitions = Object.keys(schedule.fixtureDefinitions).length;
      if (definitions > 0) {
        this.logger.info(`${sheet.sheetCode}: ${definitions} fixture definitions`);
      }
      return { ...this.inertReport(sheet), counts: schedule.counts, source: 'schedule' };
    }

    if (!PLAN_ROLES.has(sheet.role)) {
      return this.inertReport(sheet);
    }

    const extraction = extractSheet(sheet, page, project);
    const usedKeynoteFallback = extraction.results.some((result) => result.usedFallback);
    if (usedKeynoteFallback) {
      this.logger.warn(`${sheet.sheetCode}: few keynotes recognised, used full-text fallback`);
    }

    if (isEmptySnapshot(extraction.counts)) {
      const optical = await this.countOptically(sheet, source, project);
      if (optical) {
        return {
          ...this.inertReport(sheet),
          counts: optical,
          source: 'optical',
          usedKeynoteFallback,
        };
      }
    }

    return {
      sheet,
      counts: extraction.counts,
      source: 'tags',
      matchCount: extraction.matches.length,
      usedKeynoteFallback,
      superseded: false,
    };
  }

  private async countOptically(
    sheet: Sheet,
    source: DocumentSource,
    project: ProjectConfig,
  ): Promise<CountSnapshot | null> {
    if (!this.symbolCounter || !source.renderPage) {
      return null;
    }
    let image: PageImage | null;
    try {
      image = await source.renderPage(sheet.pageIndex);
    } catch (error) {
      this.logger.warn(`${sheet.sheetCode}: render failed: ${describeError(error)}`);
      return null;
    }
    if (!image) {
      return null;
    }
    this.logger.info(`${sheet.sheetCode}: no tags recognised, using optical counting`);
    const counts = normalizeOpticalCounts(
      await this.symbolCounter.countSymbols(image, buildCountingInstructions(sheet)),
      project.demoKeynotes,
    );
    return isEmptySnapshot(counts) ? null : counts;
  }
}
