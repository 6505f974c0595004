import { z } from 'zod';
import { COUNT_CATEGORIES, FIXTURE_CATEGORIES } from '../types/takeoff';

const fraction = z.number().gt(0).max(1);
const nonNegative = z.number().min(0);
const positive = z.number().positive();

export const sheetRoleSchema = z.enum(['legend', 'demolition', 'new_work', 'schedule', 'reference']);
export const countCategorySchema = z.enum(COUNT_CATEGORIES);
export const dedupRuleSchema = z.enum(['floor', 'ceil', 'none']);

export const ratiosSchema = z
  .object({
    powerPackRatio: nonNegative,
    ocCeilingRatio: fraction,
    cablePerJackFt: nonNegative,
    jhookSpacingFt: positive,
    dataBoxShare: nonNegative,
    deepBoxShare: nonNegative,
    blankKnockoutShare: nonNegative,
    pendantCablesPerLinear: nonNegative,
    aircraftKitsPerPendant: nonNegative,
    canopyKitsPerPendant: nonNegative,
    penetrationsPerCaulkTube: positive,
    redWirenutsPerDevice: nonNegative,
    yellowWirenutsPerDevice: nonNegative,
    screwsPerDevice: nonNegative,
    pullLinePerConduitFt: nonNegative,
    devicesPerBlackTape: positive,
    devicesPerPhaseTape: positive,
    receptaclesPerGfi: positive,
  })
  .strict();

export const ratioNameSchema = ratiosSchema.keyof();

const regionSchema = z.object({
  maxXFraction: fraction,
  maxYFraction: fraction,
});

const isCompilableRegExp = (source: string) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

const titleBlockSchema = z.object({
  x0Fraction: z.number().min(0).lt(1),
  y0Fraction: z.number().min(0).lt(1),
});

export const tagPatternSchema = z
  .object({
    token: z.string().min(1),
    itemKey: z.string().min(1),
    maxWidth: positive.optional(),
    weight: z.number().int().positive().optional(),
    dedup: dedupRuleSchema.optional(),
    numericSuffix: z.boolean().optional(),
  })
  .strict();

const splitSchema = z
  .object({
    sourceKey: z.string().min(1),
    primaryKey: z.string().min(1),
    remainderKey: z.string().min(1),
    ratioName: ratioNameSchema,
  })
  .strict();

const distributionSchema = z
  .object({
    sourceKey: z.string().min(1),
    dedup: dedupRuleSchema,
    multiplier: positive,
    minimum: z.number().int().min(0),
    shares: z.record(fraction),
    remainderKey: z.string().min(1),
  })
  .strict();

const floorBoxJacksSchema = z
  .object({
    token: z.string().min(1),
    itemKey: z.string().min(1),
    dataShare: nonNegative,
    jacksPerBox: z.number().int().min(0),
  })
  .strict();

const circuitReceptaclesSchema = z
  .object({
    pattern: z.string().min(1).refine(isCompilableRegExp, 'must be a valid regular expression'),
    itemKey: z.string().min(1),
    minimum: z.number().int().min(0),
    gfi: z
      .object({
        itemKey: z.string().min(1),
        minimum: z.number().int().min(0),
      })
      .strict(),
  })
  .strict();

export const patternSetSchema = z
  .object({
    name: z.string().min(1),
    category: countCategorySchema,
    encoding: z.enum(['doubled', 'plain']),
    appliesTo: z
      .object({
        roles: z.array(sheetRoleSchema).min(1),
        prefixes: z.array(z.string().length(1)).optional(),
        sheetCodes: z.array(z.string()).optional(),
      })
      .strict(),
    region: regionSchema,
    dedup: dedupRuleSchema,
    patterns: z.array(tagPatternSchema),
    resolveKeynotes: z.boolean().optional(),
    splits: z.array(splitSchema).optional(),
    distributions: z.array(distributionSchema).optional(),
    floorBoxJacks: floorBoxJacksSchema.optional(),
    circuitReceptacles: circuitReceptaclesSchema.optional(),
    allowances: z.record(z.number().int().min(0)).optional(),
  })
  .strict();

const fittingRatioSchema = z
  .object({
    connector: nonNegative,
    coupling: nonNegative,
    bushing: nonNegative,
    strap1Hole: nonNegative,
    strapUnistrut: nonNegative,
  })
  .strict();

const fixtureDefinitionSchema = z.object({
  description: z.string(),
  category: z.enum(FIXTURE_CATEGORIES),
});

export const projectConfigSchema = z
  .object({
    name: z.string().min(1),
    sheetMap: z.record(z.number().int().min(0)),
    sheetTitles: z.record(z.string()),
    floorCount: z.number().int().min(1),
    buildingSqft: positive,
    classifier: z
      .object({
        titleBlock: titleBlockSchema,
        widenedTitleBlock: titleBlockSchema,
        disciplinePrefixes: z.array(z.string().length(1)),
        demolitionBlock: z.number().int().min(0),
      })
      .strict(),
    ratios: ratiosSchema,
    fittings: z
      .object({
        defaultSize: z.string().min(1),
        perSize: z.record(fittingRatioSchema),
      })
      .strict(),
    wireRules: z.array(
      z
        .object({
          sizeClass: z.string().min(1),
          itemKey: z.string().min(1),
          multiplier: nonNegative,
        })
        .strict(),
    ),
    fixtureGroups: z
      .object({
        layIn: z.array(z.string()),
        linear: z.array(z.string()),
        pendant: z.array(z.string()),
      })
      .strict(),
    fixtureDefinitions: z.record(fixtureDefinitionSchema),
    manualCounts: z.record(countCategorySchema, z.record(z.number().int().min(0))),
    patternSets: z.array(patternSetSchema),
    demoKeynotes: z.record(z.string().regex(/^\d+$/), z.string().min(1)),
    keynote: z
      .object({
        maxTokenWidth: positive,
        fallbackThreshold: z.number().int().min(0),
        overcountFactor: positive,
      })
      .strict(),
    geometry: z
      .object({
        widthClasses: z.array(
          z.object({ width: positive, sizeClass: z.string().min(1) }).strict(),
        ),
        slack: z.number().min(1),
        defaultSizeClass: z.string().min(1),
        paperInchesPerFoot: positive,
      })
      .strict(),
    conduit: z
      .object({
        source: z.enum(['vector', 'reference', 'device']),
        reference: z.record(nonNegative),
        sheetCodes: z.array(z.string()),
        deviceEstimateFallback: z.boolean(),
        estimate: z
          .object({
            sizeClasses: z
              .object({
                control: z.string(),
                lighting: z.string(),
                power: z.string(),
                feeder: z.string(),
              })
              .strict(),
            lightingKeys: z.array(z.string()),
            powerKeys: z.array(z.string()),
            controlKeys: z.array(z.string()),
            lightingFtPerDevice: nonNegative,
            powerFtPerDevice: nonNegative,
            controlFtPerDevice: nonNegative,
            lightingDevicesPerCircuit: positive,
            lightingFtPerCircuit: nonNegative,
            powerDevicesPerCircuit: positive,
            powerFtPerCircuit: nonNegative,
            sqftPerFeederFt: positive,
            riserFtPerFloor: nonNegative,
            minimums: z.record(nonNegative),
          })
          .strict(),
      })
      .strict(),
    schedules: z
      .object({
        fixtureBlock: z.number().int().min(0),
        panelBlock: z.number().int().min(0),
        breakers: z.array(
          z
            .object({
              token: z.string().min(1),
              itemKey: z.string().min(1),
              divisor: positive,
              cap: z.number().int().min(0),
            })
            .strict(),
        ),
        safetySwitches: z
          .object({
            keywords: z.array(z.string().min(1)),
            rules: z.array(
              z
                .object({
                  amps: z.number().int().positive(),
                  itemKey: z.string().min(1),
                })
                .strict(),
            ),
          })
          .strict(),
      })
      .strict(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof projectConfigSchema>;
export type Ratios = z.infer<typeof ratiosSchema>;
export type PatternSet = z.infer<typeof patternSetSchema>;
export type TagPattern = z.infer<typeof tagPatternSchema>;
export type DedupRule = z.infer<typeof dedupRuleSchema>;
export type ClassifierConfig = ProjectConfig['classifier'];
export type GeometryConfig = ProjectConfig['geometry'];
export type ConduitConfig = ProjectConfig['conduit'];
export type SchedulesConfig = ProjectConfig['schedules'];
export type FixtureGroups = ProjectConfig['fixtureGroups'];
