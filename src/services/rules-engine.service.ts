import type {
  FixtureGroups,
  ProjectConfig,
  Ratios,
} from '../config/project-config.schema';
import type {
  CountSnapshot,
  DerivedSnapshot,
  FixtureDefinition,
  ItemCounts,
  LengthSnapshot,
} from '../types/takeoff';
import { compactCounts, flattenCounts, sumCounts } from '../utils/count-snapshot';
import { hasLengths } from './geometry/conduit-estimation.service';

/** Counted item keys the derivation rules read. */
export const DEVICE_KEYS = {
  ceilingSensor: 'Ceiling Occupancy Sensor',
  wallSensor: 'Wall Occupancy Sensor',
  daylightSensor: 'Daylight Sensor',
  dimmer: 'Wireless Dimmer',
  duplex: 'Duplex Receptacle',
  gfi: 'GFI Receptacle',
  singlePoleSwitch: 'SP Switch',
  threeWaySwitch: '3-Way Switch',
  dataJack: 'Cat 6 Jack',
  twoGangLocation: 'Two-Gang Location',
  blankBox: 'Blank Box',
  wallPenetration: 'Rated Wall Penetration',
  floorPenetration: 'Rated Floor Penetration',
} as const;

export const RULE_NAMES = [
  'powerPacks',
  'dataCabling',
  'boxes',
  'plasterRings',
  'plates',
  'fixtureAccessories',
  'fireStopping',
  'fittings',
  'consumables',
  'wire',
] as const;

export type RuleName = (typeof RULE_NAMES)[number];

export interface DerivationInput {
  counts: CountSnapshot;
  lengths?: LengthSnapshot;
  fixtureGroups: FixtureGroups;
}

export type DerivationConfig = Pick<ProjectConfig, 'ratios' | 'fittings' | 'wireRules'>;

export interface DerivationOptions {
  includeFittings?: boolean;
  includeConsumables?: boolean;
  includeWire?: boolean;
}

type DerivationRule = (input: DerivationInput, config: DerivationConfig) => DerivedSnapshot;

// absorbs binary noise such as 0.57 * 100 = 56.999...
const EPSILON = 1e-9;

export const truncateQuantity = (value: number): number => Math.max(0, Math.floor(value + EPSILON));

const item = (flat: ItemCounts, key: string) => flat[key] ?? 0;

const flatOf = (input: DerivationInput) => flattenCounts(input.counts);

const wallDevices = (flat: ItemCounts) =>
  item(flat, DEVICE_KEYS.duplex) +
  item(flat, DEVICE_KEYS.gfi) +
  item(flat, DEVICE_KEYS.singlePoleSwitch) +
  item(flat, DEVICE_KEYS.threeWaySwitch) +
  item(flat, DEVICE_KEYS.dimmer) +
  item(flat, DEVICE_KEYS.wallSensor);

const ceilingDevices = (flat: ItemCounts) =>
  item(flat, DEVICE_KEYS.ceilingSensor) + item(flat, DEVICE_KEYS.daylightSensor);

const dataBoxes = (flat: ItemCounts, ratios: Ratios) =>
  truncateQuantity(item(flat, DEVICE_KEYS.dataJack) * ratios.dataBoxShare);

const deepBoxes = (flat: ItemCounts, ratios: Ratios) =>
  truncateQuantity(wallDevices(flat) * ratios.deepBoxShare);

const totalBoxes = (flat: ItemCounts, ratios: Ratios) =>
  wallDevices(flat) + ceilingDevices(flat) + dataBoxes(flat, ratios);

const totalDevices = (flat: ItemCounts) =>
  wallDevices(flat) + ceilingDevices(flat) + item(flat, DEVICE_KEYS.dataJack);

const totalConduit = (lengths: LengthSnapshot | undefined) =>
  Object.values(lengths ?? {}).reduce((total, feet) => total + feet, 0);

export const powerPacks: DerivationRule = (input, { ratios }) => {
  const flat = flatOf(input);
  const sensors = item(flat, DEVICE_KEYS.ceilingSensor) + item(flat, DEVICE_KEYS.wallSensor);
  return { 'Power Pack': truncateQuantity(sensors * ratios.powerPackRatio) };
};

export const dataCabling: DerivationRule = (input, { ratios }) => {
  const cable = truncateQuantity(item(flatOf(input), DEVICE_KEYS.dataJack) * ratios.cablePerJackFt);
  return {
    'Cat 6 Cable (ft)': cable,
    'J-Hook': truncateQuantity(cable / ratios.jhookSpacingFt),
  };
};

export const boxes: DerivationRule = (input, { ratios }) => {
  const flat = flatOf(input);
  const deep = deepBoxes(flat, ratios);
  return {
    '4" Square Box w/bracket': Math.max(0, wallDevices(flat) - deep),
    '4" Square Box': ceilingDevices(flat),
    '4-11/16" Square Box w/bracket': dataBoxes(flat, ratios),
    '4" Square Box 2-1/8" deep': deep,
  };
};

export const plasterRings: DerivationRule = (input) => {
  const flat = flatOf(input);
  const twoGang = item(flat, DEVICE_KEYS.twoGangLocation);
  return {
    '4" Square-1G Plaster Ring': Math.max(0, wallDevices(flat) - 2 * twoGang),
    '4" Square-2G Plaster Ring': twoGang,
    '4" Square-3/0 Plaster Ring': ceilingDevices(flat),
  };
};

export const plates: DerivationRule = (input, { ratios }) => {
  const flat = flatOf(input);
  const twoGang = item(flat, DEVICE_KEYS.twoGangLocation);
  const blank = item(flat, DEVICE_KEYS.blankBox);
  const knockout = truncateQuantity(blank * ratios.blankKnockoutShare);
  return {
    'Duplex Plate': Math.max(0, item(flat, DEVICE_KEYS.duplex) - 2 * twoGang),
    'Decora Plate': item(flat, DEVICE_KEYS.gfi) + item(flat, DEVICE_KEYS.dimmer),
    'Switch Plate':
      item(flat, DEVICE_KEYS.singlePoleSwitch) + item(flat, DEVICE_KEYS.threeWaySwitch),
    'Blank Cover': blank - knockout,
    'Blank Cover w/KO': knockout,
  };
};

export const fixtureAccessories: DerivationRule = (input, { ratios }) => {
  const flat = flatOf(input);
  const { layIn, linear, pendant } = input.fixtureGroups;
  const pendants = sumCounts(flat, pendant);
  return {
    'Fixture Whip': sumCounts(flat, layIn),
    'Pendant/Cable': truncateQuantity(sumCounts(flat, linear) * ratios.pendantCablesPerLinear),
    'Aircraft Cable Kit': truncateQuantity(pendants * ratios.aircraftKitsPerPendant),
    'Canopy Kit': truncateQuantity(pendants * ratios.canopyKitsPerPendant),
  };
};

/** Caulk seals floor and wall penetrations; putty pads go on wall boxes only. */
export const fireStopping: DerivationRule = (input, { ratios }): DerivedSnapshot => {
  const flat = flatOf(input);
  const wall = item(flat, DEVICE_KEYS.wallPenetration);
  const penetrations = wall + item(flat, DEVICE_KEYS.floorPenetration);
  if (penetrations <= 0) {
    return {};
  }
  return {
    'Fire Caulk Tube': Math.max(1, truncateQuantity(penetrations / ratios.penetrationsPerCaulkTube)),
    'Putty Pad': wall,
  };
};

/** Quantities per 100 ft of each size class; unknown sizes use the default size's ratios. */
export const fittings: DerivationRule = (input, { fittings: table }) => {
  if (!hasLengths(input.lengths)) {
    return {};
  }
  const derived: DerivedSnapshot = {};
  for (const [size, feet] of Object.entries(input.lengths)) {
    const ratio = table.perSize[size] ?? table.perSize[table.defaultSize];
    if (!ratio || feet <= 0) {
      continue;
    }
    const hundreds = feet / 100;
    derived[`${size} Connector`] = truncateQuantity(hundreds * ratio.connector);
    derived[`${size} Coupling`] = truncateQuantity(hundreds * ratio.coupling);
    derived[`${size} Bushing`] = truncateQuantity(hundreds * ratio.bushing);
    derived[`${size} 1-Hole Strap`] = truncateQuantity(hundreds * ratio.strap1Hole);
    if (ratio.strapUnistrut > 0) {
      derived[`${size} Unistrut Strap`] = truncateQuantity(hundreds * ratio.strapUnistrut);
    }
  }
  return derived;
};

export const consumables: DerivationRule = (input, { ratios }) => {
  const flat = flatOf(input);
  const devices = totalDevices(flat);
  return {
    'Red Wirenut': truncateQuantity(devices * ratios.redWirenutsPerDevice),
    'Yellow Wirenut': truncateQuantity(devices * ratios.yellowWirenutsPerDevice),
    'Ground Screw': totalBoxes(flat, ratios),
    'Pan Head Tapping Screw #8': truncateQuantity(devices * ratios.screwsPerDevice),
    'Poly Pull Line (ft)': truncateQuantity(totalConduit(input.lengths) * ratios.pullLinePerConduitFt),
    'Black Tape': Math.max(1, truncateQuantity(devices / ratios.devicesPerBlackTape)),
    'Red Phase Tape': Math.max(1, truncateQuantity(devices / ratios.devicesPerPhaseTape)),
    'Blue Phase Tape': Math.max(1, truncateQuantity(devices / ratios.devicesPerPhaseTape)),
  };
};

export const wire: DerivationRule = (input, { wireRules }) => {
  if (!hasLengths(input.lengths)) {
    return {};
  }
  const derived: DerivedSnapshot = {};
  for (const rule of wireRules) {
    const feet = input.lengths[rule.sizeClass] ?? 0;
    if (feet > 0) {
      derived[rule.itemKey] = (derived[rule.itemKey] ?? 0) + truncateQuantity(feet * rule.multiplier);
    }
  }
  return derived;
};

export const derivationRules: Record<RuleName, DerivationRule> = {
  powerPacks,
  dataCabling,
  boxes,
  plasterRings,
  plates,
  fixtureAccessories,
  fireStopping,
  fittings,
  consumables,
  wire,
};

/** Fixture keys per accessory group: configured keys plus scheduled fixtures of that category. */
export const resolveFixtureGroups = (
  groups: FixtureGroups,
  definitions: Record<string, FixtureDefinition>,
): FixtureGroups => {
  const scheduled = (category: FixtureDefinition['category']) =>
    Object.entries(definitions)
      .filter(([, definition]) => definition.category === category)
      .map(([tag]) => tag);
  const union = (configured: string[], extra: string[]) => Array.from(new Set([...configured, ...extra]));

  return {
    layIn: union(groups.layIn, scheduled('lay-in')),
    linear: union(groups.linear, scheduled('linear')),
    pendant: union(groups.pendant, scheduled('pendant')),
  };
};

const isEnabled = (rule: RuleName, options: DerivationOptions) => {
  switch (rule) {
    case 'fittings':
      return options.includeFittings ?? true;
    case 'consumables':
      return options.includeConsumables ?? true;
    case 'wire':
      return options.includeWire ?? true;
    default:
      return true;
  }
};

export class RulesEngineService {
  /** Evaluates one rule in isolation. Zero quantities are left out. */
  runRule(name: RuleName, input: DerivationInput, config: DerivationConfig): DerivedSnapshot {
    return compactCounts(derivationRules[name](input, config));
  }

  /**
   * Union of every enabled rule. Rules never read each other's output, so the
   * order here has no effect on the result.
   */
  deriveMaterials(
    input: DerivationInput,
    config: DerivationConfig,
    options: DerivationOptions = {},
  ): DerivedSnapshot {
    const derived: DerivedSnapshot = {};
    for (const name of RULE_NAMES) {
      if (!isEnabled(name, options)) {
        continue;
      }
      Object.assign(derived, this.runRule(name, input, config));
    }
    return derived;
  }
}

export const rulesEngineService = new RulesEngineService();
