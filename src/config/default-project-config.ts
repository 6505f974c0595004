import defaultPatternSets from './defaults/pattern-sets.json';
import { type ProjectConfig, projectConfigSchema } from './project-config.schema';

export const defaultRatios = {
  powerPackRatio: 0.74,
  ocCeilingRatio: 0.84,
  cablePerJackFt: 10,
  jhookSpacingFt: 4,
  dataBoxShare: 0.15,
  deepBoxShare: 0.1,
  blankKnockoutShare: 0.3,
  pendantCablesPerLinear: 4,
  aircraftKitsPerPendant: 4,
  canopyKitsPerPendant: 1,
  penetrationsPerCaulkTube: 3,
  redWirenutsPerDevice: 4,
  yellowWirenutsPerDevice: 2,
  screwsPerDevice: 4,
  pullLinePerConduitFt: 0.5,
  devicesPerBlackTape: 50,
  devicesPerPhaseTape: 100,
  receptaclesPerGfi: 8,
} as const;

const standardProjectConfig = {
  name: 'Standard Electrical Takeoff',
  sheetMap: {},
  sheetTitles: {},
  floorCount: 2,
  buildingSqft: 10000,
  classifier: {
    titleBlock: { x0Fraction: 0.8, y0Fraction: 0.85 },
    widenedTitleBlock: { x0Fraction: 0.7, y0Fraction: 0.8 },
    // empty means any discipline letter
    disciplinePrefixes: [],
    demolitionBlock: 100,
  },
  ratios: defaultRatios,
  fittings: {
    defaultSize: '3/4"',
    // quantities per 100 ft of conduit
    perSize: {
      '1/2"': { connector: 10, coupling: 8, bushing: 10, strap1Hole: 12, strapUnistrut: 0 },
      '3/4"': { connector: 10.5, coupling: 9.2, bushing: 10.5, strap1Hole: 9.2, strapUnistrut: 3.1 },
      '1"': { connector: 4.9, coupling: 8.1, bushing: 4.9, strap1Hole: 1.9, strapUnistrut: 10.1 },
      '1-1/4"': { connector: 11.8, coupling: 5.8, bushing: 11.8, strap1Hole: 4.1, strapUnistrut: 7.3 },
    },
  },
  wireRules: [
    { sizeClass: '1/2"', itemKey: '#14 THHN', multiplier: 3 },
    { sizeClass: '3/4"', itemKey: '#12 THHN', multiplier: 2.3 },
    { sizeClass: '1"', itemKey: '#10 THHN', multiplier: 8.4 },
    { sizeClass: '1-1/4"', itemKey: '#8 THHN', multiplier: 0.08 },
  ],
  fixtureGroups: {
    layIn: ['F2', 'F8'],
    linear: [
      "4' Linear LED",
      "6' Linear LED",
      "8' Linear LED",
      "10' Linear LED",
      "16' Linear LED",
    ],
    pendant: [
      'F10-22',
      'F10-30',
      'F11-4X4',
      'F11-6X6',
      'F11-8X8',
      'F11-10X10',
      'F11-16X10',
    ],
  },
  fixtureDefinitions: {},
  // items no drawing tag encodes: two-gang locations, blank boxes, rated wall and floor penetrations
  manualCounts: {},
  patternSets: defaultPatternSets,
  demoKeynotes: {
    '1': "Demo 2'x4' Recessed",
    '2': "Demo 2'x2' Recessed",
    '3': 'Demo Downlight',
    '4': 'Demo Switch',
    '5': "Demo 4' Strip",
    '6': "Demo 8' Strip",
    '7': 'Demo Exit',
    '9': 'Demo Receptacle',
  },
  keynote: {
    maxTokenWidth: 30,
    fallbackThreshold: 10,
    overcountFactor: 2,
  },
  geometry: {
    // stroke width in points → conduit trade size
    widthClasses: [
      { width: 0.25, sizeClass: '3/4"' },
      { width: 0.5, sizeClass: '3/4"' },
      { width: 0.75, sizeClass: '1"' },
      { width: 1.0, sizeClass: '1"' },
      { width: 1.5, sizeClass: '1-1/4"' },
    ],
    slack: 1.5,
    defaultSizeClass: '3/4"',
    paperInchesPerFoot: 0.125,
  },
  conduit: {
    source: 'vector',
    reference: {},
    sheetCodes: ['E200', 'E201'],
    deviceEstimateFallback: false,
    estimate: {
      sizeClasses: {
        control: '1/2"',
        lighting: '3/4"',
        power: '1"',
        feeder: '1-1/4"',
      },
      lightingKeys: [
        'F2',
        'F3',
        'F4',
        'F4E',
        'F5',
        'F7',
        'F7E',
        'F8',
        'F9',
        'X1',
        'X2',
        'Ceiling Occupancy Sensor',
        'Daylight Sensor',
      ],
      powerKeys: ['Duplex Receptacle', 'GFI Receptacle', 'SP Switch', '3-Way Switch'],
      controlKeys: ['Wall Occupancy Sensor', 'Wireless Dimmer', 'Daylight Sensor'],
      lightingFtPerDevice: 25,
      powerFtPerDevice: 30,
      controlFtPerDevice: 15,
      lightingDevicesPerCircuit: 8,
      lightingFtPerCircuit: 250,
      powerDevicesPerCircuit: 5,
      powerFtPerCircuit: 150,
      sqftPerFeederFt: 15,
      riserFtPerFloor: 50,
      minimums: { '1/2"': 50, '3/4"': 500, '1"': 200, '1-1/4"': 100 },
    },
  },
  schedules: {
    fixtureBlock: 600,
    panelBlock: 700,
    breakers: [
      { token: '20', itemKey: '20A 1P Breaker', divisor: 10, cap: 20 },
      { token: '30', itemKey: '30A 2P Breaker', divisor: 10, cap: 5 },
    ],
    safetySwitches: {
      keywords: ['DISCONNECT', 'SAFETY'],
      rules: [
        { amps: 30, itemKey: '30A/2P Safety Switch 240V' },
        { amps: 100, itemKey: '100A/3P Safety Switch 600V' },
      ],
    },
  },
};

export const defaultProjectConfig: ProjectConfig = projectConfigSchema.parse(standardProjectConfig);
