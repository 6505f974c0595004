import { describe, it, expect } from 'vitest';
import { buildMaterialList } from './materials.service';
import type { TakeoffResult } from './takeoff-pipeline.service';

const result: TakeoffResult = {
  projectName: 'Clinic Fit-out',
  sheets: [],
  counts: {
    fixtures: { F2: 4 },
    power: { 'GFI Receptacle': 0 },
    demo: { 'Demo Exit': 2 },
  },
  fixtureDefinitions: {},
  measuredLengths: { '3/4"': 100.4 },
  conduit: { method: 'vector', lengths: { '3/4"': 100 } },
  derived: { 'J-Hook': 230, 'Cat 6 Cable (ft)': 920 },
  merged: {},
};

describe('buildMaterialList', () => {
  it('lists non-zero quantities by section with units', () => {
    const list = buildMaterialList(result, new Date('2026-01-01T00:00:00.000Z'));
    expect(list.items).toEqual([
      { item: 'F2', qty: 4, uom: 'ea', category: 'new_work' },
      { item: 'Demo Exit', qty: 2, uom: 'ea', category: 'demolition' },
      { item: 'Cat 6 Cable (ft)', qty: 920, uom: 'ft', category: 'derived' },
      { item: 'J-Hook', qty: 230, uom: 'ea', category: 'derived' },
      { item: '3/4" EMT', qty: 100, uom: 'ft', category: 'conduit' },
    ]);
    expect(list.summary).toEqual({
      totalItems: 5,
      totalQuantity: 1256,
      categories: ['new_work', 'demolition', 'derived', 'conduit'],
      generatedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('lists wire in feet', () => {
    const list = buildMaterialList({ ...result, counts: {}, derived: { '#12 THHN': 230 } });
    expect(list.items).toEqual([
      { item: '#12 THHN', qty: 230, uom: 'ft', category: 'derived' },
      { item: '3/4" EMT', qty: 100, uom: 'ft', category: 'conduit' },
    ]);
  });

  it('omits empty sections from the summary', () => {
    const list = buildMaterialList({ ...result, counts: {}, derived: {}, conduit: { method: 'none', lengths: {} } });
    expect(list.items).toEqual([]);
    expect(list.summary.categories).toEqual([]);
    expect(list.projectName).toBe('Clinic Fit-out');
  });
});
