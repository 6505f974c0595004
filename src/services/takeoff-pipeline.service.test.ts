import { describe, it, expect, vi } from 'vitest';
import { defaultProjectConfig } from '../config/default-project-config';
import type { DocumentSource, PageContent, PageImage, TextToken } from '../types/document';
import type { CountSnapshot } from '../types/takeoff';
import { MemoryDocumentSource } from './ingest/memory-document-source';
import { TakeoffPipelineService } from './takeoff-pipeline.service';
import type { SymbolCounter } from './vision/symbol-counter.service';

const token = (text: string, x0 = 100, top = 100): TextToken => ({
  text,
  x0,
  x1: x0 + 10,
  top,
  bottom: top + 8,
});

const titled = (sheetCode: string, index: number, tokens: TextToken[], extra: Partial<PageContent> = {}): PageContent => ({
  index,
  width: 1000,
  height: 800,
  tokens: [...tokens, token(sheetCode, 900, 760)],
  ...extra,
});

const repeat = (count: number, text: string): TextToken[] => Array.from({ length: count }, () => token(text));

const stubCounter = (counts: CountSnapshot) => {
  const countSymbols = vi.fn(
    async (_image: PageImage, _instructions: string): Promise<CountSnapshot> => counts,
  );
  const counter: SymbolCounter = { countSymbols };
  return { counter, countSymbols };
};

const image: PageImage = { data: Buffer.from('png'), mimeType: 'image/png' };

describe('TakeoffPipelineService', () => {
  const pages = [
    titled('E200', 0, [...repeat(4, 'FF22'), ...repeat(4, 'OC')], {
      paths: [{ strokeWidth: 0.5, segments: [{ start: { x: 0, y: 0 }, end: { x: 900, y: 0 } }] }],
    }),
    titled('E100', 1, [...repeat(2, 'FB'), ...repeat(20, '1')]),
    titled('E600', 2, [], { tables: [[['F2', '2x4 LAY-IN']]] }),
    titled('E201', 3, []),
  ];
  const project = {
    ...defaultProjectConfig,
    manualCounts: { panel: { 'Rated Wall Penetration': 3 } },
  };

  it('runs a document from classification to derived materials', async () => {
    const { counter, countSymbols } = stubCounter({ power: { 'GFI Receptacle': 2 } });
    const pipeline = new TakeoffPipelineService({ symbolCounter: counter });
    const result = await pipeline.run(new MemoryDocumentSource(pages, new Map([[3, image]])), {
      project,
    });

    expect(result.sheets.map((report) => [report.sheet.sheetCode, report.sheet.role, report.source])).toEqual([
      ['E200', 'new_work', 'tags'],
      ['E100', 'demolition', 'tags'],
      ['E600', 'schedule', 'schedule'],
      ['E201', 'new_work', 'optical'],
    ]);
    expect(result.counts).toEqual({
      fixtures: { F2: 4 },
      controls: { 'Ceiling Occupancy Sensor': 1, 'Wall Occupancy Sensor': 1 },
      power: { 'GFI Receptacle': 2 },
      demo: { 'Demo Floor Box': 1, "Demo 2'x4' Recessed": 10 },
      panel: { 'Rated Wall Penetration': 3 },
    });
    expect(result.fixtureDefinitions).toEqual({ F2: { description: '2x4 LAY-IN', category: 'lay-in' } });

    expect(countSymbols).toHaveBeenCalledTimes(1);
    expect(countSymbols.mock.calls[0][1].split('\n')[0]).toBe('Sheet E201.');

    expect(result.conduit).toEqual({ method: 'vector', lengths: { '3/4"': 100 } });
    expect(result.derived).toMatchObject({
      'Power Pack': 1,
      'Fixture Whip': 4,
      'Fire Caulk Tube': 1,
      'Putty Pad': 3,
      '3/4" Connector': 10,
      '#12 THHN': 230,
    });
    expect(result.merged['3/4" EMT']).toBe(100);
    expect(result.merged.F2).toBe(4);
    expect(result.validation).toBeUndefined();
  });

  it('scores the run against a reference set', async () => {
    const pipeline = new TakeoffPipelineService();
    const result = await pipeline.run(new MemoryDocumentSource(pages.slice(0, 1)), {
      project,
      reference: { fixtures: { F2: 4 }, derived: { 'Power Pack': 3 } },
    });

    const records = result.validation?.records ?? [];
    expect(records.find((record) => record.item === 'F2')?.status).toBe('exact');
    expect(records.find((record) => record.item === 'Power Pack')).toMatchObject({
      expected: 3,
      actual: 1,
      status: 'close',
    });
  });

  it('lets the later of two pages with the same code win', async () => {
    const duplicated = [titled('E200', 0, repeat(2, 'FF22')), titled('E200', 1, repeat(3, 'FF22'))];
    const pipeline = new TakeoffPipelineService();

    const result = await pipeline.run(new MemoryDocumentSource(duplicated));
    expect(result.counts.fixtures).toEqual({ F2: 3 });
    expect(result.sheets.map((report) => report.superseded)).toEqual([true, false]);

    const pinned = await pipeline.run(new MemoryDocumentSource(duplicated), {
      project: { ...defaultProjectConfig, sheetMap: { E200: 0 } },
    });
    expect(pinned.counts.fixtures).toEqual({ F2: 2 });
  });

  it('skips pages the source cannot read', async () => {
    const source: DocumentSource = {
      pageCount: async () => 2,
      getPage: async (index) => {
        if (index === 1) {
          throw new Error('corrupt page');
        }
        return titled('E200', 0, repeat(1, 'FF88'));
      },
    };
    const result = await new TakeoffPipelineService().run(source);
    expect(result.sheets).toHaveLength(1);
    expect(result.counts.fixtures).toEqual({ F8: 1 });
    expect(result.conduit).toEqual({ method: 'none', lengths: {} });
  });

  it('renames optical keynote numbers and keeps other keys as given', async () => {
    const { counter } = stubCounter({ demo: { '3': 1, constructor: 2 } });
    const pipeline = new TakeoffPipelineService({ symbolCounter: counter });
    const result = await pipeline.run(
      new MemoryDocumentSource([titled('E100', 0, [])], new Map([[0, image]])),
    );
    expect(result.sheets[0].source).toBe('optical');
    expect(Object.entries(result.counts.demo ?? {}).sort()).toEqual([
      ['Demo Downlight', 1],
      ['constructor', 2],
    ]);
  });

  it('leaves sheets empty when optical counting is unavailable', async () => {
    const result = await new TakeoffPipelineService().run(new MemoryDocumentSource([titled('E201', 0, [])]));
    expect(result.sheets[0]).toMatchObject({ source: 'tags', matchCount: 0 });
    expect(result.counts).toEqual({});
  });
});
