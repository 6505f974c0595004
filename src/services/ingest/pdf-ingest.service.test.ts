import { beforeEach, describe, it, expect, vi } from 'vitest';
import { TakeoffError } from '../../utils/takeoff-error';
import { PdfDocumentSource, collectVectorPaths, splitTextRun } from './pdf-ingest.service';

const { OPS, getDocument } = vi.hoisted(() => ({
  OPS: {
    save: 1,
    restore: 2,
    transform: 3,
    setLineWidth: 4,
    constructPath: 5,
    stroke: 6,
    fill: 7,
    moveTo: 10,
    lineTo: 11,
    curveTo: 12,
    curveTo2: 13,
    curveTo3: 14,
    closePath: 15,
    rectangle: 16,
    closeStroke: 20,
    fillStroke: 21,
    eoFillStroke: 22,
    closeFillStroke: 23,
    closeEOFillStroke: 24,
    eoFill: 25,
    endPath: 26,
  },
  getDocument: vi.fn(),
}));

vi.mock('unpdf', () => ({
  getResolvedPDFJS: async () => ({ getDocument, OPS }),
}));

describe('splitTextRun', () => {
  it('splits a run into word tokens by character width', () => {
    expect(splitTextRun({ text: 'FF22 OC', x0: 100, top: 50, bottom: 60, width: 70 })).toEqual([
      { text: 'FF22', x0: 100, x1: 140, top: 50, bottom: 60 },
      { text: 'OC', x0: 150, x1: 170, top: 50, bottom: 60 },
    ]);
  });

  it('returns nothing for empty runs', () => {
    expect(splitTextRun({ text: '', x0: 0, top: 0, bottom: 0, width: 0 })).toEqual([]);
  });
});

describe('collectVectorPaths', () => {
  it('emits stroked paths with their effective width', () => {
    const fnArray = [
      OPS.setLineWidth,
      OPS.constructPath,
      OPS.stroke,
      OPS.save,
      OPS.transform,
      OPS.constructPath,
      OPS.stroke,
      OPS.restore,
      OPS.constructPath,
      OPS.fill,
      OPS.constructPath,
      OPS.stroke,
    ];
    const argsArray = [
      [0.5],
      [[OPS.moveTo, OPS.lineTo], [0, 0, 90, 0]],
      null,
      null,
      [2, 0, 0, 2, 10, 10],
      [[OPS.rectangle], [0, 0, 5, 5]],
      null,
      null,
      [[OPS.moveTo, OPS.lineTo], [0, 0, 0, 30]],
      null,
      [[OPS.moveTo, OPS.curveTo, OPS.closePath], [0, 0, 1, 1, 2, 2, 30, 40]],
      null,
    ];

    expect(collectVectorPaths(fnArray, argsArray, OPS)).toEqual([
      { strokeWidth: 0.5, segments: [{ start: { x: 0, y: 0 }, end: { x: 90, y: 0 } }] },
      {
        strokeWidth: 1,
        segments: [
          { start: { x: 10, y: 10 }, end: { x: 20, y: 10 } },
          { start: { x: 20, y: 10 }, end: { x: 20, y: 20 } },
          { start: { x: 20, y: 20 }, end: { x: 10, y: 20 } },
          { start: { x: 10, y: 20 }, end: { x: 10, y: 10 } },
        ],
      },
      {
        strokeWidth: 0.5,
        segments: [
          { start: { x: 0, y: 0 }, end: { x: 30, y: 40 } },
          { start: { x: 30, y: 40 }, end: { x: 0, y: 0 } },
        ],
      },
    ]);
  });

  it('ignores malformed arguments', () => {
    expect(
      collectVectorPaths([OPS.setLineWidth, OPS.constructPath, OPS.stroke], ['wide', [['x'], []], null], OPS),
    ).toEqual([]);
  });
});

describe('PdfDocumentSource', () => {
  const page = {
    // PDF user space, origin bottom-left on a 100 pt high page
    getViewport: () => ({ width: 200, height: 100, transform: [1, 0, 0, -1, 0, 100] }),
    getTextContent: async () => ({
      items: [
        { str: 'E201 PLAN', transform: [1, 0, 0, 10, 20, 90], width: 90, height: 10 },
        { type: 'beginMarkedContent' },
      ],
    }),
    getOperatorList: async () => ({
      fnArray: [OPS.constructPath, OPS.stroke],
      argsArray: [[[OPS.moveTo, OPS.lineTo], [0, 0, 72, 0]], null],
    }),
    cleanup: vi.fn(),
  };
  const destroy = vi.fn(async () => undefined);

  beforeEach(() => {
    getDocument.mockReset();
    getDocument.mockImplementation(() => ({
      promise: Promise.resolve({ numPages: 2, getPage: async () => page, destroy }),
    }));
  });

  it('reads tokens, stroked paths and token rows through unpdf', async () => {
    const source = await PdfDocumentSource.open(new Uint8Array([37, 80, 68, 70]), { maxPages: 0 });
    expect(getDocument).toHaveBeenCalledWith(expect.objectContaining({ isEvalSupported: false }));
    expect(await source.pageCount()).toBe(2);

    expect(await source.getPage(0)).toEqual({
      index: 0,
      width: 200,
      height: 100,
      tokens: [
        { text: 'E201', x0: 20, x1: 60, top: 0, bottom: 10 },
        { text: 'PLAN', x0: 70, x1: 110, top: 0, bottom: 10 },
      ],
      paths: [{ strokeWidth: 1, segments: [{ start: { x: 0, y: 0 }, end: { x: 72, y: 0 } }] }],
      tables: [[['E201 PLAN']]],
    });
    expect(page.cleanup).toHaveBeenCalled();

    await source.close();
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('stops at the page limit', async () => {
    const source = await PdfDocumentSource.open(new Uint8Array([37]), { maxPages: 1 });
    expect(await source.pageCount()).toBe(1);
    expect(await source.getPage(1)).toBeNull();
  });

  it('reports documents pdf.js cannot open', async () => {
    getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error('Invalid PDF structure')) }));
    const opening = PdfDocumentSource.open(new Uint8Array([0]), { maxPages: 0 });
    await expect(opening).rejects.toBeInstanceOf(TakeoffError);
    await expect(opening).rejects.toMatchObject({
      code: 'DOCUMENT_UNAVAILABLE',
      details: 'Invalid PDF structure',
    });
  });
});
