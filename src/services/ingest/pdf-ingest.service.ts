import { config } from '../../config/env';
import type {
  DocumentSource,
  LineSegment,
  PageContent,
  Point,
  TextToken,
  VectorPath,
} from '../../types/document';
import { createScopedLogger } from '../../utils/logger';
import { TakeoffError, describeError } from '../../utils/takeoff-error';
import { tablesFromTokens } from '../extraction/schedule-extraction.service';

// Structural view of the parts of the pdf.js build inside unpdf this source touches.
interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
}

interface PdfViewport {
  width: number;
  height: number;
  transform: number[];
}

interface PdfOperatorList {
  fnArray: number[];
  argsArray: unknown[];
}

interface PdfPageProxy {
  getViewport(params: { scale: number }): PdfViewport;
  getTextContent(): Promise<{ items: unknown[] }>;
  getOperatorList(): Promise<PdfOperatorList>;
  cleanup(): void;
}

interface PdfDocumentProxy {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageProxy>;
  destroy(): Promise<void>;
}

export type PdfOps = Record<string, number>;

interface PdfJsLib {
  getDocument(params: {
    data: Uint8Array;
    isEvalSupported?: boolean;
    useSystemFonts?: boolean;
    disableFontFace?: boolean;
  }): { promise: Promise<PdfDocumentProxy> };
  OPS: PdfOps;
}

type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

const log = createScopedLogger('PdfDocumentSource');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isPdfJsLib = (value: unknown): value is PdfJsLib =>
  isRecord(value) && typeof value.getDocument === 'function' && isRecord(value.OPS);

const isTextItem = (value: unknown): value is PdfTextItem =>
  isRecord(value) &&
  typeof value.str === 'string' &&
  Array.isArray(value.transform) &&
  typeof value.width === 'number';

const numberArray = (value: unknown): number[] | null =>
  Array.isArray(value) && value.every((entry): entry is number => typeof entry === 'number')
    ? value
    : null;

const toMatrix = (values: number[] | null): Matrix | null =>
  values && values.length >= 6
    ? [values[0], values[1], values[2], values[3], values[4], values[5]]
    : null;

const multiply = (m: Matrix, n: Matrix): Matrix => [
  m[0] * n[0] + m[1] * n[2],
  m[0] * n[1] + m[1] * n[3],
  m[2] * n[0] + m[3] * n[2],
  m[2] * n[1] + m[3] * n[3],
  m[4] * n[0] + m[5] * n[2] + n[4],
  m[4] * n[1] + m[5] * n[3] + n[5],
];

const apply = (m: Matrix, x: number, y: number): Point => ({
  x: m[0] * x + m[2] * y + m[4],
  y: m[1] * x + m[3] * y + m[5],
});

const matrixScale = (m: Matrix) => Math.sqrt(Math.abs(m[0] * m[3] - m[1] * m[2]));

export interface TextRun {
  text: string;
  x0: number;
  top: number;
  bottom: number;
  width: number;
}

/**
 * Splits one positioned text run into word tokens, sharing the run width out
 * by character count.
 */
export const splitTextRun = (run: TextRun): TextToken[] => {
  if (run.text.length === 0) {
    return [];
  }
  const charWidth = run.width / run.text.length;
  const tokens: TextToken[] = [];
  for (const match of run.text.matchAll(/\S+/g)) {
    const offset = match.index ?? 0;
    const x0 = run.x0 + offset * charWidth;
    tokens.push({
      text: match[0],
      x0,
      x1: x0 + match[0].length * charWidth,
      top: run.top,
      bottom: run.bottom,
    });
  }
  return tokens;
};

/** Text item in PDF user space → run with a top-left origin. */
const toTextRun = (item: PdfTextItem, viewport: Matrix): TextRun | null => {
  const transform = toMatrix(numberArray(item.transform));
  if (!transform) {
    return null;
  }
  const origin = apply(viewport, transform[4], transform[5]);
  const height = item.height > 0 ? item.height : Math.hypot(transform[2], transform[3]);
  return {
    text: item.str,
    x0: origin.x,
    top: origin.y - height,
    bottom: origin.y,
    width: item.width,
  };
};

const PAINT_STROKE = [
  'stroke',
  'closeStroke',
  'fillStroke',
  'eoFillStroke',
  'closeFillStroke',
  'closeEOFillStroke',
];
const PAINT_DISCARD = ['fill', 'eoFill', 'endPath'];

/**
 * Walks an operator list and returns every stroked path with its effective
 * stroke width. Curves contribute their chord.
 */
export const collectVectorPaths = (
  fnArray: readonly number[],
  argsArray: readonly unknown[],
  ops: PdfOps,
): VectorPath[] => {
  const strokeOps = new Set(PAINT_STROKE.map((name) => ops[name]));
  const discardOps = new Set(PAINT_DISCARD.map((name) => ops[name]));
  const paths: VectorPath[] = [];
  const stack: Array<{ lineWidth: number; ctm: Matrix }> = [];
  let state = { lineWidth: 1, ctm: IDENTITY };
  let pending: LineSegment[] = [];

  const decodePath = (pathOps: number[], coords: number[]) => {
    let cursor = 0;
    let current: Point | null = null;
    let subpathStart: Point | null = null;
    const take = (count: number) => {
      const slice = coords.slice(cursor, cursor + count);
      cursor += count;
      return slice;
    };
    const lineTo = (point: Point) => {
      if (current) {
        pending.push({ start: current, end: point });
      }
      current = point;
    };

    for (const op of pathOps) {
      if (op === ops.moveTo) {
        const [x, y] = take(2);
        current = apply(state.ctm, x, y);
        subpathStart = current;
      } else if (op === ops.lineTo) {
        const [x, y] = take(2);
        lineTo(apply(state.ctm, x, y));
      } else if (op === ops.curveTo) {
        const [, , , , x, y] = take(6);
        lineTo(apply(state.ctm, x, y));
      } else if (op === ops.curveTo2 || op === ops.curveTo3) {
        const [, , x, y] = take(4);
        lineTo(apply(state.ctm, x, y));
      } else if (op === ops.closePath) {
        if (subpathStart) {
          lineTo(subpathStart);
        }
      } else if (op === ops.rectangle) {
        const [x, y, w, h] = take(4);
        const corners = [
          apply(state.ctm, x, y),
          apply(state.ctm, x + w, y),
          apply(state.ctm, x + w, y + h),
          apply(state.ctm, x, y + h),
        ];
        corners.forEach((corner, index) =>
          pending.push({ start: corner, end: corners[(index + 1) % corners.length] }),
        );
        current = corners[0];
        subpathStart = corners[0];
      }
    }
  };

  fnArray.forEach((fn, index) => {
    const args = argsArray[index];
    if (fn === ops.save) {
      stack.push(state);
    } else if (fn === ops.restore) {
      state = stack.pop() ?? state;
    } else if (fn === ops.transform) {
      const matrix = toMatrix(numberArray(args));
      if (matrix) {
        state = { ...state, ctm: multiply(matrix, state.ctm) };
      }
    } else if (fn === ops.setLineWidth) {
      const values = numberArray(args);
      if (values && values.length > 0) {
        state = { ...state, lineWidth: values[0] };
      }
    } else if (fn === ops.constructPath) {
      if (Array.isArray(args)) {
        const pathOps = numberArray(args[0]);
        const coords = numberArray(args[1]);
        if (pathOps && coords) {
          decodePath(pathOps, coords);
        }
      }
    } else if (strokeOps.has(fn)) {
      if (pending.length > 0) {
        paths.push({ strokeWidth: state.lineWidth * matrixScale(state.ctm), segments: pending });
      }
      pending = [];
    } else if (discardOps.has(fn)) {
      pending = [];
    }
  });

  return paths;
};

// Node16 module output keeps import() as is, so the ESM build of unpdf loads from CommonJS
const loadPdfJs = async (): Promise<PdfJsLib> => {
  let pdfjs: unknown;
  try {
    const { getResolvedPDFJS } = await import('unpdf');
    pdfjs = await getResolvedPDFJS();
  } catch (error) {
    throw new TakeoffError(
      'DOCUMENT_UNAVAILABLE',
      'Failed to load unpdf. Ensure unpdf is installed.',
      describeError(error),
    );
  }
  if (!isPdfJsLib(pdfjs)) {
    throw new TakeoffError('DOCUMENT_UNAVAILABLE', 'unpdf resolved no usable pdf.js build');
  }
  log.debug('Resolved pdf.js through unpdf');
  return pdfjs;
};

export interface PdfDocumentSourceOptions {
  /** 0 reads every page. */
  maxPages?: number;
}

/** Page primitives from a PDF: word tokens, stroked vector paths, token-row tables. */
export class PdfDocumentSource implements DocumentSource {
  private constructor(
    private readonly doc: PdfDocumentProxy,
    private readonly ops: PdfOps,
    private readonly limit: number,
  ) {}

  static async open(
    data: Uint8Array,
    options: PdfDocumentSourceOptions = {},
  ): Promise<PdfDocumentSource> {
    const pdfjs = await loadPdfJs();
    let doc: PdfDocumentProxy;
    try {
      doc = await pdfjs.getDocument({
        data: new Uint8Array(data),
        isEvalSupported: false,
        useSystemFonts: false,
        disableFontFace: true,
      }).promise;
    } catch (error) {
      throw new TakeoffError('DOCUMENT_UNAVAILABLE', 'Unable to open PDF document', describeError(error));
    }
    const maxPages = options.maxPages ?? config.pdfMaxPages;
    const limit = maxPages > 0 ? Math.min(maxPages, doc.numPages) : doc.numPages;
    log.info(`Opened PDF with ${doc.numPages} pages (reading ${limit})`);
    return new PdfDocumentSource(doc, pdfjs.OPS, limit);
  }

  async pageCount(): Promise<number> {
    return this.limit;
  }

  async getPage(index: number): Promise<PageContent | null> {
    if (index < 0 || index >= this.limit) {
      return null;
    }
    const pageNumber = index + 1;
    try {
      const page = await this.doc.getPage(pageNumber);
      const viewport = page.getViewport({ scale: 1 });
      const viewportMatrix = toMatrix(numberArray(viewport.transform)) ?? IDENTITY;

      const textContent = await page.getTextContent();
      const tokens = textContent.items
        .filter(isTextItem)
        .map((item) => toTextRun(item, viewportMatrix))
        .flatMap((run) => (run ? splitTextRun(run) : []));

      const paths = await this.readPaths(page, pageNumber);
      page.cleanup();

      return {
        index,
        width: viewport.width,
        height: viewport.height,
        tokens,
        paths,
        tables: tablesFromTokens(tokens),
      };
    } catch (error) {
      log.warn(`Failed to read page ${pageNumber}/${this.limit}: ${describeError(error)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }

  private async readPaths(page: PdfPageProxy, pageNumber: number): Promise<VectorPath[] | undefined> {
    try {
      const operatorList = await page.getOperatorList();
      return collectVectorPaths(operatorList.fnArray, operatorList.argsArray, this.ops);
    } catch (error) {
      log.warn(`No vector data for page ${pageNumber}: ${describeError(error)}`);
      return undefined;
    }
  }
}
