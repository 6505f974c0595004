export interface BoundingBox {
  x0: number;
  x1: number;
  top: number;
  bottom: number;
}

/** One word of page text, positioned with a top-left origin in PDF points. */
export interface TextToken extends BoundingBox {
  text: string;
}

export interface Point {
  x: number;
  y: number;
}

export interface LineSegment {
  start: Point;
  end: Point;
}

export interface VectorPath {
  strokeWidth: number;
  segments: LineSegment[];
}

export type TableGrid = string[][];

export interface PageContent {
  index: number;
  width: number;
  height: number;
  tokens: TextToken[];
  /** Undefined when the source cannot provide geometry for the page. */
  paths?: VectorPath[];
  tables?: TableGrid[];
}

export interface PageImage {
  data: Buffer;
  mimeType: 'image/png' | 'image/jpeg';
}

/**
 * Supplies per-page primitives. The takeoff core never opens or decodes a
 * document itself.
 */
export interface DocumentSource {
  pageCount(): Promise<number>;
  getPage(index: number): Promise<PageContent | null>;
  renderPage?(index: number): Promise<PageImage | null>;
}
