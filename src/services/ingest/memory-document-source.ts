import type { DocumentSource, PageContent, PageImage } from '../../types/document';

/** Pre-extracted page primitives, e.g. from another tool or a test. */
export class MemoryDocumentSource implements DocumentSource {
  private readonly pages: Map<number, PageContent>;

  constructor(
    pages: readonly PageContent[],
    private readonly images: ReadonlyMap<number, PageImage> = new Map(),
  ) {
    this.pages = new Map(pages.map((page) => [page.index, page]));
  }

  async pageCount(): Promise<number> {
    return this.pages.size === 0 ? 0 : Math.max(...this.pages.keys()) + 1;
  }

  async getPage(index: number): Promise<PageContent | null> {
    return this.pages.get(index) ?? null;
  }

  async renderPage(index: number): Promise<PageImage | null> {
    return this.images.get(index) ?? null;
  }
}
