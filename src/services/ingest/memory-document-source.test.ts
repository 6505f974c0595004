import { describe, it, expect } from 'vitest';
import { MemoryDocumentSource } from './memory-document-source';

describe('MemoryDocumentSource', () => {
  const page = { index: 2, width: 100, height: 100, tokens: [] };

  it('reports pages up to the highest index', async () => {
    const source = new MemoryDocumentSource([page]);
    await expect(source.pageCount()).resolves.toBe(3);
    await expect(source.getPage(0)).resolves.toBeNull();
    await expect(source.getPage(2)).resolves.toBe(page);
  });

  it('serves images for rendered pages only', async () => {
    const image = { data: Buffer.from('png'), mimeType: 'image/png' as const };
    const source = new MemoryDocumentSource([page], new Map([[2, image]]));
    await expect(source.renderPage(2)).resolves.toBe(image);
    await expect(source.renderPage(1)).resolves.toBeNull();
    await expect(new MemoryDocumentSource([]).pageCount()).resolves.toBe(0);
  });
});
