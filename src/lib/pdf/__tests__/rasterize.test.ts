import { describe, it, expect } from 'vitest';
import { PDFDocument, rgb } from 'pdf-lib';
import { rasterizeDocuments, rasterizePdf } from '../rasterize';
import { DocumentReadError } from '../../errors';

async function makePdf(sizes: [number, number][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (const [w, h] of sizes) {
    const page = doc.addPage([w, h]);
    page.drawRectangle({ x: 8, y: 8, width: w / 2, height: h / 4, color: rgb(0.1, 0.1, 0.1) });
  }
  return doc.save();
}

function isJpeg(data: Buffer): boolean {
  return data[0] === 0xff && data[1] === 0xd8;
}

describe('rasterizePdf', () => {
  it('renders every page at 200 dpi in page order', async () => {
    const pdf = await makePdf([
      [144, 72],
      [72, 144],
    ]);
    const images = await rasterizePdf(pdf);

    expect(images.map((i) => [i.pageNumber, i.width, i.height])).toEqual([
      [1, 400, 200],
      [2, 200, 400],
    ]);
    for (const img of images) {
      expect(img.mimeType).toBe('image/jpeg');
      expect(isJpeg(img.data)).toBe(true);
    }
  });

  it('honours a custom dpi', async () => {
    const images = await rasterizePdf(await makePdf([[216, 72]]), { dpi: 100 });
    expect([images[0].width, images[0].height]).toEqual([300, 100]);
  });

  it('is deterministic and leaves the input bytes usable', async () => {
    const pdf = await makePdf([
      [144, 72],
      [144, 72],
      [72, 72],
    ]);
    const first = await rasterizePdf(pdf);
    const second = await rasterizePdf(pdf);

    expect(second.map((i) => [i.width, i.height])).toEqual(first.map((i) => [i.width, i.height]));
    expect(second).toHaveLength(3);
  });

  it('rejects bytes that are not a PDF', async () => {
    const bytes = new TextEncoder().encode('definitely not a pdf');
    await expect(rasterizePdf(bytes)).rejects.toBeInstanceOf(DocumentReadError);
    await expect(rasterizePdf(bytes)).rejects.toThrow(/^PDF processing failed: /);
  });
});

describe('rasterizeDocuments', () => {
  it('concatenates documents in input order', async () => {
    const images = await rasterizeDocuments([
      { name: 'registry.pdf', data: await makePdf([[144, 72]]) },
      { name: 'contract.pdf', data: await makePdf([[72, 144], [72, 72]]) },
    ]);

    expect(images.map((i) => [i.pageNumber, i.width, i.height])).toEqual([
      [1, 400, 200],
      [1, 200, 400],
      [2, 200, 200],
    ]);
  });

  it('names the document that failed', async () => {
    const sources = [
      { name: 'registry.pdf', data: await makePdf([[144, 72]]) },
      { name: 'broken.pdf', data: new Uint8Array([1, 2, 3, 4]) },
    ];

    try {
      await rasterizeDocuments(sources);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DocumentReadError);
      if (err instanceof DocumentReadError) {
        expect(err.documentName).toBe('broken.pdf');
        expect(err.message.startsWith('broken.pdf: PDF processing failed: ')).toBe(true);
        expect(err.code).toBe('document_read');
      }
    }
  });
});
