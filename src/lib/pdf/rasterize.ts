import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { createCanvas } from '@napi-rs/canvas';
import type { PageImage, PdfSource } from '../../types/verification';
import { DocumentReadError, describeError } from '../errors';
import { DEFAULT_JPEG_QUALITY, DEFAULT_RENDER_DPI } from '../config';

export interface RasterizeOptions {
  /** 200 keeps small form fields (registration numbers and the like) legible to the model. */
  dpi?: number;
  /** JPEG quality, 0-100 */
  quality?: number;
}

const PDF_POINTS_PER_INCH = 72;

const pdfjsRoot = dirname(createRequire(import.meta.url).resolve('pdfjs-dist/package.json'));
const CMAP_URL = join(pdfjsRoot, 'cmaps') + '/';
const STANDARD_FONT_DATA_URL = join(pdfjsRoot, 'standard_fonts') + '/';

async function openPdf(data: Uint8Array): Promise<PDFDocumentProxy> {
  // pdfjs detaches the buffer it is given; hand it a copy so the caller's bytes stay usable.
  const task = getDocument({
    data: new Uint8Array(data),
    cMapUrl: CMAP_URL,
    cMapPacked: true,
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    isEvalSupported: false,
    verbosity: 0,
  });
  try {
    return await task.promise;
  } catch (err) {
    await task.destroy();
    const msg = describeError(err);
    if (/password|encrypted/i.test(msg)) {
      throw new DocumentReadError(
        'This PDF appears to be password-protected. Please remove password protection and try again.',
        { cause: err }
      );
    }
    throw new DocumentReadError(`PDF processing failed: ${msg}`, { cause: err });
  }
}

async function renderPage(
  pdf: PDFDocumentProxy,
  pageNum: number,
  scale: number,
  quality: number
): Promise<PageImage> {
  const page = await pdf.getPage(pageNum);
  try {
    const viewport = page.getViewport({ scale });
    const width = Math.ceil(viewport.width);
    const height = Math.ceil(viewport.height);

    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = '#ffffff';
    ctx.fillRect(0, 0, width, height);

    // pdfjs types its targets as DOM canvases; the Node canvas implements the same 2D API.
    await page.render({
      canvas: canvas as unknown as HTMLCanvasElement,
      canvasContext: ctx as unknown as CanvasRenderingContext2D,
      viewport,
    }).promise;

    const data = await canvas.encode('jpeg', quality);
    return { pageNumber: pageNum, width, height, mimeType: 'image/jpeg', data };
  } finally {
    page.cleanup();
  }
}

/**
 * Renders every page of a PDF to a JPEG, in page order. Either all pages render or the
 * call fails with a DocumentReadError; a partial document is never returned.
 */
export async function rasterizePdf(
  data: Uint8Array,
  options: RasterizeOptions = {}
): Promise<PageImage[]> {
  const { dpi = DEFAULT_RENDER_DPI, quality = DEFAULT_JPEG_QUALITY } = options;
  const scale = dpi / PDF_POINTS_PER_INCH;

  const pdf = await openPdf(data);
  try {
    const images: PageImage[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      try {
        images.push(await renderPage(pdf, i, scale, quality));
      } catch (err) {
        console.warn(`[rasterize] Page ${i}/${pdf.numPages} failed:`, err);
        throw new DocumentReadError(`Could not render page ${i}: ${describeError(err)}`, {
          cause: err,
        });
      }
    }
    return images;
  } finally {
    await pdf.destroy();
  }
}

/** Rasterizes several documents and concatenates their pages in input order. */
export async function rasterizeDocuments(
  sources: readonly PdfSource[],
  options: RasterizeOptions = {}
): Promise<PageImage[]> {
  const all: PageImage[] = [];
  for (const source of sources) {
    try {
      all.push(...(await rasterizePdf(source.data, options)));
    } catch (err) {
      if (err instanceof DocumentReadError) {
        throw new DocumentReadError(`${source.name}: ${err.message}`, {
          cause: err.cause,
          documentName: source.name,
        });
      }
      throw err;
    }
  }
  return all;
}
