import { createCanvas, loadImage } from '@napi-rs/canvas';
import type { PageImage, PixelRect } from '../../types/verification';
import { normalizeBox } from '../ai/normalizeFinding';
import { DEFAULT_JPEG_QUALITY } from '../config';

const NORMALIZED_MAX = 1000;

export interface CropPadding {
  /** fraction of the box height added above and again below */
  y: number;
  /** fraction of the box width added left and again right */
  x: number;
}

// Model boxes hug the cited value; padding brings the field label into the crop.
export const DEFAULT_CROP_PADDING: CropPadding = { y: 0.5, x: 0.3 };

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(v, hi));
}

/**
 * Maps a 0-1000 normalized box to a padded pixel rectangle inside a width x height image.
 * Returns null when the box does not normalize to four finite numbers.
 */
export function computeCropRect(
  box: unknown,
  width: number,
  height: number,
  padding: CropPadding = DEFAULT_CROP_PADDING
): PixelRect | null {
  const normalized = normalizeBox(box);
  if (!normalized || width < 1 || height < 1) return null;

  let [ymin, xmin, ymax, xmax] = normalized;
  if (ymin > ymax) [ymin, ymax] = [ymax, ymin];
  if (xmin > xmax) [xmin, xmax] = [xmax, xmin];

  const padY = (ymax - ymin) * padding.y;
  const padX = (xmax - xmin) * padding.x;

  const top = clamp(ymin - padY, 0, NORMALIZED_MAX);
  const left = clamp(xmin - padX, 0, NORMALIZED_MAX);
  const bottom = Math.max(top + 1, clamp(ymax + padY, 0, NORMALIZED_MAX));
  const right = Math.max(left + 1, clamp(xmax + padX, 0, NORMALIZED_MAX));

  const topPx = clamp(Math.round((top / NORMALIZED_MAX) * height), 0, height - 1);
  const leftPx = clamp(Math.round((left / NORMALIZED_MAX) * width), 0, width - 1);
  const bottomPx = clamp(Math.round((bottom / NORMALIZED_MAX) * height), topPx + 1, height);
  const rightPx = clamp(Math.round((right / NORMALIZED_MAX) * width), leftPx + 1, width);

  return { left: leftPx, top: topPx, right: rightPx, bottom: bottomPx };
}

export interface CropOptions {
  padding?: CropPadding;
  quality?: number;
}

/**
 * Cuts the evidence region out of a page image. A box that is not four numbers yields
 * the original image unchanged.
 */
export async function cropEvidenceRegion(
  image: PageImage,
  box: unknown,
  options: CropOptions = {}
): Promise<PageImage> {
  const rect = computeCropRect(box, image.width, image.height, options.padding);
  if (!rect) return image;

  const w = rect.right - rect.left;
  const h = rect.bottom - rect.top;

  const source = await loadImage(image.data);
  const canvas = createCanvas(w, h);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(source, rect.left, rect.top, w, h, 0, 0, w, h);

  const data = await canvas.encode('jpeg', options.quality ?? DEFAULT_JPEG_QUALITY);
  return { pageNumber: image.pageNumber, width: w, height: h, mimeType: 'image/jpeg', data };
}

/** Scales an image up proportionally so it is at least minHeight pixels tall. */
export async function ensureMinHeight(
  image: PageImage,
  minHeight: number,
  quality: number = DEFAULT_JPEG_QUALITY
): Promise<PageImage> {
  if (image.height <= 0 || image.height >= minHeight) return image;

  const w = Math.max(1, Math.round((image.width * minHeight) / image.height));
  const source = await loadImage(image.data);
  const canvas = createCanvas(w, minHeight);
  const ctx = canvas.getContext('2d');
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(source, 0, 0, w, minHeight);

  const data = await canvas.encode('jpeg', quality);
  return { pageNumber: image.pageNumber, width: w, height: minHeight, mimeType: 'image/jpeg', data };
}
