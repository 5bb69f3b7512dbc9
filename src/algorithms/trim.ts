import { type Rect } from '../types/rect.js';

/**
 * Multiplies the color channels of every RGBA pixel by its alpha, in place.
 */
export function premultiplyAlpha(data: Uint8Array): void {
  for (let i = 0; i + 3 < data.length; i += 4) {
    const a = data[i + 3];
    data[i] = Math.floor((data[i] * a) / 255);
    data[i + 1] = Math.floor((data[i + 1] * a) / 255);
    data[i + 2] = Math.floor((data[i + 2] * a) / 255);
  }
}

/**
 * Bounding box of all pixels with non-zero alpha.
 * Returns null for a fully transparent image.
 */
export function findOpaqueBounds(data: Uint8Array, width: number, height: number): Rect | null {
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (data[(y * width + x) * 4 + 3] > 0) {
        if (x < minX) minX = x;
        if (y < minY) minY = y;
        if (x > maxX) maxX = x;
        if (y > maxY) maxY = y;
      }
    }
  }

  if (maxX < 0) return null;
  return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

/**
 * Copies the `bounds` region out of a row-major RGBA buffer of the given width.
 */
export function cropRgba(data: Uint8Array, width: number, bounds: Rect): Uint8Array {
  const out = new Uint8Array(bounds.width * bounds.height * 4);
  const rowBytes = bounds.width * 4;

  for (let y = 0; y < bounds.height; y++) {
    const src = ((bounds.y + y) * width + bounds.x) * 4;
    out.set(data.subarray(src, src + rowBytes), y * rowBytes);
  }

  return out;
}
