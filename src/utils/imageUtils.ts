/**
 * Image conversion helpers between host RGBA images and simulator planes
 */

import { createPixelGrid, type PixelGrid } from './pixelGrid';

/**
 * ImageData-shaped RGBA image (4 bytes per pixel, row-major).
 */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/**
 * Host surface the draw calls render onto, e.g. a CanvasRenderingContext2D adapter.
 */
export interface DisplaySurface {
  putImageData(image: RgbaImage, dx: number, dy: number): void;
}

/**
 * Drops the alpha channel. Pixels are not premultiplied; alpha is ignored.
 * Returns null when the buffer does not match the declared size.
 */
export function rgbaImageToPixelGrid(image: RgbaImage): PixelGrid | null {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return null;
  }
  if (data.length !== width * height * 4) {
    return null;
  }

  const grid = createPixelGrid(width, height, 3);
  const out = grid.data;
  for (let src = 0, dst = 0; src < data.length; src += 4, dst += 3) {
    out[dst] = data[src];
    out[dst + 1] = data[src + 1];
    out[dst + 2] = data[src + 2];
  }
  return grid;
}

/**
 * Expands an RGB or single-channel grid into an opaque RGBA image.
 * Single-channel values are written as gray.
 */
export function pixelGridToRgbaImage(grid: PixelGrid): RgbaImage {
  const { width, height, channels, data } = grid;
  const out = new Uint8ClampedArray(width * height * 4);

  for (let i = 0, src = 0; i < width * height; i++, src += channels) {
    const dst = i * 4;
    if (channels === 3) {
      out[dst] = data[src];
      out[dst + 1] = data[src + 1];
      out[dst + 2] = data[src + 2];
    } else {
      const v = data[src];
      out[dst] = v;
      out[dst + 1] = v;
      out[dst + 2] = v;
    }
    out[dst + 3] = 255;
  }

  return { width, height, data: out };
}
