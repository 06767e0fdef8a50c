/**
 * PixelGrid - interleaved 8-bit raster used by every simulator plane
 *
 * RGB planes use 3 channels, bookkeeping planes (visited, similar) use 1.
 * Pixel (x, y) lives at `(y * width + x) * channels`.
 */

export type Rgb = readonly [number, number, number];

export type PixelChannels = 1 | 3;

export interface PixelGrid {
  width: number;
  height: number;
  channels: PixelChannels;
  data: Uint8ClampedArray;
}

export function createPixelGrid(width: number, height: number, channels: PixelChannels): PixelGrid {
  return {
    width,
    height,
    channels,
    data: new Uint8ClampedArray(width * height * channels),
  };
}

export function clonePixelGrid(grid: PixelGrid): PixelGrid {
  return {
    width: grid.width,
    height: grid.height,
    channels: grid.channels,
    data: new Uint8ClampedArray(grid.data),
  };
}

export function sameGridSize(a: PixelGrid, b: PixelGrid): boolean {
  return a.width === b.width && a.height === b.height;
}

export function pixelCount(grid: PixelGrid): number {
  return grid.width * grid.height;
}

/**
 * Index of the pixel nearest to (x, y), or -1 outside the grid.
 */
export function roundedPixelIndex(grid: PixelGrid, x: number, y: number): number {
  const px = Math.round(x);
  const py = Math.round(y);
  if (px < 0 || py < 0 || px >= grid.width || py >= grid.height) return -1;
  return py * grid.width + px;
}

export function fillRgb(grid: PixelGrid, color: Rgb): void {
  const { data } = grid;
  for (let i = 0; i < data.length; i += 3) {
    data[i] = color[0];
    data[i + 1] = color[1];
    data[i + 2] = color[2];
  }
}

export function getRgbAt(grid: PixelGrid, index: number): [number, number, number] {
  const offset = index * 3;
  return [grid.data[offset], grid.data[offset + 1], grid.data[offset + 2]];
}

export function setRgbAt(grid: PixelGrid, index: number, color: Rgb): void {
  const offset = index * 3;
  grid.data[offset] = color[0];
  grid.data[offset + 1] = color[1];
  grid.data[offset + 2] = color[2];
}

export function rgbEqualsAt(grid: PixelGrid, index: number, color: Rgb): boolean {
  const offset = index * 3;
  return (
    grid.data[offset] === color[0] &&
    grid.data[offset + 1] === color[1] &&
    grid.data[offset + 2] === color[2]
  );
}

/**
 * Copies `src` into `dest`. Both grids must share size and channel count.
 */
export function copyPixelGrid(src: PixelGrid, dest: PixelGrid): void {
  if (!sameGridSize(src, dest) || src.channels !== dest.channels) {
    const from = `${src.width}x${src.height}x${src.channels}`;
    const to = `${dest.width}x${dest.height}x${dest.channels}`;
    throw new Error(`[PixelGrid] Cannot copy ${from} into ${to}`);
  }
  dest.data.set(src.data);
}

/**
 * Returns a reason string when the grid is not a usable RGB raster, null otherwise.
 */
export function describeInvalidRgbGrid(grid: PixelGrid): string | null {
  const { width, height, channels, data } = grid;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return `invalid dimensions ${width}x${height}`;
  }
  if (channels !== 3) {
    return `expected 3 channels, got ${channels}`;
  }
  if (data.length !== width * height * 3) {
    return `buffer length ${data.length} does not match ${width}x${height}x3`;
  }
  return null;
}
