import type { Rgb } from './pixelGrid';

/**
 * Expands short hex (e.g. "03F") to full 6-digit hex (e.g. "0033FF").
 * Handles optional # prefix.
 */
const normalizeHex = (hex: string): string => {
  const c = hex.startsWith('#') ? hex.slice(1) : hex;
  if (c.length === 3) {
    return c
      .split('')
      .map((x) => x + x)
      .join('');
  }
  return c;
};

/**
 * Parse hex color to RGB components (0-255). Returns null for malformed input.
 */
export const hexToRgb = (hex: string): [number, number, number] | null => {
  const expanded = normalizeHex(hex.trim());
  if (!/^[a-f\d]{6}$/i.test(expanded)) {
    return null;
  }
  return [
    parseInt(expanded.slice(0, 2), 16),
    parseInt(expanded.slice(2, 4), 16),
    parseInt(expanded.slice(4, 6), 16),
  ];
};

export const rgbToHex = (color: Rgb): string => {
  const toHex = (n: number) =>
    Math.round(n)
      .toString(16)
      .padStart(2, '0')
      .toUpperCase();

  return `#${toHex(color[0])}${toHex(color[1])}${toHex(color[2])}`;
};

function isChannel(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Accepts `[r, g, b]` tuples (integers 0-255) or hex strings.
 */
export function parseColor(input: Rgb | string): [number, number, number] | null {
  if (typeof input === 'string') {
    return hexToRgb(input);
  }
  if (input.length !== 3 || !input.every(isChannel)) {
    return null;
  }
  return [input[0], input[1], input[2]];
}

/**
 * Per-channel tolerance check: |a[c] - b[c]| <= maxDiff[c] for every channel.
 */
export function colorsWithin(
  r1: number,
  g1: number,
  b1: number,
  r2: number,
  g2: number,
  b2: number,
  maxDiff: Rgb
): boolean {
  return (
    Math.abs(r1 - r2) <= maxDiff[0] &&
    Math.abs(g1 - g2) <= maxDiff[1] &&
    Math.abs(b1 - b2) <= maxDiff[2]
  );
}

/**
 * Mean absolute per-channel distance.
 */
export function meanChannelDistance(
  r1: number,
  g1: number,
  b1: number,
  r2: number,
  g2: number,
  b2: number
): number {
  return (Math.abs(r1 - r2) + Math.abs(g1 - g2) + Math.abs(b1 - b2)) / 3;
}

/**
 * Linear mix towards `other` by `t` (0 keeps `base`), rounded to 8-bit channels.
 */
export function mixRgb(base: Rgb, other: Rgb, t: number): [number, number, number] {
  return [
    Math.round(base[0] + (other[0] - base[0]) * t),
    Math.round(base[1] + (other[1] - base[1]) * t),
    Math.round(base[2] + (other[2] - base[2]) * t),
  ];
}
