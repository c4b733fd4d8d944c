/**
 * Image masking: color-key ranges and explicit mask images.
 */

import type { BitmapMask, Rgb } from '../types.js';
import { InvariantError } from '../errors.js';
import { deindex } from './deindex.js';

/** Inclusive per-channel ranges [rMin, rMax, gMin, gMax, bMin, bMax] */
export type ColorKeyRanges = readonly [number, number, number, number, number, number];

const BLACK_WHITE = new Uint8Array([0, 0, 0, 255, 255, 255]);

/**
 * Validate a /Mask color-key array: six integers in 0..255.
 * Throws `InvariantError` otherwise.
 */
export function toColorKeyRanges(values: readonly number[]): ColorKeyRanges {
  if (values.length !== 6) {
    throw new InvariantError(`Color key mask needs 6 values, got ${values.length}`);
  }
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v > 255) {
      throw new InvariantError(`Color key value ${v} is not an integer in 0..255`);
    }
  }
  return [values[0], values[1], values[2], values[3], values[4], values[5]];
}

/** The replacement color for keyed pixels: the upper bound of each range */
export function colorKeyOf(ranges: ColorKeyRanges): Rgb {
  return { r: ranges[1], g: ranges[3], b: ranges[5] };
}

/**
 * Copy of packed RGB data with every pixel inside all three ranges
 * replaced by the key color.
 */
export function applyColorKey(rgb: Uint8Array, ranges: ColorKeyRanges): { data: Uint8Array; maskedCount: number } {
  if (rgb.length % 3 !== 0) {
    throw new InvariantError(`RGB data length ${rgb.length} is not a multiple of 3`);
  }
  const [r1, r9, g1, g9, b1, b9] = ranges;
  const data = new Uint8Array(rgb);
  let maskedCount = 0;

  for (let pos = 0; pos < data.length; pos += 3) {
    const r = data[pos];
    const g = data[pos + 1];
    const b = data[pos + 2];
    if (r >= r1 && r <= r9 && g >= g1 && g <= g9 && b >= b1 && b <= b9) {
      data[pos] = r9;
      data[pos + 1] = g9;
      data[pos + 2] = b9;
      maskedCount++;
    }
  }

  return { data, maskedCount };
}

export function colorKeyMask(width: number, height: number, rgb: Uint8Array, ranges: ColorKeyRanges): BitmapMask {
  return {
    source: 'color-key',
    width,
    height,
    data: applyColorKey(rgb, ranges).data,
    transparent: colorKeyOf(ranges),
  };
}

/** Mask from decoded 1-bit mask-image samples: set bits are transparent (white) */
export function maskImageMask(width: number, height: number, samples: Uint8Array): BitmapMask {
  return {
    source: 'mask-image',
    width,
    height,
    data: deindex(width, height, samples, 1, BLACK_WHITE),
    transparent: { r: 255, g: 255, b: 255 },
  };
}
