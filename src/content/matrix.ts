/**
 * Matrix utilities for 2D affine transforms in PDF order [a, b, c, d, e, f].
 */

import type { Matrix } from '../types.js';

export function identityMatrix(): Matrix {
  return [1, 0, 0, 1, 0, 0];
}

/** Negate without producing -0 (0 - 0 is +0) */
export function flip(v: number): number {
  return 0 - v;
}

/**
 * Convert a user-space `cm` matrix to device space (y axis pointing down):
 * b, c and f change sign.
 */
export function toDeviceTransform(m: Readonly<Matrix>): Matrix {
  return [m[0], flip(m[1]), flip(m[2]), m[3], m[4], flip(m[5])];
}

/** Matrix from six numbers, or null when fewer are given */
export function matrixFrom(values: readonly number[]): Matrix | null {
  if (values.length < 6) return null;
  return [values[0], values[1], values[2], values[3], values[4], values[5]];
}
