/**
 * Transform fold pass.
 *
 * An image is drawn by a `cm` that scales the unit square to the image's
 * size, followed by the bitmap draw. Rasterizers draw bitmaps at their pixel
 * size, so the scale moves from the transform into the DrawBitmap rectangle:
 *
 *   ConcatTransform(sx, b, c, sy, e, f), DrawBitmap(bmp, x, y, w, h)
 *   → ConcatTransform(1, b/sx, c/sy, 1, e, f), DrawBitmap(bmp, x, -sy, sx, sy)
 *
 * Transforms with a zero diagonal entry (rotated images) are left alone.
 */

import type { DrawCommand } from '../types.js';
import { flip } from './matrix.js';

/** Fold transforms into the bitmap draws that follow them; the input is not modified */
export function foldTransforms(commands: readonly DrawCommand[]): DrawCommand[] {
  const result = [...commands];

  for (let k = 0; k < result.length - 1; k++) {
    const transform = result[k];
    const draw = result[k + 1];
    if (transform.op !== 'ConcatTransform' || draw.op !== 'DrawBitmap') continue;

    const [sx, b, c, sy, e, f] = transform.matrix;
    if (sx === 0 || sy === 0) continue;

    result[k] = { op: 'ConcatTransform', matrix: [1, ratio(b, sx), ratio(c, sy), 1, e, f] };
    result[k + 1] = { ...draw, y: flip(sy), width: sx, height: sy };
  }

  return result;
}

/** Division that never yields -0 */
function ratio(value: number, divisor: number): number {
  return value / divisor + 0;
}
