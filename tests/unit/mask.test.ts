import { describe, it, expect } from 'vitest';
import {
  applyColorKey, colorKeyMask, colorKeyOf, maskImageMask, toColorKeyRanges,
} from '../../src/image/mask.js';
import { InvariantError } from '../../src/errors.js';

describe('toColorKeyRanges', () => {
  it('accepts six integers in range', () => {
    expect(toColorKeyRanges([250, 255, 0, 5, 0, 5])).toEqual([250, 255, 0, 5, 0, 5]);
  });

  it('rejects a wrong count or out-of-range values', () => {
    expect(() => toColorKeyRanges([0, 1, 2])).toThrow(InvariantError);
    expect(() => toColorKeyRanges([0, 256, 0, 0, 0, 0])).toThrow(InvariantError);
    expect(() => toColorKeyRanges([0, 1.5, 0, 0, 0, 0])).toThrow(InvariantError);
  });
});

describe('applyColorKey', () => {
  const ranges = toColorKeyRanges([250, 255, 0, 5, 0, 5]);

  it('replaces pixels inside every range with the upper bounds', () => {
    const rgb = new Uint8Array([252, 3, 1, 252, 6, 1, 10, 10, 10]);
    const { data, maskedCount } = applyColorKey(rgb, ranges);
    expect(Array.from(data)).toEqual([255, 5, 5, 252, 6, 1, 10, 10, 10]);
    expect(maskedCount).toBe(1);
    expect(rgb[0]).toBe(252);
  });

  it('requires whole pixels', () => {
    expect(() => applyColorKey(new Uint8Array(4), ranges)).toThrow(InvariantError);
  });

  it('builds a color-key mask', () => {
    const mask = colorKeyMask(1, 1, new Uint8Array([255, 0, 0]), ranges);
    expect(mask).toEqual({
      source: 'color-key', width: 1, height: 1, data: new Uint8Array([255, 5, 5]), transparent: { r: 255, g: 5, b: 5 },
    });
    expect(colorKeyOf(ranges)).toEqual({ r: 255, g: 5, b: 5 });
  });
});

describe('maskImageMask', () => {
  it('makes set bits white and transparent', () => {
    const mask = maskImageMask(2, 1, new Uint8Array([0b01000000]));
    expect(Array.from(mask.data)).toEqual([0, 0, 0, 255, 255, 255]);
    expect(mask.transparent).toEqual({ r: 255, g: 255, b: 255 });
    expect(mask.source).toBe('mask-image');
  });
});
