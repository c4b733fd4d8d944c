import { describe, it, expect } from 'vitest';
import { cmykToRgb, grayToRgb, rgbToRgb, toByte } from '../../src/content/color.js';

describe('color conversion', () => {
  it('scales and rounds components', () => {
    expect(toByte(0)).toBe(0);
    expect(toByte(1)).toBe(255);
    expect(toByte(0.5)).toBe(128);
  });

  it('clamps out-of-range components', () => {
    expect(toByte(1.7)).toBe(255);
    expect(toByte(-0.2)).toBe(0);
    expect(toByte(Number.NaN)).toBe(0);
  });

  it('replicates gray across channels', () => {
    expect(grayToRgb(0.2)).toEqual({ r: 51, g: 51, b: 51 });
  });

  it('converts RGB components', () => {
    expect(rgbToRgb(1, 0, 0.5)).toEqual({ r: 255, g: 0, b: 128 });
  });

  it('converts CMYK naively', () => {
    expect(cmykToRgb(0, 0, 0, 1)).toEqual({ r: 0, g: 0, b: 0 });
    expect(cmykToRgb(0, 0, 0, 0)).toEqual({ r: 255, g: 255, b: 255 });
    expect(cmykToRgb(1, 0, 0, 0)).toEqual({ r: 0, g: 255, b: 255 });
    expect(cmykToRgb(0, 0.5, 0, 0.5)).toEqual({ r: 128, g: 64, b: 128 });
  });
});
