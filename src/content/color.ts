/**
 * Device color conversions to 8-bit RGB.
 * Components arrive in the 0..1 range and are clamped before scaling.
 */

import type { Rgb } from '../types.js';

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };

/** 0..1 component to a 0..255 channel byte */
export function toByte(v: number): number {
  const clamped = Number.isFinite(v) ? Math.min(1, Math.max(0, v)) : 0;
  return Math.round(clamped * 255);
}

export function rgbToRgb(r: number, g: number, b: number): Rgb {
  return { r: toByte(r), g: toByte(g), b: toByte(b) };
}

/** Gray (0 = black, 1 = white) replicated across the three channels */
export function grayToRgb(gray: number): Rgb {
  const v = toByte(gray);
  return { r: v, g: v, b: v };
}

/** Naive CMYK conversion: R = (1 - C)(1 - K) and likewise for G and B */
export function cmykToRgb(c: number, m: number, y: number, k: number): Rgb {
  const black = 1 - clamp01(k);
  return {
    r: toByte((1 - clamp01(c)) * black),
    g: toByte((1 - clamp01(m)) * black),
    b: toByte((1 - clamp01(y)) * black),
  };
}

function clamp01(v: number): number {
  return Number.isFinite(v) ? Math.min(1, Math.max(0, v)) : 0;
}
