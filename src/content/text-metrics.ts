/**
 * Standard Font Metrics
 *
 * Default `TextMeasurer` backed by the Standard 14 AFM data in
 * @pdf-lib/standard-fonts. `measure` sums real glyph widths; `extent`
 * reports a coarse width (half an em per character) with the font's
 * ascender/descender extent.
 */

import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';
import type { FontSpec, TextExtent, TextMeasurer } from '../types.js';

/** Width used for glyphs the font or encoding does not cover, in 1/1000 em */
const MISSING_GLYPH_WIDTH = 500;
const DEFAULT_ASCENDER = 750;
const DEFAULT_DESCENDER = -250;

const fontObjectCache = new Map<FontNames, Font>();

function getFont(fontName: FontNames): Font {
  let cached = fontObjectCache.get(fontName);
  if (!cached) {
    cached = Font.load(fontName);
    fontObjectCache.set(fontName, cached);
  }
  return cached;
}

/** Closest Standard 14 font for a resolved font spec */
export function standardFontFor(font: FontSpec): FontNames {
  const { bold, italic } = font;
  switch (font.family) {
    case 'monospace':
      if (bold && italic) return FontNames.CourierBoldOblique;
      if (bold) return FontNames.CourierBold;
      if (italic) return FontNames.CourierOblique;
      return FontNames.Courier;
    case 'serif':
      if (bold && italic) return FontNames.TimesRomanBoldItalic;
      if (bold) return FontNames.TimesRomanBold;
      if (italic) return FontNames.TimesRomanItalic;
      return FontNames.TimesRoman;
    case 'symbol':
      return FontNames.Symbol;
    case 'dingbats':
      return FontNames.ZapfDingbats;
    case 'sans-serif':
      if (bold && italic) return FontNames.HelveticaBoldOblique;
      if (bold) return FontNames.HelveticaBold;
      if (italic) return FontNames.HelveticaOblique;
      return FontNames.Helvetica;
  }
}

function getGlyphName(char: string): string | undefined {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return undefined;
  if (!Encodings.WinAnsi.canEncodeUnicodeCodePoint(codePoint)) return undefined;
  return Encodings.WinAnsi.encodeUnicodeCodePoint(codePoint).name;
}

/** Width of `text` in points using real glyph widths */
export function measureTextWidth(text: string, fontName: FontNames, fontSize: number): number {
  const font = getFont(fontName);
  let totalWidth = 0;
  for (const char of text) {
    const glyphName = getGlyphName(char);
    totalWidth += (glyphName ? font.getWidthOfGlyph(glyphName) : undefined) ?? MISSING_GLYPH_WIDTH;
  }
  return (totalWidth / 1000) * fontSize;
}

export function getFontAscender(fontName: FontNames): number {
  const ascender = getFont(fontName).Ascender;
  return typeof ascender === 'number' ? ascender : DEFAULT_ASCENDER;
}

/** Negative, in 1/1000 em */
export function getFontDescender(fontName: FontNames): number {
  const descender = getFont(fontName).Descender;
  return typeof descender === 'number' ? descender : DEFAULT_DESCENDER;
}

export const standardFontMeasurer: TextMeasurer = {
  measure(text: string, font: FontSpec): number {
    return measureTextWidth(text, standardFontFor(font), font.size);
  },

  extent(text: string, font: FontSpec): TextExtent {
    const name = standardFontFor(font);
    const ascender = getFontAscender(name);
    const descender = getFontDescender(name);
    return {
      width: 0.5 * font.size * text.length,
      height: ((ascender - descender) / 1000) * font.size,
      descent: (Math.abs(descender) / 1000) * font.size,
    };
  },
};
