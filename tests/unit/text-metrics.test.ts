import { describe, it, expect } from 'vitest';
import { FontNames } from '@pdf-lib/standard-fonts';
import {
  getFontAscender, getFontDescender, measureTextWidth, standardFontFor, standardFontMeasurer,
} from '../../src/content/text-metrics.js';
import { FontResolver, fontSpec } from '../../src/content/font-resolver.js';

const resolver = new FontResolver();
const spec = (baseFont: string, size: number) => fontSpec(resolver.resolve(baseFont), size, 1);

describe('standardFontFor', () => {
  it('picks the Standard 14 variant by family and style', () => {
    expect(standardFontFor(spec('Courier-BoldOblique', 10))).toBe(FontNames.CourierBoldOblique);
    expect(standardFontFor(spec('Times-Roman', 10))).toBe(FontNames.TimesRoman);
    expect(standardFontFor(spec('Helvetica-Bold', 10))).toBe(FontNames.HelveticaBold);
    expect(standardFontFor(spec('Unknown', 10))).toBe(FontNames.Helvetica);
    expect(standardFontFor(spec('ZapfDingbats', 10))).toBe(FontNames.ZapfDingbats);
  });
});

describe('measureTextWidth', () => {
  it('sums glyph widths', () => {
    expect(measureTextWidth('abc', FontNames.Courier, 10)).toBeCloseTo(18);
  });

  it('uses a default width for glyphs outside WinAnsi', () => {
    expect(measureTextWidth('aā', FontNames.Courier, 10)).toBeCloseTo(11);
  });
});

describe('font extents', () => {
  it('reads ascender and descender from the AFM data', () => {
    expect(getFontAscender(FontNames.Helvetica)).toBe(718);
    expect(getFontDescender(FontNames.Helvetica)).toBe(-207);
  });

  it('reports a coarse width with the vertical extent', () => {
    const extent = standardFontMeasurer.extent('abcd', spec('Helvetica', 10));
    expect(extent.width).toBe(20);
    expect(extent.height).toBeCloseTo(9.25);
    expect(extent.descent).toBeCloseTo(2.07);
  });
});
