/**
 * Font Resolution
 *
 * Maps a BaseFont string to the family, face and style a rasterizer should
 * use. Matching is by case-insensitive substring; names that match none of
 * the known families fall back to a sans-serif face and are collected in
 * `missingFonts` for the lifetime of the resolver (one document session).
 */

import type { FontFamily, FontSpec } from '../types.js';
import { detectFontStyle } from './font-style.js';

export interface ResolvedFont {
  readonly baseFont: string | null;
  readonly family: FontFamily;
  readonly face: string;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly known: boolean;
}

interface FamilyRule {
  readonly token: string;
  readonly family: FontFamily;
  readonly face: string;
}

/** First matching token wins */
const FAMILY_RULES: readonly FamilyRule[] = [
  { token: 'courier', family: 'monospace', face: 'Courier New' },
  { token: 'helvetica', family: 'sans-serif', face: 'Arial' },
  { token: 'times', family: 'serif', face: 'Times New Roman' },
  { token: 'symbol', family: 'symbol', face: 'Symbol' },
  { token: 'zapfdingbats', family: 'dingbats', face: 'Wingdings' },
];

const FALLBACK: FamilyRule = { token: '', family: 'sans-serif', face: 'Arial' };

export class FontResolver {
  private readonly missing = new Set<string>();

  /** BaseFont names that matched no known family */
  get missingFonts(): ReadonlySet<string> {
    return this.missing;
  }

  resolve(baseFont: string | null): ResolvedFont {
    if (baseFont === null) {
      return { baseFont, family: FALLBACK.family, face: FALLBACK.face, bold: false, italic: false, known: false };
    }

    const lower = baseFont.toLowerCase();
    const rule = FAMILY_RULES.find((r) => lower.includes(r.token));
    if (!rule) this.missing.add(baseFont);

    const { bold, italic } = detectFontStyle(baseFont);
    const matched = rule ?? FALLBACK;
    return { baseFont, family: matched.family, face: matched.face, bold, italic, known: rule !== undefined };
  }
}

/** Font handed to the rasterizer: sizes below 1 are raised to 1, then scaled */
export function fontSpec(font: ResolvedFont, size: number, scale: number): FontSpec {
  return {
    baseFont: font.baseFont,
    family: font.family,
    face: font.face,
    size: Math.max(1, size) * scale,
    bold: font.bold,
    italic: font.italic,
    known: font.known,
  };
}
