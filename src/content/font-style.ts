/**
 * Font Style Detection
 *
 * Parses PDF font names to detect bold and italic styles.
 * PDF fonts encode style in the BaseFont name (e.g. "Helvetica-BoldOblique",
 * "ABCDEF+Inter-SemiBold", "TimesNewRomanPS-ItalicMT").
 */

export interface FontStyle {
  bold: boolean;
  italic: boolean;
}

/** Strip a subset prefix such as "ABCDEF+" */
export function stripSubsetPrefix(fontName: string): string {
  return fontName.replace(/^[A-Z]{6}\+/, '');
}

/**
 * Detect bold/italic from a PDF font name: any occurrence of "bold" means
 * bold, "italic" or "oblique" means italic, case-insensitively.
 *
 * - "Helvetica-Bold", "Helvetica-BoldOblique"
 * - "TimesNewRomanPS-ItalicMT"
 * - "ArialMT,Bold", "Arial,BoldItalic"
 */
export function detectFontStyle(fontName: string): FontStyle {
  const name = stripSubsetPrefix(fontName).toLowerCase();

  return {
    bold: name.includes('bold'),
    italic: name.includes('italic') || name.includes('oblique'),
  };
}
