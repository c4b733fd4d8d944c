/**
 * Text layout for the text-showing operators.
 *
 * A shown string becomes one SetFont followed by a DrawText per run. Runs
 * are split on spaces when word spacing is set, and each run advances the
 * text matrix by its measured width plus the word spacing. Character
 * spacing, horizontal scaling and TJ kerning are kept in the state but do
 * not move the pen.
 */

import type { DrawCommand, TextMeasurer } from '../types.js';
import type { GraphicsState } from './graphics-state.js';
import { fillColorWithAlpha } from './graphics-state.js';
import { fontSpec, type ResolvedFont } from './font-resolver.js';
import { flip } from './matrix.js';

export interface TextLayoutOptions {
  readonly measurer: TextMeasurer;
  /** Scale applied to the font used for measuring */
  readonly fontScaleMetrics: number;
  /** Scale applied to the font handed to the rasterizer */
  readonly fontScaleSize: number;
}

/** Decode string operand bytes as Latin-1 */
export function decodeLatin1(bytes: Uint8Array): string {
  let text = '';
  for (let i = 0; i < bytes.length; i++) {
    text += String.fromCharCode(bytes[i]);
  }
  return text;
}

/**
 * Lay out `text` at the current text position and advance the text matrix.
 */
export function layoutText(
  text: string,
  state: GraphicsState,
  font: ResolvedFont,
  options: TextLayoutOptions,
): DrawCommand[] {
  const ts = state.text;
  const metricsFont = fontSpec(font, ts.fontSize, options.fontScaleMetrics);
  const commands: DrawCommand[] = [
    { op: 'SetFont', font: fontSpec(font, ts.fontSize, options.fontScaleSize), color: fillColorWithAlpha(state) },
  ];

  const runs = ts.wordSpacing !== 0 ? text.split(' ') : [text];

  runs.forEach((run, index) => {
    const measured = index < runs.length - 1 ? `${run} ` : run;
    const x = ts.matrix[4];
    const y = ts.matrix[5] + ts.rise;

    const extent = options.measurer.extent(measured, metricsFont);
    const precise = font.known ? options.measurer.measure?.(measured, metricsFont) : undefined;
    const width = precise ?? extent.width;
    ts.matrix[4] += width + ts.wordSpacing;

    if (run.length > 0) {
      commands.push({ op: 'DrawText', text: run, x, y: flip(y) - (extent.height - extent.descent) });
    }
  });

  return commands;
}
