/**
 * Graphics State
 *
 * Plain value record of the current paint and text parameters. Save pushes
 * a deep copy (`cloneGraphicsState`); restore swaps the popped copy back in.
 * Colors are stored as 8-bit RGB with a separate 0..1 alpha that is composed
 * only when a pen, brush or font color is read.
 */

import type { FillRule, LineCap, LineJoin, Matrix, Rgb, Rgba } from '../types.js';
import { BLACK } from './color.js';
import { identityMatrix } from './matrix.js';
import type { PathSegment } from './path.js';

/**
 * Color-space family selected by CS / cs. Only the device families take
 * SC / sc components; `Other` covers patterns and every unsupported space.
 */
export type ColorFamily = 'DeviceGray' | 'DeviceRGB' | 'DeviceCMYK' | 'Other';

/** Line cap and join styles by their PDF index */
export const LINE_CAPS: readonly LineCap[] = ['butt', 'round', 'projecting'];
export const LINE_JOINS: readonly LineJoin[] = ['miter', 'round', 'bevel'];

/** Minimum line width; thinner lines vanish on most rasterizers */
export const MIN_LINE_WIDTH = 1.0;

export interface DashPattern {
  array: number[];
  phase: number;
}

/** A clipping path recorded at a paint operator; never intersected */
export interface ClipRecord {
  segments: PathSegment[];
  rule: FillRule;
}

export interface TextState {
  /** Text matrix */
  matrix: Matrix;
  /** Text-line matrix */
  lineMatrix: Matrix;
  charSpacing: number;
  wordSpacing: number;
  /** Horizontal scaling as a fraction (Tz 100 = 1.0) */
  horizontalScaling: number;
  leading: number;
  /** Font resource name selected by Tf */
  fontName: string | null;
  fontSize: number;
  rise: number;
  renderMode: number;
}

export interface GraphicsState {
  strokeColor: Rgb;
  fillColor: Rgb;
  strokeAlpha: number;
  fillAlpha: number;
  strokeFamily: ColorFamily;
  fillFamily: ColorFamily;
  lineWidth: number;
  lineCap: LineCap;
  lineJoin: LineJoin;
  dash: DashPattern;
  miterLimit: number;
  strokeAdjustment: boolean;
  overprintStroke: boolean;
  overprintFill: boolean;
  overprintMode: number;
  /** Stored only; blending is not performed */
  blendMode: string;
  renderingIntent: string;
  flatness: number;
  clips: ClipRecord[];
  text: TextState;
}

export function createTextState(): TextState {
  return {
    matrix: identityMatrix(),
    lineMatrix: identityMatrix(),
    charSpacing: 0,
    wordSpacing: 0,
    horizontalScaling: 1,
    leading: 0,
    fontName: null,
    fontSize: 0,
    rise: 0,
    renderMode: 0,
  };
}

export function createGraphicsState(): GraphicsState {
  return {
    strokeColor: { ...BLACK },
    fillColor: { ...BLACK },
    strokeAlpha: 1,
    fillAlpha: 1,
    strokeFamily: 'DeviceGray',
    fillFamily: 'DeviceGray',
    lineWidth: MIN_LINE_WIDTH,
    lineCap: 'butt',
    lineJoin: 'miter',
    dash: { array: [], phase: 0 },
    miterLimit: 10,
    strokeAdjustment: false,
    overprintStroke: false,
    overprintFill: false,
    overprintMode: 0,
    blendMode: 'Normal',
    renderingIntent: 'RelativeColorimetric',
    flatness: 0,
    clips: [],
    text: createTextState(),
  };
}

/** Deep copy: nothing mutable is shared with the source */
export function cloneGraphicsState(state: GraphicsState): GraphicsState {
  return {
    ...state,
    strokeColor: { ...state.strokeColor },
    fillColor: { ...state.fillColor },
    dash: { array: [...state.dash.array], phase: state.dash.phase },
    clips: state.clips.map((clip) => ({
      segments: clip.segments.map((segment) => ({ ...segment })),
      rule: clip.rule,
    })),
    text: {
      ...state.text,
      matrix: [...state.text.matrix],
      lineMatrix: [...state.text.lineMatrix],
    },
  };
}

export function fillColorWithAlpha(state: GraphicsState): Rgba {
  return withAlpha(state.fillColor, state.fillAlpha);
}

export function strokeColorWithAlpha(state: GraphicsState): Rgba {
  return withAlpha(state.strokeColor, state.strokeAlpha);
}

function withAlpha(color: Rgb, alpha: number): Rgba {
  const clamped = Number.isFinite(alpha) ? Math.min(1, Math.max(0, alpha)) : 1;
  return { r: color.r, g: color.g, b: color.b, a: Math.round(clamped * 255) };
}

/** Line width with the minimum applied */
export function clampLineWidth(width: number): number {
  return Number.isFinite(width) ? Math.max(MIN_LINE_WIDTH, width) : MIN_LINE_WIDTH;
}
