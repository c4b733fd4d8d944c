/**
 * Path Accumulator
 *
 * Collects path-construction operators (m l c v y re h) in device space and
 * turns a paint operator into draw commands. Every y coordinate is negated
 * on the way in, since PDF user space points up and device space points down.
 */

import type { DrawCommand, FillRule, Pen } from '../types.js';
import type { ClipRecord, GraphicsState } from './graphics-state.js';
import { fillColorWithAlpha, strokeColorWithAlpha } from './graphics-state.js';
import { flip } from './matrix.js';

export type PathSegment =
  | { kind: 'move'; x: number; y: number }
  | { kind: 'line'; x: number; y: number }
  | { kind: 'curve'; cx1: number; cy1: number; cx2: number; cy2: number; x: number; y: number }
  | { kind: 'rect'; x: number; y: number; width: number; height: number }
  | { kind: 'close' };

/** Bezier variants: `c` gives both control points, `v` reuses the current point, `y` reuses the end point */
export type CurveVariant = 'c' | 'v' | 'y';

export type PaintOp = 'S' | 's' | 'f' | 'F' | 'f*' | 'B' | 'B*' | 'b' | 'b*' | 'n';

interface PaintAction {
  readonly stroke: boolean;
  readonly fill: boolean;
  readonly rule: FillRule;
  /** Implicit close before painting */
  readonly close: boolean;
}

const PAINT_OPS: Readonly<Record<PaintOp, PaintAction>> = {
  S: { stroke: true, fill: false, rule: 'nonzero', close: false },
  s: { stroke: true, fill: false, rule: 'nonzero', close: true },
  f: { stroke: false, fill: true, rule: 'nonzero', close: false },
  F: { stroke: false, fill: true, rule: 'nonzero', close: false },
  'f*': { stroke: false, fill: true, rule: 'evenodd', close: false },
  B: { stroke: true, fill: true, rule: 'nonzero', close: false },
  'B*': { stroke: true, fill: true, rule: 'evenodd', close: false },
  b: { stroke: true, fill: true, rule: 'nonzero', close: true },
  'b*': { stroke: true, fill: true, rule: 'evenodd', close: true },
  n: { stroke: false, fill: false, rule: 'nonzero', close: false },
};

export function isPaintOp(operator: string): operator is PaintOp {
  return Object.prototype.hasOwnProperty.call(PAINT_OPS, operator);
}

/** Draw commands of one resolved paint operator, plus the clip it recorded */
export interface ResolvedPath {
  readonly commands: DrawCommand[];
  readonly clip: ClipRecord | null;
}

export class PathAccumulator {
  private segments: PathSegment[] = [];
  private current: { x: number; y: number } | null = null;
  private subpathStart: { x: number; y: number } | null = null;
  private pendingClip: FillRule | null = null;

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  /** Segments collected so far, in device space */
  get path(): readonly PathSegment[] {
    return this.segments;
  }

  moveTo(x: number, y: number): void {
    const point = { x, y: flip(y) };
    this.segments.push({ kind: 'move', ...point });
    this.current = point;
    this.subpathStart = point;
  }

  lineTo(x: number, y: number): void {
    const point = { x, y: flip(y) };
    this.segments.push({ kind: 'line', ...point });
    this.current = point;
  }

  /**
   * Append a Bezier curve. `values` holds the operator's operands:
   * six for `c`, four for `v` and `y`.
   */
  curveTo(variant: CurveVariant, values: readonly number[]): void {
    let segment: PathSegment;
    switch (variant) {
      case 'c':
        segment = {
          kind: 'curve',
          cx1: values[0], cy1: flip(values[1]),
          cx2: values[2], cy2: flip(values[3]),
          x: values[4], y: flip(values[5]),
        };
        break;
      case 'v': {
        const start = this.current ?? { x: values[0], y: flip(values[1]) };
        segment = {
          kind: 'curve',
          cx1: start.x, cy1: start.y,
          cx2: values[0], cy2: flip(values[1]),
          x: values[2], y: flip(values[3]),
        };
        break;
      }
      case 'y':
        segment = {
          kind: 'curve',
          cx1: values[0], cy1: flip(values[1]),
          cx2: values[2], cy2: flip(values[3]),
          x: values[2], y: flip(values[3]),
        };
        break;
    }
    this.segments.push(segment);
    this.current = { x: segment.x, y: segment.y };
  }

  /** Rectangle in user space; a negative height is normalized */
  rect(x: number, y: number, width: number, height: number): void {
    const top = flip(y);
    if (height < 0) {
      this.segments.push({ kind: 'rect', x, y: top, width, height: flip(height) });
    } else {
      this.segments.push({ kind: 'rect', x, y: top - height, width, height });
    }
    this.current = { x, y: top };
    this.subpathStart = this.current;
  }

  close(): void {
    this.segments.push({ kind: 'close' });
    if (this.subpathStart) this.current = this.subpathStart;
  }

  /** Mark the path as a clipping path, recorded at the next paint operator */
  clip(rule: FillRule): void {
    this.pendingClip = rule;
  }

  /**
   * Paint the accumulated path with `paintOp` and clear it.
   * Emits SetPen, SetBrush, CreatePath, one command per segment, DrawPath.
   */
  resolve(paintOp: PaintOp, state: GraphicsState): ResolvedPath {
    const action = PAINT_OPS[paintOp];
    if (action.close) this.close();

    const commands: DrawCommand[] = [
      { op: 'SetPen', pen: action.stroke ? penFor(state) : null },
      { op: 'SetBrush', brush: action.fill ? { color: fillColorWithAlpha(state) } : null },
      { op: 'CreatePath' },
    ];
    for (const segment of this.segments) {
      commands.push(segmentCommand(segment));
    }
    commands.push({ op: 'DrawPath', rule: action.rule });

    const clip: ClipRecord | null = this.pendingClip
      ? { segments: this.segments.map((segment) => ({ ...segment })), rule: this.pendingClip }
      : null;

    this.clear();
    return { commands, clip };
  }

  clear(): void {
    this.segments = [];
    this.current = null;
    this.subpathStart = null;
    this.pendingClip = null;
  }
}

function penFor(state: GraphicsState): Pen {
  return {
    color: strokeColorWithAlpha(state),
    width: state.lineWidth,
    cap: state.lineCap,
    join: state.lineJoin,
    dashes: state.dash.array.length > 0 ? [...state.dash.array] : null,
  };
}

function segmentCommand(segment: PathSegment): DrawCommand {
  switch (segment.kind) {
    case 'move':
      return { op: 'MoveTo', x: segment.x, y: segment.y };
    case 'line':
      return { op: 'LineTo', x: segment.x, y: segment.y };
    case 'curve':
      return {
        op: 'CurveTo',
        cx1: segment.cx1, cy1: segment.cy1,
        cx2: segment.cx2, cy2: segment.cy2,
        x: segment.x, y: segment.y,
      };
    case 'rect':
      return { op: 'AddRectangle', x: segment.x, y: segment.y, width: segment.width, height: segment.height };
    case 'close':
      return { op: 'ClosePath' };
  }
}
