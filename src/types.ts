/**
 * Public types for the pdf-drawlist library.
 */

/** 2D affine matrix in PDF order [a, b, c, d, e, f] */
export type Matrix = [number, number, number, number, number, number];

/** 8-bit RGB triple (0-255 per channel) */
export interface Rgb {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** RGB with an 8-bit alpha channel (255 = opaque) */
export interface Rgba extends Rgb {
  readonly a: number;
}

export type LineCap = 'butt' | 'round' | 'projecting';
export type LineJoin = 'miter' | 'round' | 'bevel';
export type FillRule = 'nonzero' | 'evenodd';

export type FontFamily = 'monospace' | 'sans-serif' | 'serif' | 'symbol' | 'dingbats';

/** Font handed to the rasterizer, already scaled by the host's size factor */
export interface FontSpec {
  /** BaseFont string from the resource dictionary, or null when none was set */
  readonly baseFont: string | null;
  readonly family: FontFamily;
  /** Face name the rasterizer should ask its font system for */
  readonly face: string;
  readonly size: number;
  readonly bold: boolean;
  readonly italic: boolean;
  /** False when the BaseFont matched none of the known families */
  readonly known: boolean;
}

export interface Pen {
  readonly color: Rgba;
  readonly width: number;
  readonly cap: LineCap;
  readonly join: LineJoin;
  /** User dash pattern, or null for a solid line */
  readonly dashes: readonly number[] | null;
}

export interface Brush {
  readonly color: Rgba;
}

/**
 * Transparency mask for a bitmap. `data` is a packed RGB raster of the mask's
 * own size; pixels equal to `transparent` are not painted.
 */
export interface BitmapMask {
  readonly source: 'color-key' | 'mask-image' | 'stencil';
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
  readonly transparent: Rgb;
}

export type Bitmap =
  | {
    readonly format: 'rgb';
    readonly width: number;
    readonly height: number;
    /** Packed RGB, width * height * 3 bytes */
    readonly data: Uint8Array;
    readonly mask: BitmapMask | null;
  }
  | {
    /** Encoded JPEG, handed through when no JPEG decoder is configured */
    readonly format: 'jpeg';
    readonly width: number;
    readonly height: number;
    readonly data: Uint8Array;
  };

/**
 * One backend-agnostic drawing instruction. Coordinates are in device space
 * (y axis pointing down). Path commands apply to the path opened by the most
 * recent CreatePath; DrawPath paints and closes it.
 */
export type DrawCommand =
  | { readonly op: 'ConcatTransform'; readonly matrix: Matrix }
  | { readonly op: 'PushState' }
  | { readonly op: 'PopState' }
  | { readonly op: 'SetFont'; readonly font: FontSpec; readonly color: Rgba }
  | { readonly op: 'SetPen'; readonly pen: Pen | null }
  | { readonly op: 'SetBrush'; readonly brush: Brush | null }
  | { readonly op: 'DrawText'; readonly text: string; readonly x: number; readonly y: number }
  | {
    readonly op: 'DrawBitmap';
    readonly bitmap: Bitmap;
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
  }
  | { readonly op: 'CreatePath' }
  | { readonly op: 'MoveTo'; readonly x: number; readonly y: number }
  | { readonly op: 'LineTo'; readonly x: number; readonly y: number }
  | {
    readonly op: 'CurveTo';
    readonly cx1: number;
    readonly cy1: number;
    readonly cx2: number;
    readonly cy2: number;
    readonly x: number;
    readonly y: number;
  }
  | {
    readonly op: 'AddRectangle';
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
  }
  | { readonly op: 'ClosePath' }
  | { readonly op: 'DrawPath'; readonly rule: FillRule };

export type DrawOp = DrawCommand['op'];

/** Result of interpreting one page */
export interface PageDrawing {
  readonly commands: DrawCommand[];
  /** Unexpected failure that stopped the page early, or null */
  readonly error: Error | null;
}

/** Width of a string plus the vertical extent of its font */
export interface TextExtent {
  readonly width: number;
  readonly height: number;
  readonly descent: number;
}

/**
 * Text-width capability supplied by the host. `measure` is the precise metric
 * and is preferred for fonts the resolver recognises; `extent` is the coarse
 * device-reported fallback and also supplies height and descent.
 */
export interface TextMeasurer {
  measure?(text: string, font: FontSpec): number | undefined;
  extent(text: string, font: FontSpec): TextExtent;
}

/** Decodes an encoded JPEG into packed RGB */
export type JpegDecoder = (data: Uint8Array) => { width: number; height: number; data: Uint8Array };
