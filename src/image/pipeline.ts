/**
 * Image Decode Pipeline
 *
 * Turns an ImageResource into a Bitmap:
 *   1. undo the filter chain (fixed order, see stream/decoder.ts)
 *   2. resolve color: JPEG, 8-bit RGB, or palette expansion for indexed,
 *      gray, 1-bit and stencil images
 *   3. attach a color-key or mask-image mask
 *
 * Recoverable problems come back as `{ ok: false }`; a malformed color key
 * throws `InvariantError`.
 */

import type { Bitmap, BitmapMask, JpegDecoder, Rgb } from '../types.js';
import type { ImageResource } from '../resources.js';
import { colorSpaceName } from '../resources.js';
import { PdfDecodeError, PdfUnsupportedError } from '../errors.js';
import { decodeImageData, type DecodedImageData } from '../stream/decoder.js';
import { defaultCodecs, type FilterCodecs } from '../stream/filters.js';
import { deindex, grayPalette, grayToRgbPalette, isBitDepth, reversePalette } from './deindex.js';
import { colorKeyMask, maskImageMask, toColorKeyRanges } from './mask.js';

export type ImageFailureReason = 'unsupported' | 'decode-failure';

export type ImageDecodeResult =
  | { readonly ok: true; readonly bitmap: Bitmap }
  | {
    readonly ok: false;
    readonly reason: ImageFailureReason;
    /** Names the cause (filter, color space, ...) */
    readonly detail: string;
  };

export interface ImageDecodeOptions {
  readonly codecs?: FilterCodecs;
  readonly jpegDecoder?: JpegDecoder;
  /** Paint color of stencil masks; black when not given */
  readonly fillColor?: Rgb;
}

const fail = (reason: ImageFailureReason, detail: string): ImageDecodeResult => ({ ok: false, reason, detail });

/** Largest packed RGB buffer an image may expand to */
export const MAX_IMAGE_BYTES = 1 << 30;

/** Reason a width and height cannot be expanded to RGB, or null */
function checkSize(width: number, height: number): string | null {
  if (width <= 0 || height <= 0 || !Number.isInteger(width) || !Number.isInteger(height)) {
    return `invalid image size ${width}x${height}`;
  }
  if (width * height * 3 > MAX_IMAGE_BYTES) return `image size ${width}x${height} is too large`;
  return null;
}

export function decodeImage(image: ImageResource, options?: ImageDecodeOptions): ImageDecodeResult {
  const codecs = options?.codecs ?? defaultCodecs;
  const { width, height } = image;

  const sizeError = checkSize(width, height);
  if (sizeError) return fail('decode-failure', sizeError);

  const decoded = undoFilters(image.data, image, codecs);
  if (!('data' in decoded)) return decoded;

  if (decoded.jpeg) {
    const jpegDecoder = options?.jpegDecoder;
    if (!jpegDecoder) {
      if (image.mask) return fail('unsupported', 'mask on undecoded JPEG');
      return { ok: true, bitmap: { format: 'jpeg', width, height, data: decoded.data } };
    }
    let rgb: { width: number; height: number; data: Uint8Array };
    try {
      rgb = jpegDecoder(decoded.data);
    } catch (err) {
      return fail('decode-failure', `JPEG: ${errorMessage(err)}`);
    }
    return withMask(image, rgb.width, rgb.height, rgb.data, codecs);
  }

  if (image.stencil) return decodeStencil(image, decoded.data, options?.fillColor ?? { r: 0, g: 0, b: 0 });

  const resolved = resolveColor(image, decoded.data);
  if (!('rgb' in resolved)) return resolved;
  return withMask(image, width, height, resolved.rgb, codecs);
}

// ─── Steps ───

function undoFilters(
  data: Uint8Array,
  image: ImageResource,
  codecs: FilterCodecs,
): DecodedImageData | { ok: false; reason: ImageFailureReason; detail: string } {
  try {
    return decodeImageData(data, image.filters, codecs);
  } catch (err) {
    if (err instanceof PdfUnsupportedError) return { ok: false, reason: 'unsupported', detail: err.message };
    if (err instanceof PdfDecodeError) return { ok: false, reason: 'decode-failure', detail: err.message };
    // Injected codecs may throw anything
    return { ok: false, reason: 'decode-failure', detail: errorMessage(err) };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Packed RGB for the image's color space and bit depth */
function resolveColor(
  image: ImageResource,
  data: Uint8Array,
): { rgb: Uint8Array } | { ok: false; reason: ImageFailureReason; detail: string } {
  const { width, height, colorSpace: space } = image;
  const depth = image.bitsPerComponent;
  const unsupported = { ok: false as const, reason: 'unsupported' as const, detail: colorSpaceName(space) };

  if (space?.family === 'DeviceRGB' && depth === 8) {
    const size = width * height * 3;
    if (data.length < size) {
      return { ok: false, reason: 'decode-failure', detail: `RGB data is ${data.length} bytes, expected ${size}` };
    }
    return { rgb: data.subarray(0, size) };
  }

  if (!isBitDepth(depth)) return unsupported;

  let palette: Uint8Array;
  if (space === null) {
    if (depth !== 1) return unsupported;
    palette = grayPalette(1);
  } else if (space.family === 'DeviceGray') {
    palette = grayPalette(depth);
  } else if (space.family === 'Indexed' && space.base.family === 'DeviceRGB') {
    palette = space.palette;
  } else if (space.family === 'Indexed' && space.base.family === 'DeviceGray') {
    palette = grayToRgbPalette(space.palette);
  } else {
    return unsupported;
  }

  if (image.inverted) palette = reversePalette(palette);
  return { rgb: deindex(width, height, data, depth, palette) };
}

/** Stencil mask: set samples are painted in the fill color, the rest is transparent */
function decodeStencil(image: ImageResource, data: Uint8Array, fill: Rgb): ImageDecodeResult {
  const { width, height } = image;
  const clear: Rgb = { r: 255 - fill.r, g: 255 - fill.g, b: 255 - fill.b };
  // Sample 0 paints unless /Decode is [1 0]
  let palette = new Uint8Array([fill.r, fill.g, fill.b, clear.r, clear.g, clear.b]);
  if (image.inverted) palette = reversePalette(palette);

  const rgb = deindex(width, height, data, 1, palette);
  const mask: BitmapMask = { source: 'stencil', width, height, data: rgb, transparent: clear };
  return { ok: true, bitmap: { format: 'rgb', width, height, data: rgb, mask } };
}

function withMask(
  image: ImageResource,
  width: number,
  height: number,
  rgb: Uint8Array,
  codecs: FilterCodecs,
): ImageDecodeResult {
  const spec = image.mask;
  let mask: BitmapMask | null = null;

  if (spec?.kind === 'color-key') {
    mask = colorKeyMask(width, height, rgb, toColorKeyRanges(spec.ranges));
  } else if (spec?.kind === 'mask-image') {
    const maskImage = spec.image;
    const sizeError = checkSize(maskImage.width, maskImage.height);
    if (sizeError) return fail('decode-failure', `mask: ${sizeError}`);
    const decoded = undoFilters(maskImage.data, maskImage, codecs);
    if (!('data' in decoded)) return { ok: false, reason: decoded.reason, detail: `mask: ${decoded.detail}` };
    if (decoded.jpeg) return fail('unsupported', 'mask: DCTDecode');
    mask = maskImageMask(maskImage.width, maskImage.height, decoded.data);
  }

  return { ok: true, bitmap: { format: 'rgb', width, height, data: rgb, mask } };
}
