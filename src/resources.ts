/**
 * Resource scopes.
 *
 * The interpreter looks names up in a `ResourceScope`: fonts by resource
 * name, XObjects (images and forms), ExtGState dictionaries and named color
 * spaces. Hosts can build a scope directly, or hand a /Resources dictionary
 * from their PDF parser to `buildResourceScope`, which decodes and tokenizes
 * form XObjects and reads image dictionaries (including inline images with
 * their abbreviated keys).
 */

import type { Matrix } from './types.js';
import type { Operand, Operation } from './parser/content.js';
import { tokenizeContent } from './parser/content.js';
import type { PdfDict, PdfObject, PdfStream, ResolveFn } from './parser/types.js';
import {
  PDF_NULL,
  dictGet,
  dictGetAny,
  dictGetDict,
  dictGetName,
  identityResolve,
  isArray,
  isBool,
  isDict,
  isName,
  isNumber,
  isStream,
  isString,
  numbersOf,
  pdfArray,
  pdfBool,
  pdfDict,
  pdfName,
  pdfNumber,
  pdfString,
} from './parser/types.js';
import { decodeStream, readFilterChain, type FilterSpec } from './stream/decoder.js';
import { defaultCodecs, type FilterCodecs } from './stream/filters.js';
import { identityMatrix, matrixFrom } from './content/matrix.js';

// ─── Types ───

export type ColorSpace =
  | { readonly family: 'DeviceRGB' }
  | { readonly family: 'DeviceGray' }
  | { readonly family: 'DeviceCMYK' }
  | {
    readonly family: 'Indexed';
    readonly base: ColorSpace;
    readonly hival: number;
    /** Lookup table, (hival + 1) entries of the base space's component count */
    readonly palette: Uint8Array;
  }
  | { readonly family: 'Unsupported'; readonly name: string };

export type ImageMaskSpec =
  /** /Mask array: ranges as given, validated when the image is decoded */
  | { readonly kind: 'color-key'; readonly ranges: readonly number[] }
  | { readonly kind: 'mask-image'; readonly image: ImageResource };

export interface ImageResource {
  readonly kind: 'image';
  readonly width: number;
  readonly height: number;
  readonly bitsPerComponent: number;
  readonly colorSpace: ColorSpace | null;
  readonly filters: readonly FilterSpec[];
  /** /ImageMask true: samples paint with the fill color */
  readonly stencil: boolean;
  /** /Decode maps sample 0 to the maximum (e.g. [1 0]) */
  readonly inverted: boolean;
  readonly mask: ImageMaskSpec | null;
  /** /SMask present; soft masks are not applied */
  readonly softMask: boolean;
  /** Still-encoded payload */
  readonly data: Uint8Array;
}

export interface FormResource {
  readonly kind: 'form';
  readonly operations: readonly Operation[];
  readonly bbox: readonly [number, number, number, number] | null;
  readonly matrix: Matrix;
  /** Own resources; null falls back to the referencing scope */
  readonly resources: ResourceScope | null;
}

export type XObjectResource =
  | ImageResource
  | FormResource
  /** A subtype that is not drawn (PostScript XObjects) */
  | { readonly kind: 'unsupported'; readonly subtype: string }
  /** An XObject whose dictionary or payload could not be read */
  | { readonly kind: 'invalid'; readonly reason: string };

export interface ResourceScope {
  /** Identifies the scope for the form cache; forms are cached per (id, name) */
  readonly id: string;
  /** Font resource name → BaseFont (null when the font has none) */
  readonly fonts: ReadonlyMap<string, string | null>;
  readonly xobjects: ReadonlyMap<string, XObjectResource>;
  readonly extGStates: ReadonlyMap<string, PdfDict>;
  readonly colorSpaces: ReadonlyMap<string, ColorSpace>;
  /** Follows indirect references inside ExtGState dictionaries */
  readonly resolve: ResolveFn;
}

export interface ResourceScopeInit {
  readonly fonts?: ReadonlyMap<string, string | null>;
  readonly xobjects?: ReadonlyMap<string, XObjectResource>;
  readonly extGStates?: ReadonlyMap<string, PdfDict>;
  readonly colorSpaces?: ReadonlyMap<string, ColorSpace>;
  readonly resolve?: ResolveFn;
}

/** Scope built directly from maps (hosts with their own resource model, tests) */
export function createResourceScope(id: string, init?: ResourceScopeInit): ResourceScope {
  return {
    id,
    fonts: init?.fonts ?? new Map(),
    xobjects: init?.xobjects ?? new Map(),
    extGStates: init?.extGStates ?? new Map(),
    colorSpaces: init?.colorSpaces ?? new Map(),
    resolve: init?.resolve ?? identityResolve,
  };
}

export const EMPTY_SCOPE: ResourceScope = createResourceScope('empty');

// ─── Building from a /Resources dictionary ───

export interface BuildScopeOptions {
  readonly codecs?: FilterCodecs;
}

interface MutableScope {
  readonly id: string;
  readonly fonts: Map<string, string | null>;
  readonly xobjects: Map<string, XObjectResource>;
  readonly extGStates: Map<string, PdfDict>;
  readonly colorSpaces: Map<string, ColorSpace>;
  readonly resolve: ResolveFn;
}

/**
 * Build a scope from a /Resources dictionary. Form XObjects with their own
 * /Resources get nested scopes with ids of the form `<id>/<name>`; a
 * resources dictionary reached twice maps to the same scope.
 */
export function buildResourceScope(
  id: string,
  resources: PdfDict | null,
  resolve: ResolveFn = identityResolve,
  options?: BuildScopeOptions,
): ResourceScope {
  const codecs = options?.codecs ?? defaultCodecs;
  return buildScope(id, resources, resolve, codecs, new Map());
}

function buildScope(
  id: string,
  resources: PdfDict | null,
  resolve: ResolveFn,
  codecs: FilterCodecs,
  built: Map<PdfDict, ResourceScope>,
): ResourceScope {
  const scope: MutableScope = {
    id,
    fonts: new Map(),
    xobjects: new Map(),
    extGStates: new Map(),
    colorSpaces: new Map(),
    resolve,
  };
  if (!resources) return scope;
  built.set(resources, scope);

  for (const [name, obj] of entriesOf(resources, 'Font', resolve)) {
    const fontDict = asDict(resolve(obj));
    scope.fonts.set(name, fontDict ? dictGetName(fontDict, 'BaseFont', resolve) ?? null : null);
  }

  for (const [name, obj] of entriesOf(resources, 'ExtGState', resolve)) {
    const gs = asDict(resolve(obj));
    if (gs) scope.extGStates.set(name, gs);
  }

  for (const [name, obj] of entriesOf(resources, 'ColorSpace', resolve)) {
    scope.colorSpaces.set(name, parseColorSpace(obj, resolve, undefined, codecs));
  }

  for (const [name, obj] of entriesOf(resources, 'XObject', resolve)) {
    const xobject = resolve(obj);
    if (!isStream(xobject)) {
      scope.xobjects.set(name, { kind: 'invalid', reason: 'XObject is not a stream' });
      continue;
    }
    scope.xobjects.set(name, readXObject(`${id}/${name}`, xobject, resolve, codecs, scope.colorSpaces, built));
  }

  return scope;
}

function readXObject(
  id: string,
  stream: PdfStream,
  resolve: ResolveFn,
  codecs: FilterCodecs,
  colorSpaces: ReadonlyMap<string, ColorSpace>,
  built: Map<PdfDict, ResourceScope>,
): XObjectResource {
  const subtype = dictGetName(stream.dict, 'Subtype', resolve) ?? '';

  if (subtype === 'Image') return imageResourceFromStream(stream, resolve, colorSpaces, codecs);
  if (subtype !== 'Form') return { kind: 'unsupported', subtype };

  let operations: Operation[];
  try {
    operations = tokenizeContent(decodeStream(stream.data, stream.dict, resolve, codecs));
  } catch (err) {
    return { kind: 'invalid', reason: err instanceof Error ? err.message : String(err) };
  }

  const ownResources = dictGetDict(stream.dict, 'Resources', resolve) ?? null;
  let nested: ResourceScope | null = null;
  if (ownResources) {
    nested = built.get(ownResources) ?? buildScope(id, ownResources, resolve, codecs, built);
  }

  return {
    kind: 'form',
    operations,
    bbox: readBBox(stream.dict, resolve),
    matrix: readMatrix(stream.dict, resolve) ?? identityMatrix(),
    resources: nested,
  };
}

// ─── Images ───

/** Image XObject stream to an ImageResource; names in /ColorSpace resolve through `colorSpaces` */
export function imageResourceFromStream(
  stream: PdfStream,
  resolve: ResolveFn = identityResolve,
  colorSpaces?: ReadonlyMap<string, ColorSpace>,
  codecs: FilterCodecs = defaultCodecs,
): ImageResource {
  return readImage(stream.dict, stream.data, resolve, colorSpaces, codecs, IMAGE_KEYS);
}

/** Inline image (`BI … ID … EI`) dictionary and data to an ImageResource */
export function imageResourceFromInline(
  dict: ReadonlyMap<string, Operand>,
  data: Uint8Array,
  colorSpaces?: ReadonlyMap<string, ColorSpace>,
  codecs: FilterCodecs = defaultCodecs,
): ImageResource {
  const entries = new Map<string, PdfObject>();
  for (const [key, value] of dict) entries.set(key, operandToObject(value));
  return readImage(pdfDict(entries), data, identityResolve, colorSpaces, codecs, INLINE_KEYS);
}

interface ImageKeys {
  readonly width: readonly string[];
  readonly height: readonly string[];
  readonly bpc: readonly string[];
  readonly colorSpace: readonly string[];
  readonly filter: readonly string[];
  readonly decodeParms: readonly string[];
  readonly imageMask: readonly string[];
  readonly decode: readonly string[];
}

const IMAGE_KEYS: ImageKeys = {
  width: ['Width'],
  height: ['Height'],
  bpc: ['BitsPerComponent'],
  colorSpace: ['ColorSpace'],
  filter: ['Filter'],
  decodeParms: ['DecodeParms'],
  imageMask: ['ImageMask'],
  decode: ['Decode'],
};

/** Inline images accept both the full and the abbreviated keys */
const INLINE_KEYS: ImageKeys = {
  width: ['W', 'Width'],
  height: ['H', 'Height'],
  bpc: ['BPC', 'BitsPerComponent'],
  colorSpace: ['CS', 'ColorSpace'],
  filter: ['F', 'Filter'],
  decodeParms: ['DP', 'DecodeParms'],
  imageMask: ['IM', 'ImageMask'],
  decode: ['D', 'Decode'],
};

function readImage(
  dict: PdfDict,
  data: Uint8Array,
  resolve: ResolveFn,
  colorSpaces: ReadonlyMap<string, ColorSpace> | undefined,
  codecs: FilterCodecs,
  keys: ImageKeys,
): ImageResource {
  const number = (names: readonly string[]): number | undefined => {
    const obj = dictGetAny(dict, names, resolve);
    return obj && isNumber(obj) ? obj.value : undefined;
  };

  const maskObj = dictGetAny(dict, keys.imageMask, resolve);
  const stencil = maskObj !== undefined && isBool(maskObj) && maskObj.value;
  const csObj = dictGetAny(dict, keys.colorSpace, resolve);
  const decodeObj = dictGetAny(dict, keys.decode, resolve);
  const decode = decodeObj && isArray(decodeObj) ? numbersOf(decodeObj, resolve) : undefined;

  return {
    kind: 'image',
    width: number(keys.width) ?? 0,
    height: number(keys.height) ?? 0,
    bitsPerComponent: number(keys.bpc) ?? (stencil ? 1 : 8),
    colorSpace: stencil || !csObj ? null : parseColorSpace(csObj, resolve, colorSpaces, codecs),
    filters: readFilterChain(dict, resolve, keys.filter, keys.decodeParms),
    stencil,
    inverted: decode !== undefined && decode.length >= 2 && decode[0] > decode[1],
    mask: readMask(dict, resolve, colorSpaces, codecs),
    softMask: dictGet(dict, 'SMask', resolve) !== undefined,
    data,
  };
}

function readMask(
  dict: PdfDict,
  resolve: ResolveFn,
  colorSpaces: ReadonlyMap<string, ColorSpace> | undefined,
  codecs: FilterCodecs,
): ImageMaskSpec | null {
  const mask = dictGet(dict, 'Mask', resolve);
  if (!mask) return null;
  if (isArray(mask)) {
    const ranges = mask.items.map((item) => {
      const value = resolve(item);
      return isNumber(value) ? value.value : Number.NaN;
    });
    return { kind: 'color-key', ranges };
  }
  if (isStream(mask)) {
    return { kind: 'mask-image', image: imageResourceFromStream(mask, resolve, colorSpaces, codecs) };
  }
  return null;
}

// ─── Color spaces ───

const DEVICE_NAMES: Readonly<Record<string, ColorSpace>> = {
  DeviceRGB: { family: 'DeviceRGB' },
  RGB: { family: 'DeviceRGB' },
  DeviceGray: { family: 'DeviceGray' },
  G: { family: 'DeviceGray' },
  DeviceCMYK: { family: 'DeviceCMYK' },
  CMYK: { family: 'DeviceCMYK' },
};

/** Number of color components of a color space, or 0 when unknown */
export function componentCount(space: ColorSpace): number {
  switch (space.family) {
    case 'DeviceRGB': return 3;
    case 'DeviceGray': return 1;
    case 'DeviceCMYK': return 4;
    case 'Indexed': return 1;
    case 'Unsupported': return 0;
  }
}

/**
 * Parse a color space object: a device name (full or abbreviated), a named
 * resource from `named`, or an [/Indexed base hival lookup] array. Anything
 * else is `Unsupported` with the family name.
 */
export function parseColorSpace(
  obj: PdfObject,
  resolve: ResolveFn = identityResolve,
  named?: ReadonlyMap<string, ColorSpace>,
  codecs: FilterCodecs = defaultCodecs,
): ColorSpace {
  const value = resolve(obj);

  if (isName(value)) {
    return DEVICE_NAMES[value.value] ?? named?.get(value.value) ?? { family: 'Unsupported', name: value.value };
  }

  if (!isArray(value) || value.items.length === 0) return { family: 'Unsupported', name: 'unknown' };

  const head = resolve(value.items[0]);
  const family = isName(head) ? head.value : 'unknown';
  if (family !== 'Indexed' && family !== 'I') {
    return DEVICE_NAMES[family] ?? { family: 'Unsupported', name: family };
  }

  if (value.items.length < 4) return { family: 'Unsupported', name: 'Indexed' };
  const base = parseColorSpace(value.items[1], resolve, named, codecs);
  const hivalObj = resolve(value.items[2]);
  const lookup = resolve(value.items[3]);
  if (!isNumber(hivalObj)) return { family: 'Unsupported', name: 'Indexed' };

  let palette: Uint8Array;
  if (isString(lookup)) {
    palette = lookup.value;
  } else if (isStream(lookup)) {
    try {
      palette = decodeStream(lookup.data, lookup.dict, resolve, codecs);
    } catch {
      return { family: 'Unsupported', name: 'Indexed' };
    }
  } else {
    return { family: 'Unsupported', name: 'Indexed' };
  }

  const size = (hivalObj.value + 1) * componentCount(base);
  return { family: 'Indexed', base, hival: hivalObj.value, palette: palette.subarray(0, size) };
}

/** Human-readable name of a color space for diagnostics */
export function colorSpaceName(space: ColorSpace | null): string {
  if (!space) return 'none';
  if (space.family === 'Unsupported') return space.name;
  if (space.family === 'Indexed') return `Indexed(${colorSpaceName(space.base)})`;
  return space.family;
}

// ─── Helpers ───

function entriesOf(resources: PdfDict, key: string, resolve: ResolveFn): Array<[string, PdfObject]> {
  const sub = dictGetDict(resources, key, resolve);
  return sub ? [...sub.entries] : [];
}

function asDict(obj: PdfObject): PdfDict | undefined {
  if (isDict(obj)) return obj;
  return isStream(obj) ? obj.dict : undefined;
}

function readMatrix(dict: PdfDict, resolve: ResolveFn): Matrix | null {
  const arr = dictGet(dict, 'Matrix', resolve);
  if (!arr || !isArray(arr)) return null;
  const values = numbersOf(arr, resolve);
  return values ? matrixFrom(values) : null;
}

function readBBox(dict: PdfDict, resolve: ResolveFn): [number, number, number, number] | null {
  const arr = dictGet(dict, 'BBox', resolve);
  if (!arr || !isArray(arr)) return null;
  const values = numbersOf(arr, resolve);
  if (!values || values.length < 4) return null;
  return [values[0], values[1], values[2], values[3]];
}

/** Content-stream operand to the object model (inline image dictionaries) */
function operandToObject(operand: Operand): PdfObject {
  switch (operand.type) {
    case 'number': return pdfNumber(operand.value);
    case 'string': return pdfString(operand.value);
    case 'name': return pdfName(operand.value);
    case 'bool': return pdfBool(operand.value);
    case 'null': return PDF_NULL;
    case 'array': return pdfArray(operand.value.map(operandToObject));
    case 'dict': {
      const entries = new Map<string, PdfObject>();
      for (const [key, value] of operand.value) entries.set(key, operandToObject(value));
      return pdfDict(entries);
    }
    case 'inline-image': return PDF_NULL;
  }
}
