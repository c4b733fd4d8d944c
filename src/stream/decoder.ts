/**
 * Stream decoder: runs the filters named by a stream's /Filter and
 * /DecodeParms entries.
 *
 * Two orders exist. Content and form streams decode in declared order
 * (`decodeStream`). Image payloads decode in the fixed order
 * ASCIIHex → LZW → ASCII85 → Flate → CCITT (`decodeImageData`), each filter
 * applied only when present, and report anything else as unsupported.
 */

import type { PdfDict, PdfObject, ResolveFn } from '../parser/types.js';
import { dictGet, identityResolve, isArray, isBool, isDict, isName, isNumber } from '../parser/types.js';
import { PdfUnsupportedError } from '../errors.js';
import { applyPNGPredictor, defaultCodecs, type DecodeParams, type FilterCodecs } from './filters.js';

/** One entry of a filter chain with its own decode parameters */
export interface FilterSpec {
  readonly name: string;
  readonly params: DecodeParams;
}

/** Abbreviated filter names used by inline images */
const FILTER_ABBREVIATIONS: Readonly<Record<string, string>> = {
  AHx: 'ASCIIHexDecode',
  A85: 'ASCII85Decode',
  LZW: 'LZWDecode',
  Fl: 'FlateDecode',
  RL: 'RunLengthDecode',
  CCF: 'CCITTFaxDecode',
  DCT: 'DCTDecode',
};

export function canonicalFilterName(name: string): string {
  return FILTER_ABBREVIATIONS[name] ?? name;
}

/** Order in which image filters are undone, whatever order they are declared in */
const IMAGE_FILTER_ORDER = ['ASCIIHexDecode', 'LZWDecode', 'ASCII85Decode', 'FlateDecode', 'CCITTFaxDecode'] as const;

/** Filters that leave the payload encoded for a later stage */
const IMAGE_FORMAT_FILTERS = new Set(['DCTDecode']);

// ─── Filter chain parsing ───

/**
 * Read the filter chain of a stream or inline image dictionary.
 * `filterKeys` / `parmsKeys` let inline images use `F` / `DP`.
 */
export function readFilterChain(
  dict: PdfDict,
  resolve: ResolveFn = identityResolve,
  filterKeys: readonly string[] = ['Filter'],
  parmsKeys: readonly string[] = ['DecodeParms'],
): FilterSpec[] {
  const filterObj = firstPresent(dict, filterKeys, resolve);
  if (!filterObj) return [];
  const parmsObj = firstPresent(dict, parmsKeys, resolve);

  if (isName(filterObj)) {
    const parms = parmsObj && isDict(parmsObj) ? parmsObj : undefined;
    return [{ name: canonicalFilterName(filterObj.value), params: toDecodeParams(parms, resolve) }];
  }

  if (!isArray(filterObj)) return [];

  const chain: FilterSpec[] = [];
  for (let i = 0; i < filterObj.items.length; i++) {
    const filter = resolve(filterObj.items[i]);
    if (!isName(filter)) continue;

    let parms: PdfDict | undefined;
    if (parmsObj && isArray(parmsObj) && i < parmsObj.items.length) {
      const p = resolve(parmsObj.items[i]);
      if (isDict(p)) parms = p;
    } else if (parmsObj && isDict(parmsObj)) {
      parms = parmsObj;
    }
    chain.push({ name: canonicalFilterName(filter.value), params: toDecodeParams(parms, resolve) });
  }
  return chain;
}

function firstPresent(dict: PdfDict, keys: readonly string[], resolve: ResolveFn): PdfObject | undefined {
  for (const key of keys) {
    const obj = dictGet(dict, key, resolve);
    if (obj) return obj;
  }
  return undefined;
}

function toDecodeParams(parms: PdfDict | undefined, resolve: ResolveFn): DecodeParams {
  const params: Record<string, number | boolean> = {};
  if (!parms) return params;
  for (const [key, raw] of parms.entries) {
    const value = resolve(raw);
    if (isNumber(value) || isBool(value)) params[key] = value.value;
  }
  return params;
}

// ─── Decoding ───

/** Decode a content or form stream, applying filters in declared order */
export function decodeStream(
  data: Uint8Array,
  dict: PdfDict,
  resolve: ResolveFn = identityResolve,
  codecs: FilterCodecs = defaultCodecs,
): Uint8Array {
  let result = data;
  for (const filter of readFilterChain(dict, resolve)) {
    result = applyFilter(result, filter, codecs);
  }
  return result;
}

/** Result of undoing an image's filter chain */
export interface DecodedImageData {
  readonly data: Uint8Array;
  /** True when the payload is still a JPEG (DCTDecode) */
  readonly jpeg: boolean;
}

/**
 * Decode an image payload in the fixed image filter order.
 * Throws `PdfUnsupportedError` for RunLength, JBIG2, JPX, unknown filters,
 * and CCITT without an injected codec.
 */
export function decodeImageData(
  data: Uint8Array,
  filters: readonly FilterSpec[],
  codecs: FilterCodecs = defaultCodecs,
): DecodedImageData {
  const known = new Set<string>(IMAGE_FILTER_ORDER);
  for (const filter of filters) {
    if (!known.has(filter.name) && !IMAGE_FORMAT_FILTERS.has(filter.name)) {
      throw new PdfUnsupportedError(`Unsupported image filter ${filter.name}`);
    }
  }

  let result = data;
  for (const name of IMAGE_FILTER_ORDER) {
    const filter = filters.find((f) => f.name === name);
    if (filter) result = applyFilter(result, filter, codecs);
  }

  return { data: result, jpeg: filters.some((f) => f.name === 'DCTDecode') };
}

function applyFilter(data: Uint8Array, filter: FilterSpec, codecs: FilterCodecs): Uint8Array {
  switch (filter.name) {
    case 'ASCIIHexDecode':
      return codecs.asciiHex(data, filter.params);
    case 'ASCII85Decode':
      return codecs.ascii85(data, filter.params);
    case 'LZWDecode':
      return applyPredictor(codecs.lzw(data, filter.params), filter.params);
    case 'FlateDecode':
      return applyPredictor(codecs.flate(data, filter.params), filter.params);
    case 'CCITTFaxDecode':
      if (!codecs.ccittFax) throw new PdfUnsupportedError('CCITTFaxDecode needs an injected codec');
      return codecs.ccittFax(data, filter.params);
    default:
      throw new PdfUnsupportedError(`Unsupported filter ${filter.name}`);
  }
}

function applyPredictor(decoded: Uint8Array, params: DecodeParams): Uint8Array {
  const predictor = numberParam(params, 'Predictor', 1);
  // PNG predictors (10-15); TIFF predictor 2 is rare and left as-is
  if (predictor < 10) return decoded;
  return applyPNGPredictor(
    decoded,
    numberParam(params, 'Columns', 1),
    numberParam(params, 'Colors', 1),
    numberParam(params, 'BitsPerComponent', 8),
  );
}

function numberParam(params: DecodeParams, key: string, fallback: number): number {
  const value = params[key];
  return typeof value === 'number' ? value : fallback;
}
