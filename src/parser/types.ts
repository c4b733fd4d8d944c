/**
 * PDF object model used at the resource boundary.
 * Hosts hand resource dictionaries, ExtGState dictionaries and XObject
 * streams to the library in this shape; a `ResolveFn` follows indirect
 * references through the host's parser.
 */

/** Reference to an indirect object: "objNum gen R" */
export interface PdfRef {
  readonly kind: 'ref';
  readonly objNum: number;
  readonly gen: number;
}

export interface PdfName {
  readonly kind: 'name';
  readonly value: string;
}

/** A PDF string (literal or hex), kept as raw bytes */
export interface PdfString {
  readonly kind: 'string';
  readonly value: Uint8Array;
}

export interface PdfDict {
  readonly kind: 'dict';
  readonly entries: Map<string, PdfObject>;
}

export interface PdfArray {
  readonly kind: 'array';
  readonly items: PdfObject[];
}

/** Stream dictionary plus its still-encoded bytes */
export interface PdfStream {
  readonly kind: 'stream';
  readonly dict: PdfDict;
  readonly data: Uint8Array;
}

export interface PdfBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface PdfNumber {
  readonly kind: 'number';
  readonly value: number;
}

export interface PdfNull {
  readonly kind: 'null';
}

export type PdfObject =
  | PdfRef
  | PdfName
  | PdfString
  | PdfDict
  | PdfArray
  | PdfStream
  | PdfBool
  | PdfNumber
  | PdfNull;

/** Follows indirect references; returns direct objects unchanged */
export type ResolveFn = (obj: PdfObject) => PdfObject;

export const identityResolve: ResolveFn = (obj) => obj;

// ─── Helper constructors ───

export function pdfRef(objNum: number, gen: number): PdfRef {
  return { kind: 'ref', objNum, gen };
}

export function pdfName(value: string): PdfName {
  return { kind: 'name', value };
}

export function pdfString(value: Uint8Array): PdfString {
  return { kind: 'string', value };
}

export function pdfDict(entries?: Map<string, PdfObject> | Record<string, PdfObject>): PdfDict {
  if (entries instanceof Map) return { kind: 'dict', entries };
  return { kind: 'dict', entries: new Map(Object.entries(entries ?? {})) };
}

export function pdfArray(items?: PdfObject[]): PdfArray {
  return { kind: 'array', items: items ?? [] };
}

export function pdfStream(dict: PdfDict, data: Uint8Array): PdfStream {
  return { kind: 'stream', dict, data };
}

export function pdfBool(value: boolean): PdfBool {
  return { kind: 'bool', value };
}

export function pdfNumber(value: number): PdfNumber {
  return { kind: 'number', value };
}

/** Array of numbers, e.g. a /Matrix or /BBox entry */
export function pdfNumbers(values: readonly number[]): PdfArray {
  return pdfArray(values.map(pdfNumber));
}

export const PDF_NULL: PdfNull = { kind: 'null' };

// ─── Type guards ───

export function isRef(obj: PdfObject): obj is PdfRef {
  return obj.kind === 'ref';
}

export function isName(obj: PdfObject): obj is PdfName {
  return obj.kind === 'name';
}

export function isString(obj: PdfObject): obj is PdfString {
  return obj.kind === 'string';
}

export function isDict(obj: PdfObject): obj is PdfDict {
  return obj.kind === 'dict';
}

export function isArray(obj: PdfObject): obj is PdfArray {
  return obj.kind === 'array';
}

export function isStream(obj: PdfObject): obj is PdfStream {
  return obj.kind === 'stream';
}

export function isBool(obj: PdfObject): obj is PdfBool {
  return obj.kind === 'bool';
}

export function isNumber(obj: PdfObject): obj is PdfNumber {
  return obj.kind === 'number';
}

// ─── Dictionary helpers (all resolve through `resolve`) ───

export function dictGet(dict: PdfDict, key: string, resolve: ResolveFn = identityResolve): PdfObject | undefined {
  const obj = dict.entries.get(key);
  return obj ? resolve(obj) : undefined;
}

/** First present key wins; inline images use abbreviated keys */
export function dictGetAny(
  dict: PdfDict,
  keys: readonly string[],
  resolve: ResolveFn = identityResolve,
): PdfObject | undefined {
  for (const key of keys) {
    const obj = dictGet(dict, key, resolve);
    if (obj) return obj;
  }
  return undefined;
}

export function dictGetName(dict: PdfDict, key: string, resolve?: ResolveFn): string | undefined {
  const obj = dictGet(dict, key, resolve);
  return obj && isName(obj) ? obj.value : undefined;
}

export function dictGetNumber(dict: PdfDict, key: string, resolve?: ResolveFn): number | undefined {
  const obj = dictGet(dict, key, resolve);
  return obj && isNumber(obj) ? obj.value : undefined;
}

export function dictGetBool(dict: PdfDict, key: string, resolve?: ResolveFn): boolean | undefined {
  const obj = dictGet(dict, key, resolve);
  return obj && isBool(obj) ? obj.value : undefined;
}

export function dictGetArray(dict: PdfDict, key: string, resolve?: ResolveFn): PdfArray | undefined {
  const obj = dictGet(dict, key, resolve);
  return obj && isArray(obj) ? obj : undefined;
}

export function dictGetDict(dict: PdfDict, key: string, resolve?: ResolveFn): PdfDict | undefined {
  const obj = dictGet(dict, key, resolve);
  if (!obj) return undefined;
  if (isDict(obj)) return obj;
  return isStream(obj) ? obj.dict : undefined;
}

/**
 * Numbers of an array, or undefined when any element is not a number.
 */
export function numbersOf(arr: PdfArray, resolve: ResolveFn = identityResolve): number[] | undefined {
  const values: number[] = [];
  for (const item of arr.items) {
    const resolved = resolve(item);
    if (!isNumber(resolved)) return undefined;
    values.push(resolved.value);
  }
  return values;
}
