/**
 * Public API shared by the Node and browser entry points.
 */

export { DrawlistSession, DrawlistPage } from './session.js';
export type { SessionOptions, PageSource } from './session.js';
export { OperatorInterpreter } from './content/interpreter.js';
export type { InterpreterOptions } from './content/interpreter.js';
export { FormCache } from './content/form-cache.js';
export { FontResolver, fontSpec } from './content/font-resolver.js';
export type { ResolvedFont } from './content/font-resolver.js';
export { standardFontMeasurer } from './content/text-metrics.js';
export { foldTransforms } from './content/transform-fold.js';
export { decodeInstruction } from './content/operators.js';
export type { Instruction } from './content/operators.js';
export { WarningLog } from './diagnostics.js';
export type { Warning, WarningKind, WarningListener } from './diagnostics.js';
export {
  buildResourceScope,
  createResourceScope,
  imageResourceFromInline,
  imageResourceFromStream,
  parseColorSpace,
} from './resources.js';
export type {
  ColorSpace,
  FormResource,
  ImageMaskSpec,
  ImageResource,
  ResourceScope,
  ResourceScopeInit,
  XObjectResource,
} from './resources.js';
export { decodeImage } from './image/pipeline.js';
export type { ImageDecodeOptions, ImageDecodeResult } from './image/pipeline.js';
export { tokenizeContent, op, num, name, arr, str } from './parser/content.js';
export type { Operand, Operation } from './parser/content.js';
export {
  pdfArray, pdfBool, pdfDict, pdfName, pdfNumber, pdfNumbers, pdfRef, pdfStream, pdfString, PDF_NULL,
} from './parser/types.js';
export type { PdfDict, PdfObject, PdfStream, ResolveFn } from './parser/types.js';
export { defaultCodecs } from './stream/filters.js';
export type { DecodeParams, FilterCodec, FilterCodecs } from './stream/filters.js';
export { DrawlistError, PdfDecodeError, PdfUnsupportedError, InvariantError } from './errors.js';
export type {
  Bitmap,
  BitmapMask,
  Brush,
  DrawCommand,
  DrawOp,
  FillRule,
  FontFamily,
  FontSpec,
  JpegDecoder,
  LineCap,
  LineJoin,
  Matrix,
  PageDrawing,
  Pen,
  Rgb,
  Rgba,
  TextExtent,
  TextMeasurer,
} from './types.js';
