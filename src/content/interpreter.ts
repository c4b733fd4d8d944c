/**
 * Content Stream Interpreter
 *
 * Runs the operations of a page (or form XObject) against a graphics state
 * stack and produces the page's draw commands. Each operation is decoded
 * into an `Instruction` and dispatched; paths, text, images and forms are
 * delegated to their own modules. Problems are reported to the warning log
 * and never stop the page.
 *
 * One interpreter serves one document session: the form cache, the set of
 * missing fonts and the warning log persist across pages, while every page
 * starts from the default graphics state.
 */

import type { DrawCommand, JpegDecoder, PageDrawing, Rgb, TextMeasurer } from '../types.js';
import type { Operation } from '../parser/content.js';
import { op, tokenizeContent } from '../parser/content.js';
import type { PdfDict } from '../parser/types.js';
import {
  dictGetArray, dictGetBool, dictGetName, dictGetNumber, isArray, isName, isNumber, numbersOf,
} from '../parser/types.js';
import { InvariantError } from '../errors.js';
import { WarningLog, type WarningKind, type WarningListener } from '../diagnostics.js';
import {
  EMPTY_SCOPE, imageResourceFromInline,
  type ColorSpace, type FormResource, type ImageResource, type ResourceScope,
} from '../resources.js';
import { decodeImage, type ImageDecodeResult } from '../image/pipeline.js';
import { defaultCodecs, type FilterCodecs } from '../stream/filters.js';
import { decodeInstruction, type ColorTarget, type Instruction } from './operators.js';
import {
  LINE_CAPS, LINE_JOINS, clampLineWidth, cloneGraphicsState, createGraphicsState,
  type ColorFamily, type GraphicsState,
} from './graphics-state.js';
import { PathAccumulator } from './path.js';
import { cmykToRgb, grayToRgb, rgbToRgb } from './color.js';
import { toDeviceTransform } from './matrix.js';
import { FontResolver } from './font-resolver.js';
import { decodeLatin1, layoutText, type TextLayoutOptions } from './text.js';
import { standardFontMeasurer } from './text-metrics.js';
import { FormCache } from './form-cache.js';
import { foldTransforms } from './transform-fold.js';

export interface InterpreterOptions {
  /** Scale of the font used to measure text (default 1) */
  fontScaleMetrics?: number;
  /** Scale of the font handed to the rasterizer (default 1) */
  fontScaleSize?: number;
  /** Text width provider (default: Standard 14 font metrics) */
  textMeasurer?: TextMeasurer;
  /** Decodes DCT images to RGB; without one JPEG bitmaps are passed through encoded */
  jpegDecoder?: JpegDecoder;
  /** Filter codecs for image payloads; CCITT fax needs `ccittFax` */
  codecs?: FilterCodecs;
  /** Deepest form XObject nesting expanded (default 10) */
  maxFormDepth?: number;
  /** Share a form cache between interpreters (default: one per interpreter) */
  formCache?: FormCache;
  onWarning?: WarningListener;
}

/** Execution context of one page or form */
interface Frame {
  state: GraphicsState;
  readonly initial: GraphicsState;
  readonly stack: GraphicsState[];
  readonly path: PathAccumulator;
  inText: boolean;
  readonly resources: ResourceScope;
  readonly depth: number;
  readonly out: DrawCommand[];
}

const DEVICE_FAMILIES: Readonly<Record<string, ColorFamily>> = {
  DeviceGray: 'DeviceGray',
  G: 'DeviceGray',
  DeviceRGB: 'DeviceRGB',
  RGB: 'DeviceRGB',
  DeviceCMYK: 'DeviceCMYK',
  CMYK: 'DeviceCMYK',
};

const COMPONENTS: Readonly<Record<ColorFamily, number>> = {
  DeviceGray: 1,
  DeviceRGB: 3,
  DeviceCMYK: 4,
  Other: 0,
};

/** ExtGState keys applied to the state; any other key is reported */
const EXT_G_STATE_KEYS = new Set(['Type', 'SA', 'CA', 'ca', 'LW', 'LC', 'LJ', 'ML', 'D', 'RI', 'OP', 'op', 'OPM', 'BM']);

/** Instructions that need an open text object */
const TEXT_OBJECT_KINDS = new Set<Instruction['kind']>([
  'textMatrix', 'textMove', 'nextLine',
  'showText', 'nextLineShowText', 'nextLineShowTextSpaced', 'showTextArray',
]);

export class OperatorInterpreter {
  readonly warnings: WarningLog;
  readonly formCache: FormCache;
  private readonly fonts = new FontResolver();
  private readonly text: TextLayoutOptions;
  private readonly codecs: FilterCodecs;
  private readonly jpegDecoder: JpegDecoder | undefined;
  private readonly maxFormDepth: number;

  constructor(options?: InterpreterOptions) {
    this.warnings = new WarningLog(options?.onWarning);
    this.formCache = options?.formCache ?? new FormCache();
    this.text = {
      measurer: options?.textMeasurer ?? standardFontMeasurer,
      fontScaleMetrics: options?.fontScaleMetrics ?? 1,
      fontScaleSize: options?.fontScaleSize ?? 1,
    };
    this.codecs = options?.codecs ?? defaultCodecs;
    this.jpegDecoder = options?.jpegDecoder;
    this.maxFormDepth = options?.maxFormDepth ?? 10;
  }

  /** BaseFont names seen so far that matched no known family */
  get missingFonts(): ReadonlySet<string> {
    return this.fonts.missingFonts;
  }

  /**
   * Interpret one page. The commands produced before an unexpected failure
   * are kept and the failure is returned in `error`.
   */
  interpretPage(operations: readonly Operation[], resources: ResourceScope = EMPTY_SCOPE): PageDrawing {
    const commands: DrawCommand[] = [];
    let error: Error | null = null;

    try {
      this.runScope(operations, resources, 0, createGraphicsState(), commands);
    } catch (err) {
      error = err instanceof Error ? err : new Error(String(err));
    }

    return { commands: foldTransforms(commands), error };
  }

  /** Tokenize and interpret raw (already decoded) content stream bytes */
  interpretContent(content: Uint8Array, resources: ResourceScope = EMPTY_SCOPE): PageDrawing {
    return this.interpretPage(tokenizeContent(content), resources);
  }

  // ─── Scopes ───

  private runScope(
    operations: readonly Operation[],
    resources: ResourceScope,
    depth: number,
    initial: GraphicsState,
    out: DrawCommand[],
  ): void {
    const frame: Frame = {
      state: cloneGraphicsState(initial),
      initial,
      stack: [],
      path: new PathAccumulator(),
      inText: false,
      resources,
      depth,
      out,
    };

    for (const operation of operations) {
      this.dispatch(frame, decodeInstruction(operation), operation.operator);
    }

    if (frame.stack.length > 0) {
      this.warn('stack', 'unbalanced-save', `${frame.stack.length} q without matching Q at end of content`);
      while (frame.stack.length > 0) this.restore(frame);
    }
  }

  private restore(frame: Frame): void {
    const saved = frame.stack.pop();
    if (!saved) {
      this.warn('stack', 'restore-underflow', 'Q without matching q');
      frame.state = cloneGraphicsState(frame.initial);
      return;
    }
    frame.state = saved;
    frame.out.push({ op: 'PopState' });
  }

  // ─── Dispatch ───

  private dispatch(frame: Frame, ins: Instruction, operator: string): void {
    const state = frame.state;
    const ts = state.text;

    if (TEXT_OBJECT_KINDS.has(ins.kind) && !frame.inText) {
      this.warn('stack', `outside-text:${operator}`, `${operator} outside BT/ET is ignored`);
      return;
    }

    switch (ins.kind) {
      case 'save':
        frame.stack.push(cloneGraphicsState(state));
        frame.out.push({ op: 'PushState' });
        break;
      case 'restore':
        this.restore(frame);
        break;
      case 'transform':
        frame.out.push({ op: 'ConcatTransform', matrix: toDeviceTransform(ins.matrix) });
        break;
      case 'extGState':
        this.applyExtGState(frame, ins.name);
        break;
      case 'lineWidth':
        state.lineWidth = clampLineWidth(ins.width);
        break;
      case 'lineCap':
        state.lineCap = ins.cap;
        break;
      case 'lineJoin':
        state.lineJoin = ins.join;
        break;
      case 'dash':
        state.dash = { array: [...ins.array], phase: ins.phase };
        break;
      case 'miterLimit':
        state.miterLimit = ins.limit;
        break;
      case 'renderingIntent':
        state.renderingIntent = ins.intent;
        break;
      case 'flatness':
        state.flatness = ins.flatness;
        break;

      case 'rgb':
        this.setColor(state, ins.target, 'DeviceRGB', [ins.r, ins.g, ins.b]);
        break;
      case 'cmyk':
        this.setColor(state, ins.target, 'DeviceCMYK', [ins.c, ins.m, ins.y, ins.k]);
        break;
      case 'gray':
        this.setColor(state, ins.target, 'DeviceGray', [ins.gray]);
        break;
      case 'colorSpace':
        this.selectColorSpace(frame, ins.target, ins.name);
        break;
      case 'colorComponents': {
        const family = ins.target === 'stroke' ? state.strokeFamily : state.fillFamily;
        if (ins.pattern !== null || family === 'Other') {
          this.warn('unsupported', `color:${operator}`, `${operator} in a non-device color space is ignored`);
          break;
        }
        const count = COMPONENTS[family];
        if (ins.components.length < count) {
          this.warn('malformed-operator', operator, `${operator} needs ${count} components for ${family}`);
          break;
        }
        this.setColor(state, ins.target, family, ins.components.slice(ins.components.length - count));
        break;
      }

      case 'moveTo':
        frame.path.moveTo(ins.x, ins.y);
        break;
      case 'lineTo':
        frame.path.lineTo(ins.x, ins.y);
        break;
      case 'curveTo':
        frame.path.curveTo(ins.variant, ins.values);
        break;
      case 'rect':
        frame.path.rect(ins.x, ins.y, ins.width, ins.height);
        break;
      case 'closePath':
        frame.path.close();
        break;
      case 'clip':
        this.warn('unsupported', 'clip', 'Clipping paths are recorded but not applied');
        frame.path.clip(ins.rule);
        break;
      case 'paint': {
        const { commands, clip } = frame.path.resolve(ins.paintOp, state);
        appendAll(frame.out, commands);
        if (clip) state.clips.push(clip);
        break;
      }

      case 'beginText':
        if (frame.inText) this.warn('stack', 'nested-BT', 'BT inside a text object');
        frame.inText = true;
        ts.matrix = [1, 0, 0, 1, 0, 0];
        ts.lineMatrix = [1, 0, 0, 1, 0, 0];
        break;
      case 'endText':
        if (!frame.inText) this.warn('stack', 'unmatched-ET', 'ET without BT');
        frame.inText = false;
        break;
      case 'textMatrix':
        ts.matrix = [...ins.matrix];
        ts.lineMatrix = [...ins.matrix];
        break;
      case 'textMove':
        if (ins.setLeading) ts.leading = 0 - ins.ty;
        ts.lineMatrix[4] += ins.tx;
        ts.lineMatrix[5] += ins.ty;
        ts.matrix = [...ts.lineMatrix];
        break;
      case 'nextLine':
        this.nextLine(state);
        break;
      case 'leading':
        ts.leading = ins.leading;
        break;
      case 'charSpacing':
        ts.charSpacing = ins.spacing;
        break;
      case 'wordSpacing':
        ts.wordSpacing = ins.spacing;
        break;
      case 'horizontalScaling':
        ts.horizontalScaling = ins.scale;
        break;
      case 'rise':
        ts.rise = ins.rise;
        break;
      case 'renderMode':
        ts.renderMode = ins.mode;
        break;
      case 'font':
        if (!frame.resources.fonts.has(ins.name)) {
          this.warn('resource-not-found', `font:${ins.name}`, `Font resource ${ins.name} not found; using a fallback font`);
        }
        ts.fontName = ins.name;
        ts.fontSize = ins.size;
        break;
      case 'showText':
        this.showText(frame, ins.text);
        break;
      case 'nextLineShowText':
        this.nextLine(state);
        this.showText(frame, ins.text);
        break;
      case 'nextLineShowTextSpaced':
        ts.wordSpacing = ins.wordSpacing;
        ts.charSpacing = ins.charSpacing;
        this.nextLine(state);
        this.showText(frame, ins.text);
        break;
      case 'showTextArray':
        for (const item of ins.items) {
          // Numeric kerning adjustments do not move the pen
          if (typeof item !== 'number') this.showText(frame, item);
        }
        break;

      case 'xobject':
        this.drawXObject(frame, ins.name);
        break;
      case 'inlineImage': {
        const image = imageResourceFromInline(ins.dict, ins.data, frame.resources.colorSpaces, this.codecs);
        this.drawImage(frame, image, 'inline image');
        break;
      }
      case 'shading':
        this.warn('unsupported', 'sh', `Shading ${ins.name} is not drawn`);
        break;

      case 'ignored':
        break;
      case 'unknown':
        this.warn('unknown-operator', ins.operator, `Operator ${ins.operator} is not implemented`);
        break;
      case 'malformed':
        this.warn('malformed-operator', ins.operator, `Operator ${ins.operator}: ${ins.reason}`);
        break;

      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ─── Color ───

  private setColor(state: GraphicsState, target: ColorTarget, family: ColorFamily, c: readonly number[]): void {
    let color: Rgb;
    switch (family) {
      case 'DeviceRGB':
        color = rgbToRgb(c[0], c[1], c[2]);
        break;
      case 'DeviceCMYK':
        color = cmykToRgb(c[0], c[1], c[2], c[3]);
        break;
      case 'DeviceGray':
        color = grayToRgb(c[0]);
        break;
      case 'Other':
        return;
    }

    if (target === 'stroke') {
      state.strokeColor = color;
      state.strokeFamily = family;
    } else {
      state.fillColor = color;
      state.fillFamily = family;
    }
  }

  private selectColorSpace(frame: Frame, target: ColorTarget, name: string): void {
    let family: ColorFamily | undefined = DEVICE_FAMILIES[name];

    if (!family) {
      const space: ColorSpace | undefined = frame.resources.colorSpaces.get(name);
      if (!space) {
        this.warn('resource-not-found', `colorspace:${name}`, `Color space ${name} not found`);
        family = 'Other';
      } else if (space.family === 'DeviceGray' || space.family === 'DeviceRGB' || space.family === 'DeviceCMYK') {
        family = space.family;
      } else {
        const label = space.family === 'Unsupported' ? space.name : space.family;
        this.warn('unsupported', `colorspace:${label}`, `Color space ${label} is not supported for painting`);
        family = 'Other';
      }
    }

    // Selecting a space resets the color to its initial value (black)
    const initial = family === 'DeviceCMYK' ? [0, 0, 0, 1] : family === 'DeviceRGB' ? [0, 0, 0] : [0];
    if (family === 'Other') {
      if (target === 'stroke') frame.state.strokeFamily = 'Other';
      else frame.state.fillFamily = 'Other';
      return;
    }
    this.setColor(frame.state, target, family, initial);
  }

  // ─── ExtGState ───

  private applyExtGState(frame: Frame, name: string): void {
    const gs = frame.resources.extGStates.get(name);
    if (!gs) {
      this.warn('resource-not-found', `extgstate:${name}`, `ExtGState ${name} not found`);
      return;
    }

    const state = frame.state;
    const resolve = frame.resources.resolve;

    for (const key of gs.entries.keys()) {
      if (!EXT_G_STATE_KEYS.has(key)) {
        this.warn('unsupported', `extgstate-key:${key}`, `ExtGState key ${key} is not supported`);
      }
    }

    const number = (key: string): number | undefined => dictGetNumber(gs, key, resolve);
    const bool = (key: string): boolean | undefined => dictGetBool(gs, key, resolve);

    state.strokeAdjustment = bool('SA') ?? state.strokeAdjustment;
    state.strokeAlpha = number('CA') ?? state.strokeAlpha;
    state.fillAlpha = number('ca') ?? state.fillAlpha;

    const lw = number('LW');
    if (lw !== undefined) state.lineWidth = clampLineWidth(lw);
    const lc = number('LC');
    if (lc !== undefined) state.lineCap = LINE_CAPS[lc] ?? state.lineCap;
    const lj = number('LJ');
    if (lj !== undefined) state.lineJoin = LINE_JOINS[lj] ?? state.lineJoin;
    state.miterLimit = number('ML') ?? state.miterLimit;
    state.renderingIntent = dictGetName(gs, 'RI', resolve) ?? state.renderingIntent;

    const dash = readDash(gs, resolve);
    if (dash) state.dash = dash;

    // OP also sets non-stroking overprint unless op is present
    const overprint = bool('OP');
    if (overprint !== undefined) {
      state.overprintStroke = overprint;
      state.overprintFill = overprint;
    }
    state.overprintFill = bool('op') ?? state.overprintFill;
    state.overprintMode = number('OPM') ?? state.overprintMode;

    const blend = readBlendMode(gs, resolve);
    if (blend) state.blendMode = blend;
  }

  // ─── Text ───

  private nextLine(state: GraphicsState): void {
    const ts = state.text;
    ts.lineMatrix[5] -= ts.leading;
    ts.matrix = [...ts.lineMatrix];
  }

  private showText(frame: Frame, bytes: Uint8Array): void {
    const ts = frame.state.text;
    const baseFont = ts.fontName === null ? null : frame.resources.fonts.get(ts.fontName) ?? null;
    const font = this.fonts.resolve(baseFont);
    appendAll(frame.out, layoutText(decodeLatin1(bytes), frame.state, font, this.text));
  }

  // ─── XObjects and images ───

  private drawXObject(frame: Frame, name: string): void {
    const xobject = frame.resources.xobjects.get(name);
    if (!xobject) {
      this.warn('resource-not-found', `xobject:${name}`, `XObject ${name} not found`);
      return;
    }

    switch (xobject.kind) {
      case 'image':
        this.drawImage(frame, xobject, name);
        break;
      case 'form':
        this.drawForm(frame, xobject, name);
        break;
      case 'unsupported':
        this.warn('unsupported', `xobject:${xobject.subtype}`, `XObject subtype ${xobject.subtype} is not drawn`);
        break;
      case 'invalid':
        this.warn('decode-failure', `xobject:${name}`, `XObject ${name}: ${xobject.reason}`);
        break;
    }
  }

  private drawForm(frame: Frame, form: FormResource, name: string): void {
    if (frame.depth + 1 > this.maxFormDepth) {
      this.warn('recursion', name, `Form ${name} nested deeper than ${this.maxFormDepth} levels is skipped`);
      return;
    }

    const commands = this.formCache.getOrExpand(frame.resources.id, name, () => {
      const out: DrawCommand[] = [];
      const operations = [op('q'), op('cm', ...form.matrix), ...form.operations, op('Q')];
      this.runScope(operations, form.resources ?? frame.resources, frame.depth + 1, cloneGraphicsState(frame.state), out);
      return out;
    });
    appendAll(frame.out, commands);
  }

  private drawImage(frame: Frame, image: ImageResource, label: string): void {
    if (image.softMask) this.warn('unsupported', 'SMask', 'Soft masks are not applied');

    let result: ImageDecodeResult;
    try {
      result = decodeImage(image, {
        codecs: this.codecs,
        jpegDecoder: this.jpegDecoder,
        fillColor: frame.state.fillColor,
      });
    } catch (err) {
      if (!(err instanceof InvariantError)) throw err;
      this.warn('decode-failure', `${label}: ${err.message}`, `Image ${label} skipped: ${err.message}`);
      return;
    }

    if (!result.ok) {
      if (result.reason === 'unsupported') {
        this.warn('unsupported', `image:${result.detail}`, `Image ${label} skipped: ${result.detail} is not supported`);
      } else {
        this.warn('decode-failure', `${label}: ${result.detail}`, `Image ${label} skipped: ${result.detail}`);
      }
      return;
    }

    const { bitmap } = result;
    frame.out.push({ op: 'DrawBitmap', bitmap, x: 0, y: 0 - bitmap.height, width: bitmap.width, height: bitmap.height });
  }

  private warn(kind: WarningKind, key: string, message: string): void {
    this.warnings.report(kind, key, message);
  }
}

// ─── Helpers ───

function readDash(gs: PdfDict, resolve: ResourceScope['resolve']): { array: number[]; phase: number } | null {
  const d = dictGetArray(gs, 'D', resolve);
  if (!d || d.items.length < 2) return null;
  const arrayObj = resolve(d.items[0]);
  const phaseObj = resolve(d.items[1]);
  if (!isArray(arrayObj) || !isNumber(phaseObj)) return null;
  const array = numbersOf(arrayObj, resolve);
  return array ? { array, phase: phaseObj.value } : null;
}

/** BM is a name, or an array whose first name is used */
function readBlendMode(gs: PdfDict, resolve: ResourceScope['resolve']): string | null {
  const name = dictGetName(gs, 'BM', resolve);
  if (name) return name;
  const arr = dictGetArray(gs, 'BM', resolve);
  const first = arr?.items[0];
  if (!first) return null;
  const resolved = resolve(first);
  return isName(resolved) ? resolved.value : null;
}

/** Append without spreading; form and path lists can exceed the argument limit */
function appendAll(out: DrawCommand[], commands: readonly DrawCommand[]): void {
  for (const command of commands) out.push(command);
}
