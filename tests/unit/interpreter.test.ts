import { describe, it, expect } from 'vitest';
import { OperatorInterpreter } from '../../src/content/interpreter.js';
import { op } from '../../src/parser/content.js';
import { pdfBool, pdfDict, pdfName, pdfNumber } from '../../src/parser/types.js';
import { createResourceScope, type FormResource, type ImageResource } from '../../src/resources.js';
import type { DrawCommand, TextMeasurer } from '../../src/types.js';
import { defaultCodecs } from '../../src/stream/filters.js';

const encode = (s: string) => Uint8Array.from(s, (c) => c.charCodeAt(0));

const measurer: TextMeasurer = {
  measure: (text) => text.length * 4,
  extent: (text) => ({ width: text.length * 5, height: 10, descent: 2 }),
};

function run(source: string, interpreter = new OperatorInterpreter({ textMeasurer: measurer })) {
  return interpreter.interpretContent(encode(source));
}

function ops(commands: readonly DrawCommand[]): string[] {
  return commands.map((c) => c.op);
}

function rgbImage(overrides: Partial<ImageResource> = {}): ImageResource {
  return {
    kind: 'image',
    width: 1,
    height: 1,
    bitsPerComponent: 8,
    colorSpace: { family: 'DeviceRGB' },
    filters: [],
    stencil: false,
    inverted: false,
    mask: null,
    softMask: false,
    data: new Uint8Array([10, 20, 30]),
    ...overrides,
  };
}

const rectForm: FormResource = {
  kind: 'form',
  operations: [op('re', 0, 0, 5, 5), op('f')],
  bbox: [0, 0, 5, 5],
  matrix: [1, 0, 0, 1, 0, 0],
  resources: null,
};

describe('OperatorInterpreter', () => {
  describe('graphics state', () => {
    it('restores the fill color saved by q', () => {
      const { commands, error } = run('1 0 0 rg q 0 1 0 rg Q 0 0 10 10 re f');
      expect(error).toBeNull();
      expect(commands).toEqual([
        { op: 'PushState' },
        { op: 'PopState' },
        { op: 'SetPen', pen: null },
        { op: 'SetBrush', brush: { color: { r: 255, g: 0, b: 0, a: 255 } } },
        { op: 'CreatePath' },
        { op: 'AddRectangle', x: 0, y: -10, width: 10, height: 10 },
        { op: 'DrawPath', rule: 'nonzero' },
      ]);
    });

    it('restores pen, brush, font and text position saved by q', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      const gs = pdfDict({ CA: pdfNumber(0.5), ca: pdfNumber(0.5) });
      const scope = createResourceScope('s', {
        fonts: new Map([['F1', 'Helvetica'], ['F2', 'Courier']]),
        extGStates: new Map([['GS1', gs]]),
      });
      const { commands, error } = interpreter.interpretContent(encode(
        '3 w 1 J [2 1] 0 d 0 1 0 RG 0 0 1 rg BT /F1 10 Tf 14 TL 0 100 Td '
        + 'q 5 w 2 J 2 j [] 0 d 1 0 0 RG 1 0 0 rg /GS1 gs /F2 20 Tf 30 TL 50 50 Td Q '
        + '(a) Tj T* (b) Tj ET 0 0 m 10 0 l B',
      ), scope);

      expect(error).toBeNull();
      const blue = { r: 0, g: 0, b: 255, a: 255 };
      const fonts = commands.filter((c) => c.op === 'SetFont');
      expect(fonts).toHaveLength(2);
      for (const setFont of fonts) {
        expect(setFont).toMatchObject({ font: { baseFont: 'Helvetica', size: 10 }, color: blue });
      }
      expect(commands.filter((c) => c.op === 'DrawText')).toEqual([
        { op: 'DrawText', text: 'a', x: 0, y: -108 },
        { op: 'DrawText', text: 'b', x: 0, y: -94 },
      ]);
      expect(commands.find((c) => c.op === 'SetPen')).toEqual({
        op: 'SetPen',
        pen: { color: { r: 0, g: 255, b: 0, a: 255 }, width: 3, cap: 'round', join: 'miter', dashes: [2, 1] },
      });
      expect(commands.find((c) => c.op === 'SetBrush')).toEqual({ op: 'SetBrush', brush: { color: blue } });
    });

    it('converts CMYK fill colors', () => {
      const { commands } = run('0 1 1 0 k 0 0 1 1 re f');
      expect(commands[1]).toEqual({ op: 'SetBrush', brush: { color: { r: 255, g: 0, b: 0, a: 255 } } });
    });

    it('takes SC components in the selected color space', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', { colorSpaces: new Map([['CS0', { family: 'DeviceRGB' as const }]]) });
      const { commands } = interpreter.interpretContent(encode('/CS0 cs 0 0 1 sc 0 0 1 1 re f'), scope);
      expect(commands[1]).toEqual({ op: 'SetBrush', brush: { color: { r: 0, g: 0, b: 255, a: 255 } } });
    });

    it('raises thin line widths to 1', () => {
      const { commands } = run('0.2 w 2 J 0 0 m 10 0 l S');
      expect(commands[0]).toEqual({
        op: 'SetPen',
        pen: { color: { r: 0, g: 0, b: 0, a: 255 }, width: 1, cap: 'projecting', join: 'miter', dashes: null },
      });
    });

    it('flips the y terms of cm', () => {
      const { commands } = run('1 0 0 1 10 20 cm');
      expect(commands).toEqual([{ op: 'ConcatTransform', matrix: [1, 0, 0, 1, 10, -20] }]);
    });

    it('applies ExtGState alpha and reports unknown keys', () => {
      const interpreter = new OperatorInterpreter();
      const gs = pdfDict({ Type: pdfName('ExtGState'), ca: pdfNumber(0.5), BM: pdfName('Multiply'), TK: pdfBool(true) });
      const scope = createResourceScope('s', { extGStates: new Map([['GS1', gs]]) });
      const { commands } = interpreter.interpretContent(encode('/GS1 gs 0 0 1 1 re f'), scope);
      expect(commands[1]).toEqual({ op: 'SetBrush', brush: { color: { r: 0, g: 0, b: 0, a: 128 } } });
      expect(interpreter.warnings.has('unsupported', 'extgstate-key:TK')).toBe(true);
      expect(interpreter.warnings.has('unsupported', 'extgstate-key:BM')).toBe(false);
    });

    it('warns on Q without q and resets the state', () => {
      const interpreter = new OperatorInterpreter();
      const { commands } = run('1 0 0 rg Q 0 0 1 1 re f', interpreter);
      expect(interpreter.warnings.has('stack', 'restore-underflow')).toBe(true);
      expect(commands[0]).toEqual({ op: 'SetPen', pen: null });
      expect(commands[1]).toEqual({ op: 'SetBrush', brush: { color: { r: 0, g: 0, b: 0, a: 255 } } });
    });

    it('pops saves left open at the end of the page', () => {
      const interpreter = new OperatorInterpreter();
      const { commands } = run('q q', interpreter);
      expect(ops(commands)).toEqual(['PushState', 'PushState', 'PopState', 'PopState']);
      expect(interpreter.warnings.has('stack', 'unbalanced-save')).toBe(true);
    });
  });

  describe('diagnostics', () => {
    it('reports an unknown operator once and keeps going', () => {
      const interpreter = new OperatorInterpreter();
      const { commands } = run('zz zz 0 0 1 1 re f', interpreter);
      expect(interpreter.warnings.all).toEqual([
        { kind: 'unknown-operator', key: 'zz', message: 'Operator zz is not implemented' },
      ]);
      expect(commands).toHaveLength(5);
    });

    it('ignores marked content silently', () => {
      const interpreter = new OperatorInterpreter();
      run('/Span <</MCID 0>> BDC EMC', interpreter);
      expect(interpreter.warnings.size).toBe(0);
    });

    it('keeps commands produced before an unexpected failure', () => {
      const failing: TextMeasurer = {
        extent: () => {
          throw new Error('boom');
        },
      };
      const { commands, error } = run('0 0 1 1 re f BT /F1 12 Tf (x) Tj ET', new OperatorInterpreter({ textMeasurer: failing }));
      expect(ops(commands)).toEqual(['SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath']);
      expect(error?.message).toBe('boom');
    });
  });

  describe('text', () => {
    const scope = createResourceScope('s', { fonts: new Map([['F1', 'Helvetica'], ['F2', 'Garamond']]) });

    it('draws one DrawText per TJ string', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      const { commands } = interpreter.interpretContent(
        encode('BT /F1 12 Tf 100 700 Td [(Ab) -120 (c)] TJ ET'),
        scope,
      );
      expect(commands.filter((c) => c.op === 'DrawText')).toEqual([
        { op: 'DrawText', text: 'Ab', x: 100, y: -708 },
        { op: 'DrawText', text: 'c', x: 108, y: -708 },
      ]);
    });

    it('moves to the next line by the leading', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      const { commands } = interpreter.interpretContent(
        encode('BT /F1 10 Tf 14 TL 0 100 Td (a) Tj (b) \' ET'),
        scope,
      );
      expect(commands.filter((c) => c.op === 'DrawText')).toEqual([
        { op: 'DrawText', text: 'a', x: 0, y: -108 },
        { op: 'DrawText', text: 'b', x: 0, y: -94 },
      ]);
    });

    it('ignores text-showing operators outside BT/ET', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      const { commands } = interpreter.interpretContent(encode('/F1 12 Tf (x) Tj'), scope);
      expect(commands).toEqual([]);
      expect(interpreter.warnings.has('stack', 'outside-text:Tj')).toBe(true);
    });

    it('collects unknown fonts for the session', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      interpreter.interpretContent(encode('BT /F2 12 Tf (x) Tj ET'), scope);
      expect([...interpreter.missingFonts]).toEqual(['Garamond']);
    });

    it('warns about a font missing from the resources', () => {
      const interpreter = new OperatorInterpreter({ textMeasurer: measurer });
      interpreter.interpretContent(encode('BT /F9 12 Tf (x) Tj ET'), scope);
      expect(interpreter.warnings.has('resource-not-found', 'font:F9')).toBe(true);
    });
  });

  describe('images', () => {
    it('draws an image with the scale folded into its rectangle', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', { xobjects: new Map([['Im1', rgbImage()]]) });
      const { commands } = interpreter.interpretContent(encode('q 200 0 0 100 50 60 cm /Im1 Do Q'), scope);
      expect(commands).toEqual([
        { op: 'PushState' },
        { op: 'ConcatTransform', matrix: [1, 0, 0, 1, 50, -60] },
        {
          op: 'DrawBitmap',
          bitmap: { format: 'rgb', width: 1, height: 1, data: new Uint8Array([10, 20, 30]), mask: null },
          x: 0,
          y: -100,
          width: 200,
          height: 100,
        },
        { op: 'PopState' },
      ]);
    });

    it('skips a CMYK image and draws the rest of the page', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', {
        xobjects: new Map([['Im1', rgbImage({ colorSpace: { family: 'DeviceCMYK' }, data: new Uint8Array(4) })]]),
      });
      const { commands, error } = interpreter.interpretContent(
        encode('q 10 0 0 10 0 0 cm /Im1 Do Q 0 0 1 1 re f'),
        scope,
      );
      expect(error).toBeNull();
      expect(ops(commands)).toEqual([
        'PushState', 'ConcatTransform', 'PopState',
        'SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath',
      ]);
      expect(interpreter.warnings.has('unsupported', 'image:DeviceCMYK')).toBe(true);
    });

    it('skips an image with a malformed color key', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', {
        xobjects: new Map([['Im1', rgbImage({ mask: { kind: 'color-key', ranges: [1, 2, 3] } })]]),
      });
      const { commands, error } = interpreter.interpretContent(encode('/Im1 Do'), scope);
      expect(error).toBeNull();
      expect(commands).toEqual([]);
      expect(interpreter.warnings.has('decode-failure')).toBe(true);
    });

    it('skips an image whose injected codec throws and draws the rest of the page', () => {
      const interpreter = new OperatorInterpreter({
        codecs: {
          ...defaultCodecs,
          ccittFax: () => {
            throw new Error('bad fax data');
          },
        },
      });
      const fax = rgbImage({ filters: [{ name: 'CCITTFaxDecode', params: {} }] });
      const scope = createResourceScope('s', { xobjects: new Map([['Im1', fax]]) });
      const { commands, error } = interpreter.interpretContent(
        encode('q 10 0 0 10 0 0 cm /Im1 Do Q 0 0 5 5 re f'),
        scope,
      );
      expect(error).toBeNull();
      expect(ops(commands)).toEqual([
        'PushState', 'ConcatTransform', 'PopState',
        'SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath',
      ]);
      expect(interpreter.warnings.has('decode-failure', 'Im1: bad fax data')).toBe(true);
    });

    it('skips an image too large to expand', () => {
      const interpreter = new OperatorInterpreter();
      const huge = rgbImage({ width: 1e6, height: 1e6, colorSpace: { family: 'DeviceGray' } });
      const scope = createResourceScope('s', { xobjects: new Map([['Im1', huge]]) });
      const { commands, error } = interpreter.interpretContent(encode('q /Im1 Do Q 0 0 5 5 re f'), scope);
      expect(error).toBeNull();
      expect(ops(commands)).toEqual([
        'PushState', 'PopState', 'SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath',
      ]);
      expect(interpreter.warnings.has('decode-failure', 'Im1: image size 1000000x1000000 is too large')).toBe(true);
    });

    it('skips an image whose mask image has a negative width', () => {
      const interpreter = new OperatorInterpreter();
      const maskImage = rgbImage({ width: -4, colorSpace: null, bitsPerComponent: 1, data: new Uint8Array([0]) });
      const masked = rgbImage({ mask: { kind: 'mask-image', image: maskImage } });
      const scope = createResourceScope('s', { xobjects: new Map([['Im1', masked]]) });
      const { commands, error } = interpreter.interpretContent(encode('/Im1 Do 0 0 5 5 re f'), scope);
      expect(error).toBeNull();
      expect(ops(commands)).toEqual(['SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath']);
      expect(interpreter.warnings.has('decode-failure', 'Im1: mask: invalid image size -4x1')).toBe(true);
    });

    it('paints an inline stencil image with the fill color', () => {
      const { commands } = run('1 0 0 rg BI /W 1 /H 1 /IM true ID ? EI');
      expect(commands).toHaveLength(1);
      const [draw] = commands;
      expect(draw.op === 'DrawBitmap' && Array.from(draw.bitmap.data)).toEqual([255, 0, 0]);
      expect(draw).toMatchObject({ x: 0, y: -1, width: 1, height: 1 });
    });

    it('warns about a missing XObject', () => {
      const interpreter = new OperatorInterpreter();
      run('/Nope Do', interpreter);
      expect(interpreter.warnings.has('resource-not-found', 'xobject:Nope')).toBe(true);
    });
  });

  describe('forms', () => {
    it('expands a form referenced twice only once', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', { xobjects: new Map([['Fm1', rectForm]]) });
      const { commands } = interpreter.interpretContent(encode('/Fm1 Do /Fm1 Do'), scope);

      const once = [
        'PushState', 'ConcatTransform', 'SetPen', 'SetBrush', 'CreatePath', 'AddRectangle', 'DrawPath', 'PopState',
      ];
      expect(ops(commands)).toEqual([...once, ...once]);
      expect(interpreter.formCache.expansions).toBe(1);
    });

    it('shares expansions between pages of a session', () => {
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', { xobjects: new Map([['Fm1', rectForm]]) });
      interpreter.interpretContent(encode('/Fm1 Do'), scope);
      interpreter.interpretContent(encode('/Fm1 Do'), scope);
      expect(interpreter.formCache.expansions).toBe(1);
    });

    it('draws a form with a very long command list', () => {
      const operations = Array.from({ length: 50_000 }, () => [op('re', 0, 0, 1, 1), op('f')]).flat();
      const interpreter = new OperatorInterpreter();
      const scope = createResourceScope('s', { xobjects: new Map([['Fm1', { ...rectForm, operations }]]) });
      const { commands, error } = interpreter.interpretContent(encode('/Fm1 Do'), scope);
      expect(error).toBeNull();
      expect(commands).toHaveLength(250_003);
      expect(commands[commands.length - 1]).toEqual({ op: 'PopState' });
    });

    it('stops a self-referencing form at the depth limit', () => {
      const selfForm: FormResource = { ...rectForm, operations: [op('Do', { type: 'name', value: 'Fm1' })] };
      const interpreter = new OperatorInterpreter({ maxFormDepth: 3 });
      const scope = createResourceScope('s', { xobjects: new Map([['Fm1', selfForm]]) });
      const { commands, error } = interpreter.interpretContent(encode('/Fm1 Do'), scope);
      expect(error).toBeNull();
      expect(interpreter.warnings.has('recursion', 'Fm1')).toBe(true);
      expect(commands.filter((c) => c.op === 'PushState')).toHaveLength(3);
    });
  });
});
