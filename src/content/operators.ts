/**
 * Operator decoding: turns an (operands, operator) pair into a typed
 * `Instruction`. Operands that do not fit the operator's signature produce a
 * `malformed` instruction; operators outside the known set produce `unknown`.
 */

import type { FillRule, LineCap, LineJoin, Matrix } from '../types.js';
import type { Operand, Operation } from '../parser/content.js';
import { LINE_CAPS, LINE_JOINS } from './graphics-state.js';
import { isPaintOp, type CurveVariant, type PaintOp } from './path.js';

export type ColorTarget = 'stroke' | 'fill';

/** Elements of a TJ array: strings to show, numbers to kern (ignored) */
export type TextArrayItem = Uint8Array | number;

export type Instruction =
  // Graphics state
  | { kind: 'save' }
  | { kind: 'restore' }
  | { kind: 'transform'; matrix: Matrix }
  | { kind: 'extGState'; name: string }
  | { kind: 'lineWidth'; width: number }
  | { kind: 'lineCap'; cap: LineCap }
  | { kind: 'lineJoin'; join: LineJoin }
  | { kind: 'dash'; array: number[]; phase: number }
  | { kind: 'miterLimit'; limit: number }
  | { kind: 'renderingIntent'; intent: string }
  | { kind: 'flatness'; flatness: number }
  // Color
  | { kind: 'rgb'; target: ColorTarget; r: number; g: number; b: number }
  | { kind: 'cmyk'; target: ColorTarget; c: number; m: number; y: number; k: number }
  | { kind: 'gray'; target: ColorTarget; gray: number }
  | { kind: 'colorSpace'; target: ColorTarget; name: string }
  | { kind: 'colorComponents'; target: ColorTarget; components: number[]; pattern: string | null }
  // Path construction and painting
  | { kind: 'moveTo'; x: number; y: number }
  | { kind: 'lineTo'; x: number; y: number }
  | { kind: 'curveTo'; variant: CurveVariant; values: number[] }
  | { kind: 'rect'; x: number; y: number; width: number; height: number }
  | { kind: 'closePath' }
  | { kind: 'paint'; paintOp: PaintOp }
  | { kind: 'clip'; rule: FillRule }
  // Text objects, state and showing
  | { kind: 'beginText' }
  | { kind: 'endText' }
  | { kind: 'textMatrix'; matrix: Matrix }
  | { kind: 'textMove'; tx: number; ty: number; setLeading: boolean }
  | { kind: 'nextLine' }
  | { kind: 'leading'; leading: number }
  | { kind: 'charSpacing'; spacing: number }
  | { kind: 'wordSpacing'; spacing: number }
  | { kind: 'horizontalScaling'; scale: number }
  | { kind: 'rise'; rise: number }
  | { kind: 'renderMode'; mode: number }
  | { kind: 'font'; name: string; size: number }
  | { kind: 'showText'; text: Uint8Array }
  | { kind: 'nextLineShowText'; text: Uint8Array }
  | { kind: 'nextLineShowTextSpaced'; wordSpacing: number; charSpacing: number; text: Uint8Array }
  | { kind: 'showTextArray'; items: TextArrayItem[] }
  // XObjects, images, shadings
  | { kind: 'xobject'; name: string }
  | { kind: 'inlineImage'; dict: ReadonlyMap<string, Operand>; data: Uint8Array }
  | { kind: 'shading'; name: string }
  // Recognized but without effect on drawing (marked content, compatibility, Type 3 glyph metrics)
  | { kind: 'ignored'; operator: string }
  | { kind: 'unknown'; operator: string }
  | { kind: 'malformed'; operator: string; reason: string };

export type InstructionKind = Instruction['kind'];

const IGNORED_OPERATORS = new Set(['BMC', 'BDC', 'EMC', 'MP', 'DP', 'BX', 'EX', 'd0', 'd1']);

/** Decode one content-stream operation */
export function decodeInstruction(operation: Operation): Instruction {
  const { operator, operands } = operation;
  const malformed = (reason: string): Instruction => ({ kind: 'malformed', operator, reason });

  if (isPaintOp(operator)) return { kind: 'paint', paintOp: operator };
  if (IGNORED_OPERATORS.has(operator)) return { kind: 'ignored', operator };

  switch (operator) {
    case 'q': return { kind: 'save' };
    case 'Q': return { kind: 'restore' };
    case 'cm':
    case 'Tm': {
      const v = numbers(operands, 6);
      if (!v) return malformed('expected 6 numbers');
      const matrix: Matrix = [v[0], v[1], v[2], v[3], v[4], v[5]];
      return operator === 'cm' ? { kind: 'transform', matrix } : { kind: 'textMatrix', matrix };
    }
    case 'gs': {
      const n = lastName(operands);
      return n === null ? malformed('expected a name') : { kind: 'extGState', name: n };
    }

    case 'w': return single(operands, malformed, (width) => ({ kind: 'lineWidth', width }));
    case 'J': {
      const index = lastNumber(operands);
      const cap = index === null ? undefined : LINE_CAPS[index];
      return cap ? { kind: 'lineCap', cap } : malformed('line cap index out of range');
    }
    case 'j': {
      const index = lastNumber(operands);
      const join = index === null ? undefined : LINE_JOINS[index];
      return join ? { kind: 'lineJoin', join } : malformed('line join index out of range');
    }
    case 'd': {
      if (operands.length < 2) return malformed('expected dash array and phase');
      const arrayOperand = operands[operands.length - 2];
      const phaseOperand = operands[operands.length - 1];
      if (arrayOperand.type !== 'array' || phaseOperand.type !== 'number') {
        return malformed('expected dash array and phase');
      }
      const array = numberItems(arrayOperand.value);
      return array ? { kind: 'dash', array, phase: phaseOperand.value } : malformed('dash array must hold numbers');
    }
    case 'M': return single(operands, malformed, (limit) => ({ kind: 'miterLimit', limit }));
    case 'ri': {
      const n = lastName(operands);
      return n === null ? malformed('expected a name') : { kind: 'renderingIntent', intent: n };
    }
    case 'i': return single(operands, malformed, (flatness) => ({ kind: 'flatness', flatness }));

    case 'RG':
    case 'rg': {
      const v = numbers(operands, 3);
      if (!v) return malformed('expected 3 numbers');
      return { kind: 'rgb', target: targetOf(operator), r: v[0], g: v[1], b: v[2] };
    }
    case 'K':
    case 'k': {
      const v = numbers(operands, 4);
      if (!v) return malformed('expected 4 numbers');
      return { kind: 'cmyk', target: targetOf(operator), c: v[0], m: v[1], y: v[2], k: v[3] };
    }
    case 'G':
    case 'g':
      return single(operands, malformed, (gray) => ({ kind: 'gray', target: targetOf(operator), gray }));
    case 'CS':
    case 'cs': {
      const n = lastName(operands);
      return n === null ? malformed('expected a name') : { kind: 'colorSpace', target: targetOf(operator), name: n };
    }
    case 'SC':
    case 'sc':
    case 'SCN':
    case 'scn': {
      // SCN and scn may end with a pattern name
      const last = operands[operands.length - 1];
      const acceptsPattern = operator === 'SCN' || operator === 'scn';
      const pattern = acceptsPattern && last && last.type === 'name' ? last.value : null;
      const rest = pattern === null ? operands : operands.slice(0, -1);
      const components = numberItems(rest);
      if (!components) return malformed('expected color components');
      if (components.length === 0 && pattern === null) return malformed('expected color components');
      return { kind: 'colorComponents', target: targetOf(operator), components, pattern };
    }

    case 'm':
    case 'l': {
      const v = numbers(operands, 2);
      if (!v) return malformed('expected 2 numbers');
      return operator === 'm' ? { kind: 'moveTo', x: v[0], y: v[1] } : { kind: 'lineTo', x: v[0], y: v[1] };
    }
    case 'c': {
      const v = numbers(operands, 6);
      return v ? { kind: 'curveTo', variant: 'c', values: v } : malformed('expected 6 numbers');
    }
    case 'v':
    case 'y': {
      const v = numbers(operands, 4);
      return v ? { kind: 'curveTo', variant: operator, values: v } : malformed('expected 4 numbers');
    }
    case 're': {
      const v = numbers(operands, 4);
      if (!v) return malformed('expected 4 numbers');
      return { kind: 'rect', x: v[0], y: v[1], width: v[2], height: v[3] };
    }
    case 'h': return { kind: 'closePath' };
    case 'W': return { kind: 'clip', rule: 'nonzero' };
    case 'W*': return { kind: 'clip', rule: 'evenodd' };

    case 'BT': return { kind: 'beginText' };
    case 'ET': return { kind: 'endText' };
    case 'Td':
    case 'TD': {
      const v = numbers(operands, 2);
      if (!v) return malformed('expected 2 numbers');
      return { kind: 'textMove', tx: v[0], ty: v[1], setLeading: operator === 'TD' };
    }
    case 'T*': return { kind: 'nextLine' };
    case 'TL': return single(operands, malformed, (leading) => ({ kind: 'leading', leading }));
    case 'Tc': return single(operands, malformed, (spacing) => ({ kind: 'charSpacing', spacing }));
    case 'Tw': return single(operands, malformed, (spacing) => ({ kind: 'wordSpacing', spacing }));
    case 'Tz': return single(operands, malformed, (percent) => ({ kind: 'horizontalScaling', scale: percent / 100 }));
    case 'Ts': return single(operands, malformed, (rise) => ({ kind: 'rise', rise }));
    case 'Tr': return single(operands, malformed, (mode) => ({ kind: 'renderMode', mode }));
    case 'Tf': {
      if (operands.length < 2) return malformed('expected font name and size');
      const nameOperand = operands[operands.length - 2];
      const sizeOperand = operands[operands.length - 1];
      if (nameOperand.type !== 'name' || sizeOperand.type !== 'number') {
        return malformed('expected font name and size');
      }
      return { kind: 'font', name: nameOperand.value, size: sizeOperand.value };
    }
    case 'Tj':
    case '\'': {
      const text = lastString(operands);
      if (!text) return malformed('expected a string');
      return operator === 'Tj' ? { kind: 'showText', text } : { kind: 'nextLineShowText', text };
    }
    case '"': {
      if (operands.length < 3) return malformed('expected word spacing, char spacing and a string');
      const [aw, ac, s] = operands.slice(operands.length - 3);
      if (aw.type !== 'number' || ac.type !== 'number' || s.type !== 'string') {
        return malformed('expected word spacing, char spacing and a string');
      }
      return { kind: 'nextLineShowTextSpaced', wordSpacing: aw.value, charSpacing: ac.value, text: s.value };
    }
    case 'TJ': {
      const last = operands[operands.length - 1];
      if (!last || last.type !== 'array') return malformed('expected an array');
      const items: TextArrayItem[] = [];
      for (const element of last.value) {
        if (element.type === 'string' || element.type === 'number') items.push(element.value);
      }
      return { kind: 'showTextArray', items };
    }

    case 'Do': {
      const n = lastName(operands);
      return n === null ? malformed('expected a name') : { kind: 'xobject', name: n };
    }
    case 'BI': {
      const image = operands[0];
      if (!image || image.type !== 'inline-image') return malformed('expected inline image data');
      return { kind: 'inlineImage', dict: image.dict, data: image.data };
    }
    case 'sh': {
      const n = lastName(operands);
      return n === null ? malformed('expected a name') : { kind: 'shading', name: n };
    }
  }

  return { kind: 'unknown', operator };
}

// ─── Helpers ───

function targetOf(operator: string): ColorTarget {
  return operator[0] === operator[0].toUpperCase() ? 'stroke' : 'fill';
}

/** The last `count` operands as numbers, or null when they are missing or not numbers */
function numbers(operands: readonly Operand[], count: number): number[] | null {
  if (operands.length < count) return null;
  return numberItems(operands.slice(operands.length - count));
}

function numberItems(operands: readonly Operand[]): number[] | null {
  const values: number[] = [];
  for (const operand of operands) {
    if (operand.type !== 'number') return null;
    values.push(operand.value);
  }
  return values;
}

function lastNumber(operands: readonly Operand[]): number | null {
  const last = operands[operands.length - 1];
  return last && last.type === 'number' ? last.value : null;
}

function lastName(operands: readonly Operand[]): string | null {
  const last = operands[operands.length - 1];
  return last && last.type === 'name' ? last.value : null;
}

function lastString(operands: readonly Operand[]): Uint8Array | null {
  const last = operands[operands.length - 1];
  return last && last.type === 'string' ? last.value : null;
}

function single(
  operands: readonly Operand[],
  malformed: (reason: string) => Instruction,
  build: (value: number) => Instruction,
): Instruction {
  const value = lastNumber(operands);
  return value === null ? malformed('expected a number') : build(value);
}
