/**
 * Content stream tokenizer: turns content bytes into (operands, operator)
 * pairs. Inline images (`BI <dict> ID <bytes> EI`) become a single `BI`
 * operation whose only operand carries the image dictionary and raw data.
 */

import { ContentLexer, TokenType, type Token } from './lexer.js';

/** Typed operand from content stream parsing */
export type Operand =
  | { readonly type: 'number'; readonly value: number }
  | { readonly type: 'string'; readonly value: Uint8Array }
  | { readonly type: 'name'; readonly value: string }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'null' }
  | { readonly type: 'array'; readonly value: Operand[] }
  | { readonly type: 'dict'; readonly value: Map<string, Operand> }
  | { readonly type: 'inline-image'; readonly dict: Map<string, Operand>; readonly data: Uint8Array };

export interface Operation {
  readonly operator: string;
  readonly operands: readonly Operand[];
}

// ─── Operand constructors (used by hosts with their own tokenizer, and by tests) ───

export const num = (value: number): Operand => ({ type: 'number', value });
export const name = (value: string): Operand => ({ type: 'name', value });
export const arr = (...value: Operand[]): Operand => ({ type: 'array', value });

/** Literal string operand from Latin-1 text */
export function str(text: string): Operand {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) bytes[i] = text.charCodeAt(i) & 0xff;
  return { type: 'string', value: bytes };
}

/** Build an operation; bare numbers become number operands */
export function op(operator: string, ...operands: Array<Operand | number>): Operation {
  return {
    operator,
    operands: operands.map((o) => (typeof o === 'number' ? num(o) : o)),
  };
}

/**
 * Tokenize a content stream into operations. Operands left over at the end
 * of the stream (no operator follows them) are dropped.
 */
export function tokenizeContent(data: Uint8Array): Operation[] {
  const lexer = new ContentLexer(data);
  const operations: Operation[] = [];
  let operands: Operand[] = [];

  for (;;) {
    const token = lexer.nextToken();

    switch (token.type) {
      case TokenType.EOF:
        return operations;
      case TokenType.Keyword:
        if (token.value === 'BI') {
          operations.push({ operator: 'BI', operands: [readInlineImage(lexer)] });
        } else {
          operations.push({ operator: token.value, operands });
        }
        operands = [];
        break;
      default: {
        const operand = operandFromToken(token, lexer);
        if (operand) operands.push(operand);
      }
    }
  }
}

type ValueToken = Exclude<Token, { type: TokenType.EOF } | { type: TokenType.Keyword }>;

function operandFromToken(token: ValueToken, lexer: ContentLexer): Operand | null {
  switch (token.type) {
    case TokenType.Number:
      return { type: 'number', value: token.value };
    case TokenType.String:
    case TokenType.HexString:
      return { type: 'string', value: token.value };
    case TokenType.Name:
      return { type: 'name', value: token.value };
    case TokenType.Bool:
      return { type: 'bool', value: token.value };
    case TokenType.Null:
      return { type: 'null' };
    case TokenType.ArrayStart:
      return { type: 'array', value: collectArray(lexer) };
    case TokenType.DictStart:
      return { type: 'dict', value: collectDict(lexer) };
    case TokenType.ArrayEnd:
    case TokenType.DictEnd:
      return null;
  }
}

function collectArray(lexer: ContentLexer): Operand[] {
  const items: Operand[] = [];

  for (;;) {
    const token = lexer.nextToken();
    if (token.type === TokenType.ArrayEnd || token.type === TokenType.EOF) break;
    if (token.type === TokenType.Keyword) continue;

    const operand = operandFromToken(token, lexer);
    if (operand) items.push(operand);
  }

  return items;
}

function collectDict(lexer: ContentLexer): Map<string, Operand> {
  const entries = new Map<string, Operand>();
  let key: string | null = null;

  for (;;) {
    const token = lexer.nextToken();
    if (token.type === TokenType.DictEnd || token.type === TokenType.EOF) break;
    if (token.type === TokenType.Keyword) continue;

    if (key === null) {
      if (token.type === TokenType.Name) key = token.value;
      continue;
    }

    const operand = operandFromToken(token, lexer);
    if (operand) entries.set(key, operand);
    key = null;
  }

  return entries;
}

/** Read `key value ... ID <data> EI` after a BI keyword */
function readInlineImage(lexer: ContentLexer): Operand {
  const dict = new Map<string, Operand>();
  let key: string | null = null;

  for (;;) {
    const token = lexer.nextToken();
    if (token.type === TokenType.EOF) break;

    if (token.type === TokenType.Keyword) {
      if (token.value === 'ID') {
        return { type: 'inline-image', dict, data: lexer.readInlineImageData() };
      }
      // Abbreviated color space values such as /G are names; bare keywords are stray
      continue;
    }

    if (key === null) {
      if (token.type === TokenType.Name) key = token.value;
      continue;
    }

    const operand = operandFromToken(token, lexer);
    if (operand) dict.set(key, operand);
    key = null;
  }

  return { type: 'inline-image', dict, data: new Uint8Array(0) };
}
