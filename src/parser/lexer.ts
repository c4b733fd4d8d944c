/**
 * Content Stream Lexer
 *
 * Reads the bytes of a page or form content stream and produces tokens:
 * numbers, literal and hex strings, names, booleans, null, operator
 * keywords, and array / dictionary delimiters. Comments and whitespace are
 * skipped. Inline image data is not tokenized here; the content tokenizer
 * reads it through `readInlineImageData`.
 */

export enum TokenType {
  Number = 'Number',
  String = 'String',
  HexString = 'HexString',
  Name = 'Name',
  Bool = 'Bool',
  Null = 'Null',
  Keyword = 'Keyword',
  ArrayStart = 'ArrayStart',
  ArrayEnd = 'ArrayEnd',
  DictStart = 'DictStart',
  DictEnd = 'DictEnd',
  EOF = 'EOF',
}

export type Token =
  | { readonly type: TokenType.Number; readonly value: number; readonly offset: number }
  | { readonly type: TokenType.String | TokenType.HexString; readonly value: Uint8Array; readonly offset: number }
  | { readonly type: TokenType.Name; readonly value: string; readonly offset: number }
  | { readonly type: TokenType.Keyword; readonly value: string; readonly offset: number }
  | { readonly type: TokenType.Bool; readonly value: boolean; readonly offset: number }
  | {
    readonly type: TokenType.Null | TokenType.ArrayStart | TokenType.ArrayEnd
      | TokenType.DictStart | TokenType.DictEnd;
    readonly offset: number;
  }
  | { readonly type: TokenType.EOF; readonly offset: number };

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0d, 0x0c, 0x20]);
const DELIMITERS = new Set([
  0x28, 0x29, // ( )
  0x3c, 0x3e, // < >
  0x5b, 0x5d, // [ ]
  0x7b, 0x7d, // { }
  0x2f,       // /
  0x25,       // %
]);

/** 'EI' */
const EI_MARKER = new Uint8Array([0x45, 0x49]);

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

function isDelimiter(byte: number): boolean {
  return DELIMITERS.has(byte);
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isOctalDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x37;
}

function isHexDigit(byte: number): boolean {
  return (byte >= 0x30 && byte <= 0x39) ||
         (byte >= 0x41 && byte <= 0x46) ||
         (byte >= 0x61 && byte <= 0x66);
}

function hexVal(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return 0;
}

export class ContentLexer {
  private readonly data: Uint8Array;
  private pos: number;

  constructor(data: Uint8Array, offset = 0) {
    this.data = data;
    this.pos = offset;
  }

  get position(): number {
    return this.pos;
  }

  get atEnd(): boolean {
    return this.pos >= this.data.length;
  }

  /** Skip whitespace and comments */
  skipWhitespaceAndComments(): void {
    while (this.pos < this.data.length) {
      const b = this.data[this.pos];
      if (isWhitespace(b)) {
        this.pos++;
        continue;
      }
      if (b === 0x25) { // % comment
        this.pos++;
        while (this.pos < this.data.length) {
          const c = this.data[this.pos++];
          if (c === 0x0a || c === 0x0d) break;
        }
        continue;
      }
      break;
    }
  }

  nextToken(): Token {
    for (;;) {
      this.skipWhitespaceAndComments();

      if (this.pos >= this.data.length) {
        return { type: TokenType.EOF, offset: this.pos };
      }

      const startOffset = this.pos;
      const b = this.data[this.pos];
      const next = this.pos + 1 < this.data.length ? this.data[this.pos + 1] : -1;

      if (b === 0x3c && next === 0x3c) {
        this.pos += 2;
        return { type: TokenType.DictStart, offset: startOffset };
      }
      if (b === 0x3e && next === 0x3e) {
        this.pos += 2;
        return { type: TokenType.DictEnd, offset: startOffset };
      }
      if (b === 0x3c) return this.readHexString(startOffset);
      if (b === 0x28) return this.readLiteralString(startOffset);
      if (b === 0x5b) {
        this.pos++;
        return { type: TokenType.ArrayStart, offset: startOffset };
      }
      if (b === 0x5d) {
        this.pos++;
        return { type: TokenType.ArrayEnd, offset: startOffset };
      }
      if (b === 0x2f) return this.readName(startOffset);
      if (isDigit(b) || b === 0x2d || b === 0x2b || b === 0x2e) {
        return this.readNumber(startOffset);
      }
      // Operators include ' and " besides letters and *
      if ((b >= 0x41 && b <= 0x7a) || b === 0x27 || b === 0x22) {
        return this.readKeyword(startOffset);
      }

      // Stray delimiter such as ')' or '}': skip it
      this.pos++;
    }
  }

  /**
   * Read inline image bytes following the `ID` operator, up to (not
   * including) the whitespace-delimited `EI`. Leaves the lexer after `EI`.
   */
  readInlineImageData(): Uint8Array {
    // Exactly one whitespace byte separates ID from the data
    if (this.pos < this.data.length && isWhitespace(this.data[this.pos])) this.pos++;
    const start = this.pos;

    let search = start;
    while (search < this.data.length) {
      const at = this.findNext(EI_MARKER, search);
      if (at === -1) break;

      const before = at > start ? this.data[at - 1] : 0x20;
      const after = at + 2 < this.data.length ? this.data[at + 2] : 0x20;
      if (isWhitespace(before) && (isWhitespace(after) || isDelimiter(after))) {
        this.pos = at + 2;
        return this.data.slice(start, at - 1 >= start ? at - 1 : at);
      }
      search = at + 1;
    }

    this.pos = this.data.length;
    return this.data.slice(start);
  }

  private readHexString(startOffset: number): Token {
    this.pos++; // skip <
    const bytes: number[] = [];
    let high = -1;

    while (this.pos < this.data.length) {
      const c = this.data[this.pos++];
      if (c === 0x3e) break; // >
      if (isWhitespace(c) || !isHexDigit(c)) continue;

      if (high === -1) {
        high = hexVal(c);
      } else {
        bytes.push((high << 4) | hexVal(c));
        high = -1;
      }
    }

    // Odd number of hex digits: pad with 0
    if (high !== -1) {
      bytes.push(high << 4);
    }

    return { type: TokenType.HexString, value: new Uint8Array(bytes), offset: startOffset };
  }

  private readLiteralString(startOffset: number): Token {
    this.pos++; // skip (
    const bytes: number[] = [];
    let depth = 1;

    while (this.pos < this.data.length && depth > 0) {
      const c = this.data[this.pos++];

      if (c === 0x28) {
        depth++;
        bytes.push(c);
      } else if (c === 0x29) {
        depth--;
        if (depth > 0) bytes.push(c);
      } else if (c === 0x5c) {
        if (this.pos >= this.data.length) break;
        this.readEscape(bytes);
      } else {
        bytes.push(c);
      }
    }

    return { type: TokenType.String, value: new Uint8Array(bytes), offset: startOffset };
  }

  private readEscape(bytes: number[]): void {
    const esc = this.data[this.pos++];
    switch (esc) {
      case 0x6e: bytes.push(0x0a); return; // \n
      case 0x72: bytes.push(0x0d); return; // \r
      case 0x74: bytes.push(0x09); return; // \t
      case 0x62: bytes.push(0x08); return; // \b
      case 0x66: bytes.push(0x0c); return; // \f
      case 0x0a: return; // line continuation
      case 0x0d:
        if (this.pos < this.data.length && this.data[this.pos] === 0x0a) this.pos++;
        return;
    }

    if (!isOctalDigit(esc)) {
      // \( \) \\ and unknown escapes keep the escaped byte
      bytes.push(esc);
      return;
    }

    let octal = esc - 0x30;
    for (let i = 0; i < 2 && this.pos < this.data.length && isOctalDigit(this.data[this.pos]); i++) {
      octal = (octal << 3) | (this.data[this.pos++] - 0x30);
    }
    bytes.push(octal & 0xff);
  }

  private readName(startOffset: number): Token {
    this.pos++; // skip /
    let name = '';

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isWhitespace(c) || isDelimiter(c)) break;

      if (c === 0x23 && this.pos + 2 < this.data.length) {
        // #XX hex escape
        const h1 = this.data[this.pos + 1];
        const h2 = this.data[this.pos + 2];
        if (isHexDigit(h1) && isHexDigit(h2)) {
          name += String.fromCharCode((hexVal(h1) << 4) | hexVal(h2));
          this.pos += 3;
          continue;
        }
      }

      name += String.fromCharCode(c);
      this.pos++;
    }

    return { type: TokenType.Name, value: name, offset: startOffset };
  }

  private readNumber(startOffset: number): Token {
    let numStr = '';
    let isReal = false;

    if (this.data[this.pos] === 0x2d || this.data[this.pos] === 0x2b) {
      numStr += String.fromCharCode(this.data[this.pos++]);
    }

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isDigit(c)) {
        numStr += String.fromCharCode(c);
        this.pos++;
      } else if (c === 0x2e && !isReal) {
        isReal = true;
        numStr += '.';
        this.pos++;
      } else {
        break;
      }
    }

    // '-' alone, '.' alone, or '--5' style garbage
    const value = isReal ? parseFloat(numStr) : parseInt(numStr, 10);
    if (isNaN(value)) {
      return { type: TokenType.Number, value: 0, offset: startOffset };
    }

    return { type: TokenType.Number, value, offset: startOffset };
  }

  private readKeyword(startOffset: number): Token {
    let word = '';

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isWhitespace(c) || isDelimiter(c)) break;
      word += String.fromCharCode(c);
      this.pos++;
    }

    if (word === 'true') return { type: TokenType.Bool, value: true, offset: startOffset };
    if (word === 'false') return { type: TokenType.Bool, value: false, offset: startOffset };
    if (word === 'null') return { type: TokenType.Null, offset: startOffset };

    return { type: TokenType.Keyword, value: word, offset: startOffset };
  }

  private findNext(needle: Uint8Array, from: number): number {
    const len = needle.length;
    for (let i = from; i <= this.data.length - len; i++) {
      let match = true;
      for (let j = 0; j < len; j++) {
        if (this.data[i + j] !== needle[j]) {
          match = false;
          break;
        }
      }
      if (match) return i;
    }
    return -1;
  }
}
