/**
 * Custom error types for pdf-drawlist.
 * Decode and unsupported-construct errors are recoverable: the interpreter
 * turns them into warnings. Invariant violations signal malformed input that
 * a single operation cannot proceed with.
 */

export class DrawlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrawlistError';
  }
}

export class PdfDecodeError extends DrawlistError {
  constructor(message: string, public readonly offset?: number) {
    super(message);
    this.name = 'PdfDecodeError';
  }
}

export class PdfUnsupportedError extends DrawlistError {
  constructor(message: string) {
    super(message);
    this.name = 'PdfUnsupportedError';
  }
}

export class InvariantError extends DrawlistError {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}
