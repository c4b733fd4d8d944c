/**
 * DrawlistSession - high-level entry point for a document.
 *
 * Wraps one OperatorInterpreter (so form expansions, missing fonts and
 * warnings are shared by all pages of the document) and turns page
 * objects from a host PDF parser into lazily interpreted pages.
 *
 * @example
 * ```typescript
 * const session = new DrawlistSession({ resolve: (obj) => parser.resolve(obj) });
 * const page = session.page({ contents: pageDict.get('Contents'), resources });
 * for (const command of page.commands) rasterizer.run(command);
 * ```
 */

import type { DrawCommand, PageDrawing } from './types.js';
import type { PdfDict, PdfObject, ResolveFn } from './parser/types.js';
import { identityResolve, isArray, isStream } from './parser/types.js';
import { OperatorInterpreter, type InterpreterOptions } from './content/interpreter.js';
import { buildResourceScope, EMPTY_SCOPE, type ResourceScope } from './resources.js';
import { decodeStream } from './stream/decoder.js';
import { defaultCodecs } from './stream/filters.js';
import type { Warning } from './diagnostics.js';

export interface SessionOptions extends InterpreterOptions {
  /** Follows indirect references through the host's parser */
  resolve?: ResolveFn;
}

export interface PageSource {
  /** The page's /Contents (a stream or an array of streams), or decoded content bytes */
  contents: PdfObject | Uint8Array | null;
  /** The page's /Resources dictionary, or a prepared scope */
  resources?: PdfDict | ResourceScope | null;
}

export class DrawlistSession {
  readonly interpreter: OperatorInterpreter;

  private readonly resolve: ResolveFn;
  private readonly options: SessionOptions;
  private readonly scopes = new WeakMap<PdfDict, ResourceScope>();
  private scopeCount = 0;
  private pageCount = 0;

  constructor(options?: SessionOptions) {
    this.options = options ?? {};
    this.resolve = options?.resolve ?? identityResolve;
    this.interpreter = new OperatorInterpreter(options);
  }

  /** Create the next page; it is interpreted on first access */
  page(source: PageSource): DrawlistPage {
    this.pageCount++;
    return new DrawlistPage(this, source, this.pageCount);
  }

  get warnings(): readonly Warning[] {
    return this.interpreter.warnings.all;
  }

  get missingFonts(): ReadonlySet<string> {
    return this.interpreter.missingFonts;
  }

  /** @internal Interpret a page source; used by DrawlistPage */
  interpret(source: PageSource): PageDrawing {
    const scope = this.scopeFor(source.resources ?? null);
    const content = this.contentBytes(source.contents);
    return this.interpreter.interpretContent(content, scope);
  }

  /** Pages sharing a /Resources dictionary share a scope, so their forms are expanded once */
  private scopeFor(resources: PdfDict | ResourceScope | null): ResourceScope {
    if (!resources) return EMPTY_SCOPE;
    if (!('kind' in resources)) return resources;

    let scope = this.scopes.get(resources);
    if (!scope) {
      scope = buildResourceScope(`r${++this.scopeCount}`, resources, this.resolve, {
        codecs: this.options.codecs ?? defaultCodecs,
      });
      this.scopes.set(resources, scope);
    }
    return scope;
  }

  private contentBytes(contents: PdfObject | Uint8Array | null): Uint8Array {
    if (!contents) return new Uint8Array(0);
    if (contents instanceof Uint8Array) return contents;

    const resolved = this.resolve(contents);
    const streams = isStream(resolved)
      ? [resolved]
      : isArray(resolved) ? resolved.items.map((item) => this.resolve(item)).filter(isStream) : [];

    const parts: Uint8Array[] = [];
    for (const stream of streams) {
      try {
        parts.push(decodeStream(stream.data, stream.dict, this.resolve, this.options.codecs ?? defaultCodecs));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.interpreter.warnings.report('decode-failure', `contents: ${message}`, `Content stream skipped: ${message}`);
      }
    }
    return joinWithNewlines(parts);
  }
}

export class DrawlistPage {
  /** 1-based page number within the session */
  readonly number: number;

  private _session: DrawlistSession | null;
  private _source: PageSource | null;
  private _drawing: PageDrawing | null = null;

  constructor(session: DrawlistSession, source: PageSource, pageNumber: number) {
    this._session = session;
    this._source = source;
    this.number = pageNumber;
  }

  /** Draw commands of the page, in paint order */
  get commands(): DrawCommand[] {
    return this.drawing.commands;
  }

  /** Error that stopped interpretation early, or null if successful */
  get error(): Error | null {
    return this.drawing.error;
  }

  private get drawing(): PageDrawing {
    if (this._drawing === null) {
      if (!this._session || !this._source) return { commands: [], error: null };
      this._drawing = this._session.interpret(this._source);
    }
    return this._drawing;
  }

  /** Release references to the session and the page source */
  dispose(): void {
    this._session = null;
    this._source = null;
  }
}

/** Content streams of a page are concatenated with whitespace between them */
function joinWithNewlines(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1) return parts[0];
  const total = parts.reduce((sum, part) => sum + part.length + 1, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
    out[offset++] = 0x0a;
  }
  return out;
}
