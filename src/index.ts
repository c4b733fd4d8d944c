/**
 * pdf-drawlist - interpret PDF page content streams into backend-agnostic
 * draw commands and decoded bitmaps.
 *
 * @example
 * ```typescript
 * import { OperatorInterpreter, tokenizeContent } from 'pdf-drawlist';
 *
 * const interpreter = new OperatorInterpreter();
 * const page = interpreter.interpretPage(tokenizeContent(contentBytes));
 * for (const command of page.commands) {
 *   console.log(command.op);
 * }
 * ```
 */

import { inflateSync } from 'node:zlib';
import { setInflate } from './stream/inflate.js';

function nodeInflate(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(inflateSync(data));
  } catch {
    // Truncated streams: take what decompresses
    return new Uint8Array(inflateSync(data, { finishFlush: 0 }));
  }
}

setInflate(nodeInflate);

export * from './exports.js';
