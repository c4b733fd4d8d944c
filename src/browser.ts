/**
 * pdf-drawlist/browser - browser build of pdf-drawlist.
 *
 * Uses fflate for decompression instead of node:zlib.
 *
 * @example
 * ```typescript
 * import { DrawlistSession } from 'pdf-drawlist/browser';
 *
 * const session = new DrawlistSession();
 * const page = session.page({ contents: contentBytes });
 * console.log(page.commands.length);
 * ```
 */

import { decompressSync } from 'fflate';
import { setInflate } from './stream/inflate.js';

setInflate((data) => decompressSync(data));

export * from './exports.js';
