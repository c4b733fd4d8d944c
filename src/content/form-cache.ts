/**
 * Form Cache
 *
 * Memoizes the draw commands of form XObjects for a document session,
 * keyed by (resource scope id, XObject name). Cached lists are frozen and
 * shared by every page that references the form.
 */

import type { DrawCommand } from '../types.js';

export class FormCache {
  private readonly scopes = new Map<string, Map<string, readonly DrawCommand[]>>();
  private expansionCount = 0;

  /** Number of times a form was expanded (cache misses) */
  get expansions(): number {
    return this.expansionCount;
  }

  get size(): number {
    let total = 0;
    for (const forms of this.scopes.values()) total += forms.size;
    return total;
  }

  get(scopeId: string, name: string): readonly DrawCommand[] | undefined {
    return this.scopes.get(scopeId)?.get(name);
  }

  /** Return the cached expansion, or run `expand` once and cache its result */
  getOrExpand(scopeId: string, name: string, expand: () => DrawCommand[]): readonly DrawCommand[] {
    const cached = this.get(scopeId, name);
    if (cached) return cached;

    this.expansionCount++;
    const commands = Object.freeze(expand());

    let forms = this.scopes.get(scopeId);
    if (!forms) {
      forms = new Map();
      this.scopes.set(scopeId, forms);
    }
    forms.set(name, commands);
    return commands;
  }

  clear(): void {
    this.scopes.clear();
  }
}
