/**
 * Injectable inflate implementation.
 * Configured at module load time by the entry point (Node uses node:zlib,
 * browser uses fflate); tests install node:zlib from tests/setup.ts.
 */

type InflateFn = (data: Uint8Array) => Uint8Array;

let impl: InflateFn | null = null;

export function setInflate(fn: InflateFn): void {
  impl = fn;
}

export function hasInflate(): boolean {
  return impl !== null;
}

export function inflate(data: Uint8Array): Uint8Array {
  if (!impl) throw new Error('No inflate implementation configured. Import from "pdf-drawlist" or "pdf-drawlist/browser".');
  return impl(data);
}
