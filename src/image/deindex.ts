/**
 * Bit-depth expansion of palette-indexed samples.
 *
 * Samples are read most significant bit first; each row starts on a byte
 * boundary. Every sample selects a `chunk`-byte entry from the palette;
 * entries past the end of the palette (and samples past the end of the
 * data) read as zero.
 */

export type BitDepth = 1 | 2 | 4 | 8;

export function isBitDepth(value: number): value is BitDepth {
  return value === 1 || value === 2 || value === 4 || value === 8;
}

export function deindex(
  width: number,
  height: number,
  data: Uint8Array,
  depth: BitDepth,
  palette: Uint8Array,
  chunk = 3,
): Uint8Array {
  const out = new Uint8Array(width * height * chunk);
  const rowBytes = Math.ceil((width * depth) / 8);
  const sampleMask = (1 << depth) - 1;

  let dst = 0;
  for (let row = 0; row < height; row++) {
    const rowStart = row * rowBytes;
    for (let col = 0; col < width; col++) {
      const bit = col * depth;
      const byte = data[rowStart + (bit >> 3)] ?? 0;
      const shift = 8 - depth - (bit & 7);
      const index = (byte >> shift) & sampleMask;

      const entry = index * chunk;
      for (let k = 0; k < chunk; k++) {
        out[dst++] = palette[entry + k] ?? 0;
      }
    }
  }

  return out;
}

/** Linear gray ramp for a bit depth, as an RGB palette (1 bit: black, white) */
export function grayPalette(depth: BitDepth): Uint8Array {
  const levels = 1 << depth;
  const palette = new Uint8Array(levels * 3);
  for (let i = 0; i < levels; i++) {
    const v = Math.round((i * 255) / (levels - 1));
    palette[i * 3] = v;
    palette[i * 3 + 1] = v;
    palette[i * 3 + 2] = v;
  }
  return palette;
}

/** Expand a one-byte-per-entry gray palette to RGB */
export function grayToRgbPalette(gray: Uint8Array): Uint8Array {
  const palette = new Uint8Array(gray.length * 3);
  for (let i = 0; i < gray.length; i++) {
    palette[i * 3] = gray[i];
    palette[i * 3 + 1] = gray[i];
    palette[i * 3 + 2] = gray[i];
  }
  return palette;
}

/** Reverse the order of palette entries (a Decode array of [1 0]) */
export function reversePalette(palette: Uint8Array, chunk = 3): Uint8Array {
  const count = Math.floor(palette.length / chunk);
  const out = new Uint8Array(count * chunk);
  for (let i = 0; i < count; i++) {
    out.set(palette.subarray(i * chunk, (i + 1) * chunk), (count - 1 - i) * chunk);
  }
  return out;
}
