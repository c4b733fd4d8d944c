import { describe, it, expect } from 'vitest';
import { deflateSync } from 'node:zlib';
import { decodeImage } from '../../src/image/pipeline.js';
import { defaultCodecs } from '../../src/stream/filters.js';
import type { ImageResource } from '../../src/resources.js';
import { InvariantError } from '../../src/errors.js';

function image(overrides: Partial<ImageResource>): ImageResource {
  return {
    kind: 'image',
    width: 1,
    height: 1,
    bitsPerComponent: 8,
    colorSpace: { family: 'DeviceRGB' },
    filters: [],
    stencil: false,
    inverted: false,
    mask: null,
    softMask: false,
    data: new Uint8Array(0),
    ...overrides,
  };
}

describe('decodeImage', () => {
  it('passes 8-bit RGB through', () => {
    const result = decodeImage(image({ width: 2, data: new Uint8Array([1, 2, 3, 4, 5, 6, 7]) }));
    expect(result).toEqual({
      ok: true,
      bitmap: { format: 'rgb', width: 2, height: 1, data: new Uint8Array([1, 2, 3, 4, 5, 6]), mask: null },
    });
  });

  it('undoes Flate before reading samples', () => {
    const data = new Uint8Array(deflateSync(new Uint8Array([9, 8, 7])));
    const result = decodeImage(image({ data, filters: [{ name: 'FlateDecode', params: {} }] }));
    expect(result.ok && Array.from(result.bitmap.data)).toEqual([9, 8, 7]);
  });

  it('fails short RGB data', () => {
    const result = decodeImage(image({ width: 2, data: new Uint8Array([1, 2, 3]) }));
    expect(result).toEqual({ ok: false, reason: 'decode-failure', detail: 'RGB data is 3 bytes, expected 6' });
  });

  it('fails an empty image size', () => {
    expect(decodeImage(image({ width: 0 }))).toMatchObject({ ok: false, reason: 'decode-failure' });
  });

  it('expands gray samples', () => {
    const result = decodeImage(image({
      width: 2, colorSpace: { family: 'DeviceGray' }, data: new Uint8Array([0, 255]),
    }));
    expect(result.ok && Array.from(result.bitmap.data)).toEqual([0, 0, 0, 255, 255, 255]);
  });

  it('expands indexed samples through the palette', () => {
    const result = decodeImage(image({
      width: 3,
      bitsPerComponent: 2,
      colorSpace: {
        family: 'Indexed', base: { family: 'DeviceRGB' }, hival: 2, palette: new Uint8Array([0, 0, 0, 1, 1, 1, 2, 2, 2]),
      },
      data: new Uint8Array([0b00011000]),
    }));
    expect(result.ok && Array.from(result.bitmap.data)).toEqual([0, 0, 0, 1, 1, 1, 2, 2, 2]);
  });

  it('inverts a gray palette for Decode [1 0]', () => {
    const result = decodeImage(image({
      width: 2, bitsPerComponent: 1, colorSpace: { family: 'DeviceGray' }, inverted: true,
      data: new Uint8Array([0b01000000]),
    }));
    expect(result.ok && Array.from(result.bitmap.data)).toEqual([255, 255, 255, 0, 0, 0]);
  });

  it('reports CMYK images as unsupported', () => {
    const result = decodeImage(image({ colorSpace: { family: 'DeviceCMYK' }, data: new Uint8Array(4) }));
    expect(result).toEqual({ ok: false, reason: 'unsupported', detail: 'DeviceCMYK' });
  });

  it('reports filters outside the supported set', () => {
    const result = decodeImage(image({ filters: [{ name: 'JBIG2Decode', params: {} }] }));
    expect(result).toEqual({ ok: false, reason: 'unsupported', detail: 'Unsupported image filter JBIG2Decode' });
  });

  it('hands JPEG data through without a decoder', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff]);
    const result = decodeImage(image({ width: 4, height: 2, data, filters: [{ name: 'DCTDecode', params: {} }] }));
    expect(result).toEqual({ ok: true, bitmap: { format: 'jpeg', width: 4, height: 2, data } });
  });

  it('uses an injected JPEG decoder', () => {
    const result = decodeImage(
      image({ data: new Uint8Array([1]), filters: [{ name: 'DCTDecode', params: {} }] }),
      { jpegDecoder: () => ({ width: 1, height: 1, data: new Uint8Array([4, 5, 6]) }) },
    );
    expect(result).toEqual({
      ok: true,
      bitmap: { format: 'rgb', width: 1, height: 1, data: new Uint8Array([4, 5, 6]), mask: null },
    });
  });

  it('reports a throwing JPEG decoder as a decode failure', () => {
    const result = decodeImage(
      image({ filters: [{ name: 'DCTDecode', params: {} }] }),
      { jpegDecoder: () => { throw new Error('bad marker'); } },
    );
    expect(result).toEqual({ ok: false, reason: 'decode-failure', detail: 'JPEG: bad marker' });
  });

  it('paints stencil samples with the fill color', () => {
    const result = decodeImage(
      image({ width: 2, stencil: true, colorSpace: null, bitsPerComponent: 1, data: new Uint8Array([0b01000000]) }),
      { fillColor: { r: 255, g: 0, b: 0 } },
    );
    expect(result.ok).toBe(true);
    if (result.ok && result.bitmap.format === 'rgb') {
      expect(Array.from(result.bitmap.data)).toEqual([255, 0, 0, 0, 255, 255]);
      expect(result.bitmap.mask).toMatchObject({ source: 'stencil', transparent: { r: 0, g: 255, b: 255 } });
    }
  });

  it('attaches a color-key mask', () => {
    const result = decodeImage(image({
      mask: { kind: 'color-key', ranges: [250, 255, 0, 5, 0, 5] },
      data: new Uint8Array([251, 1, 1]),
    }));
    expect(result.ok && result.bitmap.format === 'rgb' && result.bitmap.mask).toEqual({
      source: 'color-key', width: 1, height: 1, data: new Uint8Array([255, 5, 5]), transparent: { r: 255, g: 5, b: 5 },
    });
  });

  it('throws on a malformed color key', () => {
    expect(() => decodeImage(image({ mask: { kind: 'color-key', ranges: [1, 2] }, data: new Uint8Array(3) })))
      .toThrow(InvariantError);
  });

  it('skips an image whose mask image cannot be decoded', () => {
    const maskImage = image({ filters: [{ name: 'JPXDecode', params: {} }], colorSpace: null, bitsPerComponent: 1 });
    const result = decodeImage(image({ mask: { kind: 'mask-image', image: maskImage }, data: new Uint8Array(3) }));
    expect(result).toEqual({ ok: false, reason: 'unsupported', detail: 'mask: Unsupported image filter JPXDecode' });
  });

  it('reads 1-bit samples without a color space as black and white', () => {
    const result = decodeImage(image({
      width: 2, colorSpace: null, bitsPerComponent: 1, data: new Uint8Array([0b10000000]),
    }));
    expect(result.ok && Array.from(result.bitmap.data)).toEqual([255, 255, 255, 0, 0, 0]);
  });

  it('reports deeper samples without a color space as unsupported', () => {
    const result = decodeImage(image({ colorSpace: null, bitsPerComponent: 2, data: new Uint8Array([0]) }));
    expect(result).toEqual({ ok: false, reason: 'unsupported', detail: 'none' });
  });

  it('attaches a mask-image mask', () => {
    const maskImage = image({
      width: 2, colorSpace: null, bitsPerComponent: 1, data: new Uint8Array([0b01000000]),
    });
    const result = decodeImage(image({
      width: 2, mask: { kind: 'mask-image', image: maskImage }, data: new Uint8Array([1, 2, 3, 4, 5, 6]),
    }));
    expect(result).toEqual({
      ok: true,
      bitmap: {
        format: 'rgb',
        width: 2,
        height: 1,
        data: new Uint8Array([1, 2, 3, 4, 5, 6]),
        mask: {
          source: 'mask-image',
          width: 2,
          height: 1,
          data: new Uint8Array([0, 0, 0, 255, 255, 255]),
          transparent: { r: 255, g: 255, b: 255 },
        },
      },
    });
  });

  it('fails a mask image with an invalid size', () => {
    const maskImage = image({ width: -4, colorSpace: null, bitsPerComponent: 1, data: new Uint8Array([0]) });
    const result = decodeImage(image({ mask: { kind: 'mask-image', image: maskImage }, data: new Uint8Array(3) }));
    expect(result).toEqual({ ok: false, reason: 'decode-failure', detail: 'mask: invalid image size -4x1' });
  });

  it('fails an image too large to expand before decoding it', () => {
    const result = decodeImage(image({ width: 1e6, height: 1e6, colorSpace: { family: 'DeviceGray' } }));
    expect(result).toEqual({ ok: false, reason: 'decode-failure', detail: 'image size 1000000x1000000 is too large' });
  });

  it('reports any error from an injected codec as a decode failure', () => {
    const codecs = {
      ...defaultCodecs,
      lzw: () => {
        throw new Error('bad code');
      },
    };
    const result = decodeImage(image({ filters: [{ name: 'LZWDecode', params: {} }] }), { codecs });
    expect(result).toEqual({ ok: false, reason: 'decode-failure', detail: 'bad code' });
  });

  it('skips a masked JPEG when no JPEG decoder is given', () => {
    const result = decodeImage(image({
      filters: [{ name: 'DCTDecode', params: {} }],
      mask: { kind: 'color-key', ranges: [0, 0, 0, 0, 0, 0] },
      data: new Uint8Array([0xff, 0xd8]),
    }));
    expect(result).toEqual({ ok: false, reason: 'unsupported', detail: 'mask on undecoded JPEG' });
  });
});
