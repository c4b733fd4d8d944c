import { describe, it, expect } from 'vitest';
import { deflateSync } from 'node:zlib';
import { decodeImageData, decodeStream, readFilterChain } from '../../src/stream/decoder.js';
import { defaultCodecs, type FilterCodecs } from '../../src/stream/filters.js';
import { pdfArray, pdfDict, pdfName, pdfNumber, pdfRef, type PdfObject } from '../../src/parser/types.js';
import { PdfUnsupportedError } from '../../src/errors.js';

const encode = (s: string) => new TextEncoder().encode(s);
const decode = (b: Uint8Array) => new TextDecoder().decode(b);

describe('decodeStream', () => {
  it('returns data unchanged with no /Filter', () => {
    const data = new Uint8Array([0x48, 0x69]);
    expect(decodeStream(data, pdfDict())).toEqual(data);
  });

  it('applies FlateDecode', () => {
    const compressed = new Uint8Array(deflateSync(Buffer.from('hello')));
    const dict = pdfDict({ Filter: pdfName('FlateDecode') });
    expect(decode(decodeStream(compressed, dict))).toBe('hello');
  });

  it('applies a filter chain in declared order', () => {
    // hex of the zlib stream
    const compressed = new Uint8Array(deflateSync(Buffer.from('chain')));
    const hex = Buffer.from(compressed).toString('hex') + '>';
    const dict = pdfDict({ Filter: pdfArray([pdfName('AHx'), pdfName('Fl')]) });
    expect(decode(decodeStream(encode(hex), dict))).toBe('chain');
  });

  it('follows indirect references through resolve', () => {
    const filter = pdfName('ASCIIHexDecode');
    const resolve = (obj: PdfObject): PdfObject => (obj.kind === 'ref' ? filter : obj);
    const dict = pdfDict({ Filter: pdfRef(5, 0) });
    expect(decode(decodeStream(encode('4142>'), dict, resolve))).toBe('AB');
  });

  it('throws PdfUnsupportedError for filters without a codec', () => {
    const dict = pdfDict({ Filter: pdfName('RunLengthDecode') });
    expect(() => decodeStream(new Uint8Array([1]), dict)).toThrow(PdfUnsupportedError);
  });
});

describe('readFilterChain', () => {
  it('expands abbreviations and pairs decode parameters', () => {
    const dict = pdfDict({
      F: pdfArray([pdfName('A85'), pdfName('LZW')]),
      DP: pdfArray([pdfName('Null'), pdfDict({ EarlyChange: pdfNumber(0) })]),
    });
    expect(readFilterChain(dict, undefined, ['F'], ['DP'])).toEqual([
      { name: 'ASCII85Decode', params: {} },
      { name: 'LZWDecode', params: { EarlyChange: 0 } },
    ]);
  });
});

describe('decodeImageData', () => {
  it('undoes filters in fixed order regardless of declaration', () => {
    const compressed = new Uint8Array(deflateSync(Buffer.from('pixels')));
    const hex = encode(Buffer.from(compressed).toString('hex') + '>');
    const result = decodeImageData(hex, [
      { name: 'FlateDecode', params: {} },
      { name: 'ASCIIHexDecode', params: {} },
    ]);
    expect(decode(result.data)).toBe('pixels');
    expect(result.jpeg).toBe(false);
  });

  it('marks DCT payloads as JPEG and leaves them encoded', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff]);
    const result = decodeImageData(data, [{ name: 'DCTDecode', params: {} }]);
    expect(result.jpeg).toBe(true);
    expect(result.data).toEqual(data);
  });

  it.each(['RunLengthDecode', 'JBIG2Decode', 'JPXDecode', 'Crypt'])('rejects %s', (name) => {
    expect(() => decodeImageData(new Uint8Array(0), [{ name, params: {} }])).toThrow(PdfUnsupportedError);
  });

  it('needs an injected codec for CCITT', () => {
    const filters = [{ name: 'CCITTFaxDecode', params: { K: -1, Columns: 8 } }];
    expect(() => decodeImageData(new Uint8Array([0]), filters)).toThrow(PdfUnsupportedError);

    const codecs: FilterCodecs = {
      ...defaultCodecs,
      ccittFax: (data, params) => new Uint8Array([data.length, Number(params.Columns)]),
    };
    expect(Array.from(decodeImageData(new Uint8Array([9, 9, 9]), filters, codecs).data)).toEqual([3, 8]);
  });
});
