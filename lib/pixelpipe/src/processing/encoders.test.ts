import { describe, expect, it } from 'vitest';
import { solidImage } from '../testing/fake-transformer.js';
import type { RasterImage } from '../types.js';
import { encodeBmp, encodeFarbfeld, encodeQoi, encodeTga, toRgba, wrapPngInIco } from './encoders.js';

const QOI_END = [0, 0, 0, 0, 0, 0, 0, 1];

function qoiHeader(width: number, height: number, channels: number): number[] {
  return [0x71, 0x6f, 0x69, 0x66, 0, 0, 0, width, 0, 0, 0, height, channels, 0];
}

describe('toRgba', () => {
  it('expands gray and gray+alpha', () => {
    expect([...toRgba(solidImage(1, 1, [7]))]).toEqual([7, 7, 7, 255]);
    expect([...toRgba(solidImage(1, 1, [7, 9]))]).toEqual([7, 7, 7, 9]);
  });

  it('adds opaque alpha to RGB', () => {
    expect([...toRgba(solidImage(1, 1, [1, 2, 3]))]).toEqual([1, 2, 3, 255]);
  });
});

describe('encodeQoi', () => {
  it('encodes a run of pixels equal to the initial one', () => {
    const bytes = encodeQoi(solidImage(2, 1, [0, 0, 0]));
    expect([...bytes]).toEqual([...qoiHeader(2, 1, 3), 0xc1, ...QOI_END]);
  });

  it('falls back to a full RGB op for large differences', () => {
    const bytes = encodeQoi(solidImage(1, 1, [10, 20, 30]));
    expect([...bytes]).toEqual([...qoiHeader(1, 1, 3), 0xfe, 10, 20, 30, ...QOI_END]);
  });

  it('uses small diffs between neighbouring pixels', () => {
    const image: RasterImage = {
      data: Buffer.from([0, 0, 1, 0, 0, 1]),
      info: { width: 2, height: 1, channels: 3 },
    };
    // first pixel differs from black by +1 blue, second repeats it
    expect([...encodeQoi(image)]).toEqual([...qoiHeader(2, 1, 3), 0x6b, 0xc0, ...QOI_END]);
  });

  it('writes RGBA ops when alpha changes', () => {
    const bytes = encodeQoi(solidImage(1, 1, [1, 2, 3, 4]));
    expect([...bytes]).toEqual([...qoiHeader(1, 1, 4), 0xff, 1, 2, 3, 4, ...QOI_END]);
  });
});

describe('encodeFarbfeld', () => {
  it('writes 16-bit big-endian RGBA', () => {
    const bytes = encodeFarbfeld(solidImage(1, 1, [255, 0, 128]));
    expect(bytes.subarray(0, 8).toString('ascii')).toBe('farbfeld');
    expect([...bytes.subarray(8)]).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0xff, 0xff, 0, 0, 0x80, 0x80, 0xff, 0xff]);
  });
});

describe('encodeBmp', () => {
  it('writes padded 24-bit BGR rows', () => {
    const bytes = encodeBmp(solidImage(1, 1, [1, 2, 3]));
    expect(bytes.length).toBe(58);
    expect(bytes.subarray(0, 2).toString('ascii')).toBe('BM');
    expect(bytes.readUInt32LE(2)).toBe(58);
    expect(bytes.readUInt16LE(28)).toBe(24);
    expect([...bytes.subarray(54)]).toEqual([3, 2, 1, 0]);
  });

  it('stores rows bottom-up', () => {
    const image: RasterImage = {
      data: Buffer.from([10, 10, 10, 20, 20, 20]),
      info: { width: 1, height: 2, channels: 3 },
    };
    const bytes = encodeBmp(image);
    expect([...bytes.subarray(54)]).toEqual([20, 20, 20, 0, 10, 10, 10, 0]);
  });

  it('keeps alpha in 32-bit pixels', () => {
    const bytes = encodeBmp(solidImage(1, 1, [1, 2, 3, 4]));
    expect(bytes.readUInt16LE(28)).toBe(32);
    expect([...bytes.subarray(54)]).toEqual([3, 2, 1, 4]);
  });
});

describe('encodeTga', () => {
  it('writes top-left BGRA with an 8-bit alpha descriptor', () => {
    const bytes = encodeTga(solidImage(1, 1, [1, 2, 3, 4]));
    expect(bytes[2]).toBe(2);
    expect(bytes.readUInt16LE(12)).toBe(1);
    expect(bytes.readUInt16LE(14)).toBe(1);
    expect(bytes[16]).toBe(32);
    expect(bytes[17]).toBe(0x28);
    expect([...bytes.subarray(18)]).toEqual([3, 2, 1, 4]);
  });

  it('writes 24-bit pixels without alpha', () => {
    const bytes = encodeTga(solidImage(1, 1, [1, 2, 3]));
    expect(bytes[16]).toBe(24);
    expect(bytes[17]).toBe(0x20);
    expect([...bytes.subarray(18)]).toEqual([3, 2, 1]);
  });
});

describe('wrapPngInIco', () => {
  it('stores 256px sides as zero', () => {
    const png = Buffer.from([1, 2, 3]);
    const bytes = wrapPngInIco(png, 256, 32);
    expect(bytes[6]).toBe(0);
    expect(bytes[7]).toBe(32);
    expect(bytes.readUInt32LE(14)).toBe(3);
    expect(bytes.readUInt32LE(18)).toBe(22);
    expect([...bytes.subarray(22)]).toEqual([1, 2, 3]);
  });
});
