/**
 * Raw-buffer encoders
 *
 * Containers sharp cannot write, encoded straight from 8-bit raw pixels.
 * ICO wraps a PNG, so it takes the PNG bytes rather than pixels.
 */

import type { RasterImage } from '../types.js';

export type RawEncoderFormat = 'bmp' | 'farbfeld' | 'qoi' | 'tga';

export type RawEncoder = (image: RasterImage) => Buffer;

// ============ PIXEL ACCESS ============

/**
 * Expand any channel layout to interleaved RGBA
 */
export function toRgba(image: RasterImage): Buffer {
  const { width, height, channels } = image.info;
  const out = Buffer.alloc(width * height * 4);

  for (let pixel = 0; pixel < width * height; pixel++) {
    const from = pixel * channels;
    const to = pixel * 4;
    const gray = channels <= 2;
    const red = image.data[from] ?? 0;

    out[to] = red;
    out[to + 1] = gray ? red : image.data[from + 1] ?? 0;
    out[to + 2] = gray ? red : image.data[from + 2] ?? 0;
    out[to + 3] = channels === 2 || channels === 4 ? image.data[from + channels - 1] ?? 255 : 255;
  }
  return out;
}

function hasAlpha(image: RasterImage): boolean {
  return image.info.channels === 2 || image.info.channels === 4;
}

// ============ BMP ============

const BMP_HEADER_SIZE = 54;
/** 72 dpi */
const BMP_PIXELS_PER_METRE = 2835;

/**
 * Uncompressed bottom-up BMP; 32-bit BGRA when the image has alpha, else 24-bit BGR
 */
export function encodeBmp(image: RasterImage): Buffer {
  const { width, height } = image.info;
  const rgba = toRgba(image);
  const bytesPerPixel = hasAlpha(image) ? 4 : 3;
  const stride = Math.ceil((width * bytesPerPixel) / 4) * 4;
  const out = Buffer.alloc(BMP_HEADER_SIZE + stride * height);

  out.write('BM', 0, 'ascii');
  out.writeUInt32LE(out.length, 2);
  out.writeUInt32LE(BMP_HEADER_SIZE, 10);
  out.writeUInt32LE(40, 14);
  out.writeInt32LE(width, 18);
  out.writeInt32LE(height, 22);
  out.writeUInt16LE(1, 26);
  out.writeUInt16LE(bytesPerPixel * 8, 28);
  out.writeUInt32LE(stride * height, 34);
  out.writeInt32LE(BMP_PIXELS_PER_METRE, 38);
  out.writeInt32LE(BMP_PIXELS_PER_METRE, 42);

  for (let y = 0; y < height; y++) {
    const row = BMP_HEADER_SIZE + (height - 1 - y) * stride;
    for (let x = 0; x < width; x++) {
      const from = (y * width + x) * 4;
      const to = row + x * bytesPerPixel;
      out[to] = rgba[from + 2] ?? 0;
      out[to + 1] = rgba[from + 1] ?? 0;
      out[to + 2] = rgba[from] ?? 0;
      if (bytesPerPixel === 4) out[to + 3] = rgba[from + 3] ?? 255;
    }
  }
  return out;
}

// ============ FARBFELD ============

/**
 * farbfeld: magic, big-endian size, then 16-bit big-endian RGBA
 */
export function encodeFarbfeld(image: RasterImage): Buffer {
  const { width, height } = image.info;
  const rgba = toRgba(image);
  const out = Buffer.alloc(16 + rgba.length * 2);

  out.write('farbfeld', 0, 'ascii');
  out.writeUInt32BE(width, 8);
  out.writeUInt32BE(height, 12);
  rgba.forEach((sample, index) => {
    out.writeUInt16BE(sample * 257, 16 + index * 2);
  });
  return out;
}

// ============ QOI ============

const QOI_OP_INDEX = 0x00;
const QOI_OP_DIFF = 0x40;
const QOI_OP_LUMA = 0x80;
const QOI_OP_RUN = 0xc0;
const QOI_OP_RGB = 0xfe;
const QOI_OP_RGBA = 0xff;
const QOI_MAX_RUN = 62;
const QOI_END_MARKER = [0, 0, 0, 0, 0, 0, 0, 1] as const;

/** Wrap a difference of two bytes into a signed byte */
function wrapDiff(value: number): number {
  return ((value + 128) & 0xff) - 128;
}

/**
 * "Quite OK Image" format, sRGB, 3 or 4 channels
 */
export function encodeQoi(image: RasterImage): Buffer {
  const { width, height } = image.info;
  const rgba = toRgba(image);
  const pixelCount = width * height;
  const out = Buffer.alloc(14 + pixelCount * 5 + QOI_END_MARKER.length);
  const index = new Uint8Array(64 * 4);

  out.write('qoif', 0, 'ascii');
  out.writeUInt32BE(width, 4);
  out.writeUInt32BE(height, 8);
  out[12] = hasAlpha(image) ? 4 : 3;
  out[13] = 0;

  let position = 14;
  const emit = (...bytes: number[]): void => {
    for (const byte of bytes) out[position++] = byte;
  };

  let [pr, pg, pb, pa] = [0, 0, 0, 255];
  let run = 0;

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const offset = pixel * 4;
    const r = rgba[offset] ?? 0;
    const g = rgba[offset + 1] ?? 0;
    const b = rgba[offset + 2] ?? 0;
    const a = rgba[offset + 3] ?? 255;

    if (r === pr && g === pg && b === pb && a === pa) {
      run++;
      if (run === QOI_MAX_RUN || pixel === pixelCount - 1) {
        emit(QOI_OP_RUN | (run - 1));
        run = 0;
      }
      continue;
    }

    if (run > 0) {
      emit(QOI_OP_RUN | (run - 1));
      run = 0;
    }

    const hash = ((r * 3 + g * 5 + b * 7 + a * 11) % 64) * 4;
    if (index[hash] === r && index[hash + 1] === g && index[hash + 2] === b && index[hash + 3] === a) {
      emit(QOI_OP_INDEX | (hash / 4));
    } else {
      index.set([r, g, b, a], hash);

      if (a === pa) {
        const dr = wrapDiff(r - pr);
        const dg = wrapDiff(g - pg);
        const db = wrapDiff(b - pb);
        const drg = dr - dg;
        const dbg = db - dg;

        if (dr > -3 && dr < 2 && dg > -3 && dg < 2 && db > -3 && db < 2) {
          emit(QOI_OP_DIFF | ((dr + 2) << 4) | ((dg + 2) << 2) | (db + 2));
        } else if (drg > -9 && drg < 8 && dg > -33 && dg < 32 && dbg > -9 && dbg < 8) {
          emit(QOI_OP_LUMA | (dg + 32), ((drg + 8) << 4) | (dbg + 8));
        } else {
          emit(QOI_OP_RGB, r, g, b);
        }
      } else {
        emit(QOI_OP_RGBA, r, g, b, a);
      }
    }

    [pr, pg, pb, pa] = [r, g, b, a];
  }

  emit(...QOI_END_MARKER);
  return out.subarray(0, position);
}

// ============ TGA ============

const TGA_MAX_SIZE = 0xffff;

/**
 * Uncompressed true-colour TGA, top-left origin
 */
export function encodeTga(image: RasterImage): Buffer {
  const { width, height } = image.info;
  if (width > TGA_MAX_SIZE || height > TGA_MAX_SIZE) {
    throw new Error(`TGA images are limited to ${TGA_MAX_SIZE}px per side, got ${width}x${height}`);
  }

  const rgba = toRgba(image);
  const alpha = hasAlpha(image);
  const bytesPerPixel = alpha ? 4 : 3;
  const out = Buffer.alloc(18 + width * height * bytesPerPixel);

  out[2] = 2;
  out.writeUInt16LE(width, 12);
  out.writeUInt16LE(height, 14);
  out[16] = bytesPerPixel * 8;
  out[17] = 0x20 | (alpha ? 8 : 0);

  for (let pixel = 0; pixel < width * height; pixel++) {
    const from = pixel * 4;
    const to = 18 + pixel * bytesPerPixel;
    out[to] = rgba[from + 2] ?? 0;
    out[to + 1] = rgba[from + 1] ?? 0;
    out[to + 2] = rgba[from] ?? 0;
    if (alpha) out[to + 3] = rgba[from + 3] ?? 255;
  }
  return out;
}

export const RAW_ENCODERS: Record<RawEncoderFormat, RawEncoder> = {
  bmp: encodeBmp,
  farbfeld: encodeFarbfeld,
  qoi: encodeQoi,
  tga: encodeTga,
};

// ============ ICO ============

const ICO_MAX_SIZE = 256;

/**
 * Single-image ICO holding PNG data
 */
export function wrapPngInIco(png: Buffer, width: number, height: number): Buffer {
  if (width > ICO_MAX_SIZE || height > ICO_MAX_SIZE) {
    throw new Error(`ICO images are limited to ${ICO_MAX_SIZE}px per side, got ${width}x${height}`);
  }

  const header = Buffer.alloc(22);
  header.writeUInt16LE(0, 0);
  header.writeUInt16LE(1, 2);
  header.writeUInt16LE(1, 4);
  // 0 means 256
  header[6] = width % ICO_MAX_SIZE;
  header[7] = height % ICO_MAX_SIZE;
  header.writeUInt16LE(1, 10);
  header.writeUInt16LE(32, 12);
  header.writeUInt32LE(png.length, 14);
  header.writeUInt32LE(header.length, 18);

  return Buffer.concat([header, png]);
}
