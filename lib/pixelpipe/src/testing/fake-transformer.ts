/**
 * In-memory PixelTransformer for tests
 *
 * Works on plain interleaved 8-bit buffers with the simplest possible pixel
 * math, and records every call so tests can assert on ordering.
 */

import { UnsupportedFormatError } from '../errors.js';
import { clipToBounds } from '../geometry/crop-region.js';
import type {
  ChannelCount,
  OutputFormat,
  PixelTransformer,
  RasterImage,
  Rectangle,
  ResizePlan,
} from '../types.js';

export type TransformerMethod = Exclude<keyof PixelTransformer, 'name'>;

export interface TransformerCall {
  method: TransformerMethod;
  /** Input size at the time of the call */
  width: number;
  height: number;
}

export interface FakeTransformerOptions {
  /** Images returned by decode() for a path */
  sources?: Record<string, RasterImage>;
  /** Methods that throw instead of transforming */
  failOn?: readonly TransformerMethod[];
  /** Formats encode() refuses */
  unsupportedFormats?: readonly OutputFormat['type'][];
}

/**
 * Solid-colour image; `fill` is repeated per pixel
 */
export function solidImage(width: number, height: number, fill: readonly number[] = [128, 128, 128]): RasterImage {
  const channels = toChannels(fill.length);
  const data = Buffer.alloc(width * height * channels);
  for (let offset = 0; offset < data.length; offset += channels) {
    fill.forEach((value, channel) => {
      data[offset + channel] = value;
    });
  }
  return { data, info: { width, height, channels } };
}

function toChannels(count: number): ChannelCount {
  switch (count) {
    case 1:
    case 2:
    case 3:
    case 4:
      return count;
    default:
      throw new Error(`Unsupported channel count: ${count}`);
  }
}

function hasAlpha(channels: ChannelCount): boolean {
  return channels === 2 || channels === 4;
}

function clampSample(value: number): number {
  return Math.min(255, Math.max(0, value));
}

export class FakeTransformer implements PixelTransformer {
  readonly name = 'fake';
  readonly calls: TransformerCall[] = [];
  readonly encoded: OutputFormat[] = [];

  private readonly sources: Record<string, RasterImage>;
  private readonly failOn: ReadonlySet<TransformerMethod>;
  private readonly unsupportedFormats: ReadonlySet<OutputFormat['type']>;

  constructor(options: FakeTransformerOptions = {}) {
    this.sources = options.sources ?? {};
    this.failOn = new Set(options.failOn ?? []);
    this.unsupportedFormats = new Set(options.unsupportedFormats ?? []);
  }

  /** Called methods, in order */
  get methods(): TransformerMethod[] {
    return this.calls.map(call => call.method);
  }

  async decode(source: Buffer | string): Promise<RasterImage> {
    this.record('decode', 0, 0);
    if (typeof source !== 'string') {
      throw new Error('FakeTransformer only decodes registered paths');
    }
    const image = this.sources[source];
    if (!image) throw new Error(`No such file: ${source}`);
    return image;
  }

  async encode(image: RasterImage, format: OutputFormat): Promise<Buffer> {
    this.track('encode', image);
    if (this.unsupportedFormats.has(format.type)) {
      throw new UnsupportedFormatError(format.type);
    }
    this.encoded.push(format);
    const { width, height, channels } = image.info;
    return Buffer.from(`${format.type}:${width}x${height}x${channels}`);
  }

  async brighten(image: RasterImage, delta: number): Promise<RasterImage> {
    this.track('brighten', image);
    return this.mapColour(image, sample => clampSample(sample + delta));
  }

  async blur(image: RasterImage, _sigma: number): Promise<RasterImage> {
    this.track('blur', image);
    return { data: Buffer.from(image.data), info: { ...image.info } };
  }

  async grayscale(image: RasterImage): Promise<RasterImage> {
    this.track('grayscale', image);
    const { width, height, channels } = image.info;
    const alpha = hasAlpha(channels);
    const colour = alpha ? channels - 1 : channels;
    const out = solidImage(width, height, alpha ? [0, 0] : [0]);

    for (let pixel = 0; pixel < width * height; pixel++) {
      let sum = 0;
      for (let channel = 0; channel < colour; channel++) {
        sum += image.data[pixel * channels + channel] ?? 0;
      }
      out.data[pixel * out.info.channels] = Math.round(sum / colour);
      if (alpha) out.data[pixel * out.info.channels + 1] = image.data[pixel * channels + colour] ?? 0;
    }
    return out;
  }

  async crop(image: RasterImage, requested: Rectangle): Promise<RasterImage> {
    this.track('crop', image);
    const { width, channels } = image.info;
    const region = clipToBounds(requested, width, image.info.height);

    const data = Buffer.alloc(region.width * region.height * channels);
    for (let row = 0; row < region.height; row++) {
      const start = ((region.top + row) * width + region.left) * channels;
      image.data.copy(data, row * region.width * channels, start, start + region.width * channels);
    }
    return { data, info: { width: region.width, height: region.height, channels } };
  }

  async resize(image: RasterImage, plan: ResizePlan): Promise<RasterImage> {
    this.track('resize', image);
    const { width, height, channels } = image.info;
    if (plan.width === 0 || plan.height === 0) {
      throw new Error('Expected positive integer for width and height');
    }

    let target = { width: plan.width, height: plan.height };
    if (plan.strategy === 'fit') {
      const scale = Math.min(plan.width / width, plan.height / height);
      target = { width: Math.round(width * scale), height: Math.round(height * scale) };
    }

    const data = Buffer.alloc(target.width * target.height * channels);
    for (let y = 0; y < target.height; y++) {
      const sourceY = Math.floor((y * height) / target.height);
      for (let x = 0; x < target.width; x++) {
        const sourceX = Math.floor((x * width) / target.width);
        const from = (sourceY * width + sourceX) * channels;
        image.data.copy(data, (y * target.width + x) * channels, from, from + channels);
      }
    }
    return { data, info: { ...target, channels } };
  }

  async invert(image: RasterImage): Promise<RasterImage> {
    this.track('invert', image);
    return this.mapColour(image, sample => 255 - sample);
  }

  async unsharpen(image: RasterImage, _sigma: number, _threshold: number): Promise<RasterImage> {
    this.track('unsharpen', image);
    return { data: Buffer.from(image.data), info: { ...image.info } };
  }

  private track(method: TransformerMethod, image: RasterImage): void {
    this.record(method, image.info.width, image.info.height);
  }

  private record(method: TransformerMethod, width: number, height: number): void {
    this.calls.push({ method, width, height });
    if (this.failOn.has(method)) {
      throw new Error(`${method} exploded`);
    }
  }

  private mapColour(image: RasterImage, fn: (sample: number) => number): RasterImage {
    const { channels } = image.info;
    const alphaIndex = hasAlpha(channels) ? channels - 1 : -1;
    const data = Buffer.from(image.data);
    for (let index = 0; index < data.length; index++) {
      if (index % channels === alphaIndex) continue;
      data[index] = fn(data[index] ?? 0);
    }
    return { data, info: { ...image.info } };
  }
}
