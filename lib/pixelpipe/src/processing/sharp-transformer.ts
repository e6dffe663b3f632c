/**
 * Sharp Transformer
 *
 * Sharp-backed pixel-transform collaborator:
 * - Decoding of any format sharp reads
 * - One sharp pass per operation, through raw 8-bit pixels, so steps apply
 *   in the order given rather than sharp's fixed internal order
 * - Encoding through sharp, or the raw-buffer encoders for containers
 *   sharp cannot write (OpenEXR is not supported)
 *
 * @example
 * ```ts
 * const transformer = createSharpTransformer({ concurrency: 2 });
 * const image = await transformer.decode('photo.jpg');
 * const small = await transformer.resize(image, {
 *   width: 300, height: 200, filter: 'lanczos3', strategy: 'fit',
 * });
 * const bytes = await transformer.encode(small, { type: 'webp' });
 * ```
 */

import sharp from 'sharp';
import { UnsupportedFormatError } from '../errors.js';
import { clipToBounds } from '../geometry/crop-region.js';
import { RAW_ENCODERS, wrapPngInIco } from './encoders.js';
import type {
  ChannelCount,
  Dimensions,
  FilterType,
  OutputFormat,
  OutputFormatType,
  PixelTransformer,
  RasterImage,
  Rectangle,
  ResizePlan,
  ResizeStrategy,
  SharpOptions,
} from '../types.js';

const KERNELS: Record<FilterType, keyof sharp.KernelEnum> = {
  nearest: 'nearest',
  triangle: 'linear',
  'catmull-rom': 'cubic',
  // sharp has no Gaussian resampler; Mitchell is the closest smooth kernel it offers
  gaussian: 'mitchell',
  lanczos3: 'lanczos3',
};

const FITS: Record<ResizeStrategy, keyof sharp.FitEnum> = {
  fit: 'inside',
  cover: 'cover',
  stretch: 'fill',
};

/** Formats sharp can write */
export const SHARP_OUTPUT_FORMATS = ['png', 'jpeg', 'gif', 'tiff', 'avif', 'webp'] as const;

/** Everything encode() accepts; the rest go through the raw-buffer encoders */
export const SUPPORTED_OUTPUT_FORMATS = [
  ...SHARP_OUTPUT_FORMATS,
  'ico',
  'bmp',
  'farbfeld',
  'tga',
  'qoi',
] as const satisfies readonly OutputFormatType[];

/** sharp refuses sigmas below this */
const MIN_BLUR_SIGMA = 0.3;


function toChannelCount(channels: number): ChannelCount {
  switch (channels) {
    case 1:
    case 2:
    case 3:
    case 4:
      return channels;
    default:
      throw new Error(`Unsupported channel count: ${channels}`);
  }
}

/**
 * Blur radius as sharp accepts it: non-positive sigmas fall back to 1.0,
 * tiny ones are raised to sharp's minimum.
 */
export function effectiveBlurSigma(sigma: number): number {
  if (!(sigma > 0)) return 1;
  return Math.max(sigma, MIN_BLUR_SIGMA);
}

/**
 * Sharp Transformer Implementation
 */
export class SharpTransformer implements PixelTransformer {
  readonly name = 'sharp';
  private readonly limitInputPixels: number | boolean;

  constructor(options: SharpOptions = {}) {
    // Disable cache by default to reduce memory usage
    sharp.cache(options.cache ?? false);
    // Limit threads to prevent memory spikes
    sharp.concurrency(options.concurrency ?? 2);

    this.limitInputPixels = options.limitInputPixels ?? true;
  }

  async decode(source: Buffer | string): Promise<RasterImage> {
    return this.materialize(sharp(source, { limitInputPixels: this.limitInputPixels }));
  }

  async encode(image: RasterImage, format: OutputFormat): Promise<Buffer> {
    switch (format.type) {
      case 'png':
        return this.load(image).png().toBuffer();
      case 'jpeg':
        // sharp takes 1-100
        return this.load(image).jpeg({ quality: Math.min(100, Math.max(1, Math.round(format.quality))) }).toBuffer();
      case 'gif':
        return this.load(image).gif().toBuffer();
      case 'tiff':
        return this.load(image).tiff().toBuffer();
      case 'avif':
        return this.load(image).avif().toBuffer();
      case 'webp':
        return this.load(image).webp().toBuffer();
      case 'ico':
        return wrapPngInIco(await this.load(image).png().toBuffer(), image.info.width, image.info.height);
      case 'bmp':
      case 'farbfeld':
      case 'qoi':
      case 'tga':
        return RAW_ENCODERS[format.type](image);
      case 'openexr':
        throw new UnsupportedFormatError(format.type, SUPPORTED_OUTPUT_FORMATS);
    }
  }

  async brighten(image: RasterImage, delta: number): Promise<RasterImage> {
    // alpha is carried through untouched by sharp's linear()
    return this.materialize(this.load(image).linear(1, delta));
  }

  async blur(image: RasterImage, sigma: number): Promise<RasterImage> {
    return this.materialize(this.load(image).blur(effectiveBlurSigma(sigma)));
  }

  async grayscale(image: RasterImage): Promise<RasterImage> {
    return this.materialize(this.load(image).grayscale());
  }

  async crop(image: RasterImage, region: Rectangle): Promise<RasterImage> {
    const clipped = clipToBounds(region, image.info.width, image.info.height);
    return this.materialize(this.load(image).extract(clipped));
  }

  async resize(image: RasterImage, plan: ResizePlan): Promise<RasterImage> {
    return this.materialize(
      this.load(image).resize({
        width: plan.width,
        height: plan.height,
        fit: FITS[plan.strategy],
        position: 'centre',
        kernel: KERNELS[plan.filter],
      })
    );
  }

  async invert(image: RasterImage): Promise<RasterImage> {
    return this.materialize(this.load(image).negate({ alpha: false }));
  }

  async unsharpen(image: RasterImage, sigma: number, threshold: number): Promise<RasterImage> {
    return this.materialize(
      this.load(image).sharpen({ sigma: effectiveBlurSigma(sigma), x1: Math.max(0, threshold) })
    );
  }

  /**
   * Get image dimensions without decoding pixels
   */
  async getDimensions(source: Buffer | string): Promise<Dimensions> {
    const metadata = await sharp(source, { limitInputPixels: this.limitInputPixels }).metadata();

    return {
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
    };
  }

  private load(image: RasterImage): sharp.Sharp {
    return sharp(image.data, {
      raw: {
        width: image.info.width,
        height: image.info.height,
        channels: image.info.channels,
      },
    });
  }

  private async materialize(instance: sharp.Sharp): Promise<RasterImage> {
    const { data, info } = await instance
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      info: {
        width: info.width,
        height: info.height,
        channels: toChannelCount(info.channels),
      },
    };
  }
}

/**
 * Create a sharp-backed transformer
 */
export function createSharpTransformer(options?: SharpOptions): SharpTransformer {
  return new SharpTransformer(options);
}

