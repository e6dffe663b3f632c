/**
 * pixelpipe - Type Definitions
 *
 * Operations, images and the collaborator contracts the pipeline is written
 * against.
 */

import type { Coordinate } from './geometry/coordinate.js';
import type { Unit } from './geometry/units.js';

// ============================================
// IMAGE TYPES
// ============================================

export type ChannelCount = 1 | 2 | 3 | 4;

/**
 * Raw pixel layout of a decoded image
 */
export interface RasterInfo {
  width: number;
  height: number;
  /** Interleaved 8-bit channels per pixel (1 = gray, 2 = gray+alpha, 3 = RGB, 4 = RGBA) */
  channels: ChannelCount;
}

/**
 * Decoded, in-memory raster image.
 * Owned by one pipeline stage at a time; stages return a new value.
 */
export interface RasterImage {
  readonly data: Buffer;
  readonly info: Readonly<RasterInfo>;
}

export interface Dimensions {
  width: number;
  height: number;
}

/**
 * Pixel rectangle handed to the collaborator's crop
 */
export interface Rectangle {
  left: number;
  top: number;
  width: number;
  height: number;
}

// ============================================
// OPERATION TYPES
// ============================================

/**
 * How the far corner of a crop relates to its near corner
 * - minimum: the coordinate is the far corner
 * - maximum: the coordinate is an inset from the right/bottom edges
 * - crop-start: the coordinate is a width/height added to the near corner
 */
export type CropOrigin =
  | { readonly origin: 'minimum'; readonly at: Coordinate }
  | { readonly origin: 'maximum'; readonly at: Coordinate }
  | { readonly origin: 'crop-start'; readonly at: Coordinate };

export type CropOriginKind = CropOrigin['origin'];

export const FILTER_TYPES = ['nearest', 'triangle', 'catmull-rom', 'gaussian', 'lanczos3'] as const;

/** Resampling kernel, passed through to the collaborator */
export type FilterType = typeof FILTER_TYPES[number];

export const CROP_MODES = ['preserve', 'fill', 'exact'] as const;

/**
 * Resize fill policy
 * - preserve: fit inside the box, keeping aspect ratio
 * - fill: cover the box keeping aspect ratio, then crop the overflow
 * - exact: stretch to the box
 */
export type CropMode = typeof CROP_MODES[number];

export interface AdjustBrightnessOperation {
  readonly type: 'adjust-brightness';
  readonly adjustment: 'darken' | 'brighten';
  /** 16-bit magnitude */
  readonly amount: number;
}

export interface BlurOperation {
  readonly type: 'blur';
  readonly sigma: number;
}

export interface CropOperation {
  readonly type: 'crop';
  readonly from: Coordinate;
  readonly to: CropOrigin;
}

export interface GrayscaleOperation {
  readonly type: 'grayscale';
}

export interface ResizeOperation {
  readonly type: 'resize';
  readonly width: Unit;
  readonly height: Unit;
  readonly filter: FilterType;
  readonly cropMode: CropMode;
}

/**
 * Closed set of configurable operations
 */
export type Operation =
  | AdjustBrightnessOperation
  | BlurOperation
  | CropOperation
  | GrayscaleOperation
  | ResizeOperation;

export type OperationType = Operation['type'];

/**
 * Building blocks outside the configurable set
 */
export interface InvertOperation {
  readonly type: 'invert';
}

export interface UnsharpenOperation {
  readonly type: 'unsharpen';
  readonly sigma: number;
  readonly threshold: number;
}

// ============================================
// RESIZE PLAN
// ============================================

/**
 * fit = preserve, cover = fill, stretch = exact
 */
export type ResizeStrategy = 'fit' | 'cover' | 'stretch';

export interface ResizePlan {
  width: number;
  height: number;
  filter: FilterType;
  strategy: ResizeStrategy;
}

// ============================================
// OUTPUT FORMAT
// ============================================

export type OutputFormat =
  | { readonly type: 'png' }
  /** JPEG with quality 0-100 */
  | { readonly type: 'jpeg'; readonly quality: number }
  | { readonly type: 'gif' }
  | { readonly type: 'ico' }
  | { readonly type: 'bmp' }
  | { readonly type: 'farbfeld' }
  | { readonly type: 'tga' }
  | { readonly type: 'openexr' }
  | { readonly type: 'tiff' }
  | { readonly type: 'avif' }
  | { readonly type: 'qoi' }
  | { readonly type: 'webp' };

export type OutputFormatType = OutputFormat['type'];

// ============================================
// COLLABORATORS
// ============================================

/**
 * Pixel-transform collaborator - does all pixel math.
 * Implementations may throw; the pipeline wraps what they throw.
 */
export interface PixelTransformer {
  /** Transformer name (e.g., 'sharp') */
  readonly name: string;

  /** Decode bytes or a file path; format is auto-detected */
  decode(source: Buffer | string): Promise<RasterImage>;
  /** Encode to an output container */
  encode(image: RasterImage, format: OutputFormat): Promise<Buffer>;

  /** Add delta to every colour sample, clamped; alpha untouched */
  brighten(image: RasterImage, delta: number): Promise<RasterImage>;
  blur(image: RasterImage, sigma: number): Promise<RasterImage>;
  grayscale(image: RasterImage): Promise<RasterImage>;
  /** Copy out exactly the given rectangle */
  crop(image: RasterImage, region: Rectangle): Promise<RasterImage>;
  resize(image: RasterImage, plan: ResizePlan): Promise<RasterImage>;
  invert(image: RasterImage): Promise<RasterImage>;
  unsharpen(image: RasterImage, sigma: number, threshold: number): Promise<RasterImage>;
}

/**
 * Logger interface (compatible with console, pino, winston, etc.)
 */
export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  log?(...args: unknown[]): void;
}

// ============================================
// CONFIGURATION TYPES
// ============================================

/**
 * Sharp memory options
 */
export interface SharpOptions {
  /** Maximum number of threads sharp may use per image (default: 2) */
  concurrency?: number;
  /** Enable Sharp's internal cache (default: false) */
  cache?: boolean;
  /** Refuse inputs with more pixels than this (default: sharp's own limit) */
  limitInputPixels?: number;
}

/**
 * Main pixelpipe configuration
 */
export interface PixelpipeConfig {
  /** Sharp tuning */
  sharp?: SharpOptions;
  /** JPEG quality used when an output format is inferred from a file name */
  defaultJpegQuality?: number;
  /** Logger instance (optional, defaults to console) */
  logger?: Logger;
}

/**
 * Parsed configuration document
 */
export interface PipelineDocument {
  /** Absent when the output format is to be inferred from the output path */
  outFormat: OutputFormat | null;
  operations: Operation[];
}
