/**
 * pixelpipe
 *
 * Ordered image transformation pipelines: decode an image, apply a
 * configured list of operations (brightness, blur, crop, grayscale, resize)
 * and encode the result. Geometry accepts absolute pixels or percentages of
 * the current image size.
 *
 * @example
 * ```ts
 * import {
 *   createSharpTransformer,
 *   loadConfig,
 *   processAndSave,
 * } from 'pixelpipe';
 *
 * const document = await loadConfig('pipeline.json');
 * if (!document.ok) throw document.error;
 *
 * const result = await processAndSave(
 *   'photo.jpg',
 *   'photo-small.webp',
 *   document.value.outFormat ?? { type: 'webp' },
 *   document.value.operations,
 *   { transformer: createSharpTransformer() },
 * );
 *
 * if (!result.ok) console.error(result.error.message);
 * ```
 *
 * @packageDocumentation
 */

// Pipeline
export {
  runPipeline,
  processImage,
  encodeImage,
  processAndSave,
} from './pipeline.js';
export type { PipelineOptions, PipelineFailure } from './pipeline.js';

// Operations
export * from './operations/index.js';

// Geometry
export {
  PixelUnit,
  PercentageUnit,
  pixels,
  percent,
  percentOrThrow,
  resolveUnit,
  describeUnit,
} from './geometry/units.js';
export type { Unit, PixelValue, PercentageValue } from './geometry/units.js';
export { resolveCoordinate, describeCoordinate } from './geometry/coordinate.js';
export type { Coordinate, PixelPoint } from './geometry/coordinate.js';
export { resolveCropRegion, resolveFarCorner, describeCrop } from './geometry/crop-region.js';
export { planResize } from './geometry/resize-plan.js';

// Configuration
export { DEFAULT_CONFIG, mergeConfig } from './config/defaults.js';
export type { ResolvedConfig } from './config/defaults.js';
export {
  parsePipelineDocument,
  PipelineDocumentSchema,
  OperationSchema,
  OutputFormatSchema,
  UnitSchema,
} from './config/schema.js';
export type { PipelineDocumentInput, OperationInput, UnitInput } from './config/schema.js';
export { loadConfig, parseConfig } from './config/loader.js';
export type { LoadConfigError } from './config/loader.js';

// Formats
export * from './formats.js';

// Processing
export * from './processing/index.js';

// Core
export { ok, err, unwrap, tryCatch } from './core/result.js';
export type { Ok, Err, Result } from './core/result.js';
export { EventBus, createEventBus } from './core/events.js';
export type {
  PipelineEvents,
  BaseEvent,
  OperationStartedEvent,
  OperationCompletedEvent,
  PipelineCompletedEvent,
  PipelineFailedEvent,
} from './core/events.js';

// Errors
export * from './errors.js';

// Logging
export { logger, setLogger, resetLogger } from './utils/logger.js';

// CLI
export { runCli, createCliLogger } from './cli/index.js';
export type { CliDependencies } from './cli/index.js';
export { parseCliArgs, USAGE } from './cli/args.js';
export type { CliCommand, CliOptions } from './cli/args.js';

// Types
export type {
  ChannelCount,
  RasterInfo,
  RasterImage,
  Dimensions,
  Rectangle,
  CropOrigin,
  CropOriginKind,
  FilterType,
  CropMode,
  AdjustBrightnessOperation,
  BlurOperation,
  CropOperation,
  GrayscaleOperation,
  ResizeOperation,
  Operation,
  OperationType,
  InvertOperation,
  UnsharpenOperation,
  ResizeStrategy,
  OutputFormat,
  OutputFormatType,
  Logger,
  PixelpipeConfig,
  PipelineDocument,
} from './types.js';
export { FILTER_TYPES, CROP_MODES } from './types.js';
