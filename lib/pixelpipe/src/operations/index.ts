/**
 * Operation dispatch
 * pixelpipe
 *
 * Adding a variant means extending the Operation union and adding its
 * handler here; the exhaustive switch will not compile until both exist.
 */

import { tryCatch, type Result } from '../core/result.js';
import { TransformError, type OperationError } from '../errors.js';
import type { Operation, OperationType, PixelTransformer, RasterImage } from '../types.js';
import { adjustBrightness } from './adjust-brightness.js';
import type { ImageOperation } from './base.js';
import { blur } from './blur.js';
import { crop } from './crop.js';
import { grayscale } from './grayscale.js';
import { resize } from './resize.js';

export type OperationOf<K extends OperationType> = Extract<Operation, { type: K }>;

export type OperationHandlers = {
  readonly [K in OperationType]: ImageOperation<OperationOf<K>>;
};

export const OPERATION_HANDLERS: OperationHandlers = {
  'adjust-brightness': adjustBrightness,
  blur,
  crop,
  grayscale,
  resize,
};

function dispatch(
  operation: Operation,
  image: RasterImage,
  transformer: PixelTransformer
): Promise<Result<RasterImage, OperationError>> {
  switch (operation.type) {
    case 'adjust-brightness':
      return OPERATION_HANDLERS['adjust-brightness'].apply(operation, image, transformer);
    case 'blur':
      return OPERATION_HANDLERS.blur.apply(operation, image, transformer);
    case 'crop':
      return OPERATION_HANDLERS.crop.apply(operation, image, transformer);
    case 'grayscale':
      return OPERATION_HANDLERS.grayscale.apply(operation, image, transformer);
    case 'resize':
      return OPERATION_HANDLERS.resize.apply(operation, image, transformer);
  }
}

/**
 * Apply one operation. Whatever the transformer throws comes back as a
 * TransformError; an operation's own precondition failure as OperationError.
 */
export async function applyOperation(
  operation: Operation,
  image: RasterImage,
  transformer: PixelTransformer
): Promise<Result<RasterImage, OperationError | TransformError>> {
  const outcome = await tryCatch(
    () => dispatch(operation, image, transformer),
    (error) => new TransformError(operation.type, error)
  );
  return outcome.ok ? outcome.value : outcome;
}

export { adjustBrightness, brightnessDelta, MAX_BRIGHTNESS_AMOUNT } from './adjust-brightness.js';
export { blur } from './blur.js';
export { crop } from './crop.js';
export { grayscale } from './grayscale.js';
export { resize } from './resize.js';
export { invert } from './invert.js';
export { unsharpen } from './unsharpen.js';
export { imageSize } from './base.js';
export type { ImageOperation } from './base.js';
