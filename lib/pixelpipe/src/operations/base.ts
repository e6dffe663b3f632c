/**
 * Operation contract
 * pixelpipe
 */

import type { Result } from '../core/result.js';
import type { OperationError } from '../errors.js';
import { PixelUnit } from '../geometry/units.js';
import type { PixelTransformer, RasterImage } from '../types.js';

/**
 * One transformation step.
 * Takes the image by value and returns a new one or an OperationError;
 * it never keeps a reference to either.
 */
export interface ImageOperation<Op> {
  readonly name: string;
  apply(
    operation: Op,
    image: RasterImage,
    transformer: PixelTransformer
  ): Promise<Result<RasterImage, OperationError>>;
}

export function imageSize(image: RasterImage): { width: PixelUnit; height: PixelUnit } {
  return {
    width: PixelUnit.of(image.info.width),
    height: PixelUnit.of(image.info.height),
  };
}
