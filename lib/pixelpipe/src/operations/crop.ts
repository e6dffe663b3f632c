/**
 * Crop
 * pixelpipe
 *
 * Geometry is resolved against the image as it is at this step, so a crop
 * after a resize sees the resized dimensions.
 */

import { ok } from '../core/result.js';
import { resolveCropRegion } from '../geometry/crop-region.js';
import type { CropOperation } from '../types.js';
import { imageSize, type ImageOperation } from './base.js';

export const crop: ImageOperation<CropOperation> = {
  name: 'crop',
  async apply(operation, image, transformer) {
    const { width, height } = imageSize(image);
    const region = resolveCropRegion(operation.from, operation.to, width, height);
    if (!region.ok) return region;

    return ok(await transformer.crop(image, region.value));
  },
};
