import { ok } from '../core/result.js';
import type { UnsharpenOperation } from '../types.js';
import type { ImageOperation } from './base.js';

/**
 * Unsharp-mask sharpen. Not part of the configurable set.
 */
export const unsharpen: ImageOperation<UnsharpenOperation> = {
  name: 'unsharpen',
  async apply(operation, image, transformer) {
    return ok(await transformer.unsharpen(image, operation.sigma, operation.threshold));
  },
};
