import { ok } from '../core/result.js';
import type { GrayscaleOperation } from '../types.js';
import type { ImageOperation } from './base.js';

export const grayscale: ImageOperation<GrayscaleOperation> = {
  name: 'grayscale',
  async apply(_operation, image, transformer) {
    return ok(await transformer.grayscale(image));
  },
};
