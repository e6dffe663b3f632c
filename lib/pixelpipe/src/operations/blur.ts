import { ok } from '../core/result.js';
import type { BlurOperation } from '../types.js';
import type { ImageOperation } from './base.js';

export const blur: ImageOperation<BlurOperation> = {
  name: 'blur',
  async apply(operation, image, transformer) {
    return ok(await transformer.blur(image, operation.sigma));
  },
};
