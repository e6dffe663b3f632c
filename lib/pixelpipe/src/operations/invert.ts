import { ok } from '../core/result.js';
import type { InvertOperation } from '../types.js';
import type { ImageOperation } from './base.js';

/**
 * Tonal inversion of the colour channels. Not part of the configurable set.
 */
export const invert: ImageOperation<InvertOperation> = {
  name: 'invert',
  async apply(_operation, image, transformer) {
    return ok(await transformer.invert(image));
  },
};
