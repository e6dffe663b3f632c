import { ok } from '../core/result.js';
import { planResize } from '../geometry/resize-plan.js';
import type { ResizeOperation } from '../types.js';
import { imageSize, type ImageOperation } from './base.js';

export const resize: ImageOperation<ResizeOperation> = {
  name: 'resize',
  async apply(operation, image, transformer) {
    const { width, height } = imageSize(image);
    return ok(await transformer.resize(image, planResize(operation, width, height)));
  },
};
