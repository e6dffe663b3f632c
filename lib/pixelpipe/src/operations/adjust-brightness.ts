import { ok } from '../core/result.js';
import type { AdjustBrightnessOperation } from '../types.js';
import type { ImageOperation } from './base.js';

export const MAX_BRIGHTNESS_AMOUNT = 0xffff;

/**
 * Signed offset added to every colour sample
 */
export function brightnessDelta(operation: AdjustBrightnessOperation): number {
  return operation.adjustment === 'darken' ? -operation.amount : operation.amount;
}

export const adjustBrightness: ImageOperation<AdjustBrightnessOperation> = {
  name: 'adjust-brightness',
  async apply(operation, image, transformer) {
    return ok(await transformer.brighten(image, brightnessDelta(operation)));
  },
};
