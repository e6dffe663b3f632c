/**
 * Resize Resolution
 * pixelpipe
 */

import type { CropMode, ResizeOperation, ResizePlan, ResizeStrategy } from '../types.js';
import { PixelUnit, resolveUnit } from './units.js';

const STRATEGIES: Record<CropMode, ResizeStrategy> = {
  preserve: 'fit',
  fill: 'cover',
  exact: 'stretch',
};

/**
 * Resolve target units against the current image and pick a sizing strategy.
 * Zero-sized targets are passed on as-is.
 */
export function planResize(
  operation: Pick<ResizeOperation, 'width' | 'height' | 'filter' | 'cropMode'>,
  width: PixelUnit,
  height: PixelUnit
): ResizePlan {
  return {
    width: resolveUnit(operation.width, width).pixels,
    height: resolveUnit(operation.height, height).pixels,
    filter: operation.filter,
    strategy: STRATEGIES[operation.cropMode],
  };
}
