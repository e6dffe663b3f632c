/**
 * Crop Region Resolution
 * pixelpipe
 *
 * Turns a near corner and a CropOrigin into a concrete pixel rectangle.
 * Both corners use the same axis mapping: x against width, y against height.
 *
 * @example
 * ```ts
 * const region = resolveCropRegion(
 *   { x: pixels(10), y: percentOrThrow(0.1) },
 *   { origin: 'maximum', at: { x: percentOrThrow(0.2), y: pixels(0) } },
 *   PixelUnit.of(200),
 *   PixelUnit.of(100),
 * );
 * // region.value → { left: 10, top: 10, width: 150, height: 90 }
 * ```
 */

import { err, ok, type Result } from '../core/result.js';
import { OperationError } from '../errors.js';
import type { CropOperation, CropOrigin, Rectangle } from '../types.js';
import {
  describeCoordinate,
  resolveCoordinate,
  type Coordinate,
  type PixelPoint,
} from './coordinate.js';
import { PixelUnit, resolveUnit } from './units.js';

/**
 * Far corner of the crop, given the already resolved near corner.
 */
export function resolveFarCorner(
  to: CropOrigin,
  near: PixelPoint,
  width: PixelUnit,
  height: PixelUnit
): Result<PixelPoint, OperationError> {
  switch (to.origin) {
    case 'minimum':
      return ok(resolveCoordinate(to.at, width, height));

    case 'maximum': {
      const inset = resolveCoordinate(to.at, width, height);
      // minus() needs a strictly smaller subtrahend
      if (!width.greaterThan(inset.x)) {
        return err(insetError('x', inset.x, width, to));
      }
      if (!height.greaterThan(inset.y)) {
        return err(insetError('y', inset.y, height, to));
      }
      return ok({ x: width.minus(inset.x), y: height.minus(inset.y) });
    }

    case 'crop-start':
      return ok({
        x: near.x.plus(resolveUnit(to.at.x, width)),
        y: near.y.plus(resolveUnit(to.at.y, height)),
      });
  }
}

/**
 * Resolve and validate a crop against the current image size.
 * Fails without touching the image when the far corner lies above or left
 * of the near corner, or when the region would be empty.
 */
export function resolveCropRegion(
  from: Coordinate,
  to: CropOrigin,
  width: PixelUnit,
  height: PixelUnit
): Result<Rectangle, OperationError> {
  const near = resolveCoordinate(from, width, height);
  const far = resolveFarCorner(to, near, width, height);
  if (!far.ok) return far;

  const { x: right, y: bottom } = far.value;
  const params = describeCrop({ type: 'crop', from, to });

  if (bottom.lessThan(near.y)) {
    return err(new OperationError(
      'crop',
      `Bottom cannot be less than top for crop operation ${params}`,
      { axis: 'y', top: near.y.pixels, bottom: bottom.pixels }
    ));
  }

  if (right.lessThan(near.x)) {
    return err(new OperationError(
      'crop',
      `Right cannot be less than left for crop operation ${params}`,
      { axis: 'x', left: near.x.pixels, right: right.pixels }
    ));
  }

  if (bottom.equals(near.y) || right.equals(near.x)) {
    return err(new OperationError(
      'crop',
      `Crop region is empty for crop operation ${params}`,
      {
        left: near.x.pixels,
        top: near.y.pixels,
        right: right.pixels,
        bottom: bottom.pixels,
      }
    ));
  }

  return ok({
    left: near.x.pixels,
    top: near.y.pixels,
    width: right.minus(near.x).pixels,
    height: bottom.minus(near.y).pixels,
  });
}

export function describeCrop(operation: CropOperation): string {
  return `{ from: ${describeCoordinate(operation.from)}, to: ${operation.to.origin} ${describeCoordinate(operation.to.at)} }`;
}

function insetError(
  axis: 'x' | 'y',
  inset: PixelUnit,
  dimension: PixelUnit,
  to: CropOrigin
): OperationError {
  const edge = axis === 'x' ? 'width' : 'height';
  return new OperationError(
    'crop',
    `Inset ${inset} must be smaller than the image ${edge} ${dimension} for crop origin ${to.origin} ${describeCoordinate(to.at)}`,
    { axis, inset: inset.pixels, [edge]: dimension.pixels }
  );
}

/**
 * Clip a rectangle to the image bounds. Regions running past the right or
 * bottom edge keep only the part inside the image.
 */
export function clipToBounds(region: Rectangle, width: number, height: number): Rectangle {
  const left = Math.min(region.left, width);
  const top = Math.min(region.top, height);
  return {
    left,
    top,
    width: Math.min(region.width, width - left),
    height: Math.min(region.height, height - top),
  };
}
