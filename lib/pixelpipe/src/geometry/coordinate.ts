/**
 * Coordinates
 * pixelpipe
 */

import { PixelUnit, describeUnit, resolveUnit, type Unit } from './units.js';

/**
 * Unresolved 2D point; meaningless until resolved against an image size
 */
export interface Coordinate {
  readonly x: Unit;
  readonly y: Unit;
}

export interface PixelPoint {
  readonly x: PixelUnit;
  readonly y: PixelUnit;
}

/**
 * x always resolves against width and y against height.
 */
export function resolveCoordinate(
  coordinate: Coordinate,
  width: PixelUnit,
  height: PixelUnit
): PixelPoint {
  return {
    x: resolveUnit(coordinate.x, width),
    y: resolveUnit(coordinate.y, height),
  };
}

export function describeCoordinate(coordinate: Coordinate): string {
  return `(${describeUnit(coordinate.x)}, ${describeUnit(coordinate.y)})`;
}
