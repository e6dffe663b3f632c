/**
 * Units - pixel counts and bounded percentages
 * pixelpipe
 *
 * A size or position is either an absolute pixel count or a fraction of the
 * dimension it is measured along. Percentages are validated once, when they
 * are built; resolution against a dimension never fails.
 */

import { err, ok, unwrap, type Result } from '../core/result.js';
import {
  InvalidPixelCountError,
  PercentageOutOfRangeError,
  PixelUnderflowError,
} from '../errors.js';

/**
 * PixelUnit - immutable, exact, non-negative pixel count
 */
export class PixelUnit {
  readonly pixels: number;

  private constructor(pixels: number) {
    if (!Number.isInteger(pixels) || pixels < 0) {
      throw new InvalidPixelCountError(pixels);
    }
    this.pixels = pixels;
  }

  // ============ FACTORY METHODS ============

  /**
   * @example PixelUnit.of(120).pixels // 120
   */
  static of(pixels: number): PixelUnit {
    return new PixelUnit(pixels);
  }

  static zero(): PixelUnit {
    return new PixelUnit(0);
  }

  // ============ ARITHMETIC ============

  plus(other: PixelUnit): PixelUnit {
    return new PixelUnit(this.pixels + other.pixels);
  }

  /**
   * Subtract a smaller pixel count.
   * The minuend must be strictly greater; anything else is a caller bug.
   */
  minus(other: PixelUnit): PixelUnit {
    if (!(this.pixels > other.pixels)) {
      throw new PixelUnderflowError(this.pixels, other.pixels);
    }
    return new PixelUnit(this.pixels - other.pixels);
  }

  // ============ COMPARISON ============

  compare(other: PixelUnit): -1 | 0 | 1 {
    if (this.pixels < other.pixels) return -1;
    if (this.pixels > other.pixels) return 1;
    return 0;
  }

  equals(other: PixelUnit): boolean {
    return this.pixels === other.pixels;
  }

  lessThan(other: PixelUnit): boolean {
    return this.pixels < other.pixels;
  }

  greaterThan(other: PixelUnit): boolean {
    return this.pixels > other.pixels;
  }

  toString(): string {
    return `${this.pixels}px`;
  }

  toJSON(): number {
    return this.pixels;
  }
}

/**
 * PercentageUnit - a fraction in [0, 1] of some reference dimension.
 * Held and applied in single precision: 29% of 100px is 29px, not 28px.
 */
export class PercentageUnit {
  readonly percentage: number;

  private constructor(percentage: number) {
    this.percentage = percentage;
  }

  /**
   * The only way in. NaN and anything outside [0, 1] are rejected.
   */
  static from(value: number): Result<PercentageUnit, PercentageOutOfRangeError> {
    const single = Math.fround(value);
    if (!(single >= 0 && single <= 1)) {
      return err(new PercentageOutOfRangeError(single));
    }
    return ok(new PercentageUnit(single));
  }

  /**
   * Pixels covered along a dimension, truncated toward zero
   */
  of(reference: PixelUnit): PixelUnit {
    return PixelUnit.of(Math.trunc(Math.fround(Math.fround(reference.pixels) * this.percentage)));
  }

  toString(): string {
    return `${Math.fround(this.percentage * 100)}%`;
  }

  toJSON(): number {
    return this.percentage;
  }
}

export interface PixelValue {
  readonly kind: 'pixel';
  readonly value: PixelUnit;
}

export interface PercentageValue {
  readonly kind: 'percentage';
  readonly value: PercentageUnit;
}

/**
 * Unit - either an absolute pixel count or a percentage
 */
export type Unit = PixelValue | PercentageValue;

export function pixels(count: number): PixelValue {
  return { kind: 'pixel', value: PixelUnit.of(count) };
}

export function percent(fraction: number): Result<PercentageValue, PercentageOutOfRangeError> {
  const unit = PercentageUnit.from(fraction);
  if (!unit.ok) return unit;

  const value: PercentageValue = { kind: 'percentage', value: unit.value };
  return ok(value);
}

/**
 * For literals known to be in range; throws PercentageOutOfRangeError otherwise.
 */
export function percentOrThrow(fraction: number): PercentageValue {
  return unwrap(percent(fraction));
}

/**
 * Resolve a unit against the length of the axis it measures.
 * Percentages truncate toward zero: 3px × 0.99 → 2px.
 */
export function resolveUnit(unit: Unit, reference: PixelUnit): PixelUnit {
  switch (unit.kind) {
    case 'pixel':
      return unit.value;
    case 'percentage':
      return unit.value.of(reference);
  }
}

export function describeUnit(unit: Unit): string {
  return unit.value.toString();
}
