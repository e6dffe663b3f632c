import { describe, expect, it } from 'vitest';
import { OperationError } from '../errors.js';
import type { CropOrigin } from '../types.js';
import type { Coordinate } from './coordinate.js';
import { clipToBounds, describeCrop, resolveCropRegion, resolveFarCorner } from './crop-region.js';
import { PixelUnit, percentOrThrow, pixels } from './units.js';

const WIDTH = PixelUnit.of(200);
const HEIGHT = PixelUnit.of(100);

function at(x: number, y: number): Coordinate {
  return { x: pixels(x), y: pixels(y) };
}

function resolve(from: Coordinate, to: CropOrigin) {
  return resolveCropRegion(from, to, WIDTH, HEIGHT);
}

describe('resolveCropRegion', () => {
  describe('minimum origin', () => {
    it('uses the coordinate as the far corner', () => {
      const result = resolve(at(10, 10), { origin: 'minimum', at: at(110, 60) });
      expect(result).toEqual({ ok: true, value: { left: 10, top: 10, width: 100, height: 50 } });
    });

    it('resolves percentages against the matching axis', () => {
      const result = resolve(
        { x: percentOrThrow(0.5), y: percentOrThrow(0.5) },
        { origin: 'minimum', at: { x: percentOrThrow(1), y: percentOrThrow(1) } }
      );
      expect(result).toEqual({ ok: true, value: { left: 100, top: 50, width: 100, height: 50 } });
    });
  });

  describe('maximum origin', () => {
    it('treats the coordinate as an inset from the right and bottom edges', () => {
      const result = resolve(
        { x: pixels(10), y: percentOrThrow(0.1) },
        { origin: 'maximum', at: { x: percentOrThrow(0.2), y: pixels(0) } }
      );
      expect(result).toEqual({ ok: true, value: { left: 10, top: 10, width: 150, height: 90 } });
    });

    it('covers the whole image with a zero inset', () => {
      const result = resolve(at(0, 0), { origin: 'maximum', at: at(0, 0) });
      expect(result).toEqual({ ok: true, value: { left: 0, top: 0, width: 200, height: 100 } });
    });

    it('fails when the inset reaches the image width', () => {
      const result = resolve(at(0, 0), { origin: 'maximum', at: at(200, 0) });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(OperationError);
      expect(result.error.message).toBe(
        'Error processing image: Inset 200px must be smaller than the image width 200px for crop origin maximum (200px, 0px)'
      );
    });

    it('fails when the inset exceeds the image height', () => {
      const result = resolve(at(0, 0), { origin: 'maximum', at: { x: pixels(0), y: percentOrThrow(1) } });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.metadata).toEqual({ operation: 'crop', axis: 'y', inset: 100, height: 100 });
    });
  });

  describe('crop-start origin', () => {
    it('adds the coordinate to the near corner', () => {
      const result = resolve(at(20, 20), {
        origin: 'crop-start',
        at: { x: percentOrThrow(0.5), y: percentOrThrow(0.5) },
      });
      expect(result).toEqual({ ok: true, value: { left: 20, top: 20, width: 100, height: 50 } });
    });

    it('does not clip regions running past the edge', () => {
      const result = resolve(at(150, 0), { origin: 'crop-start', at: at(100, 10) });
      expect(result).toEqual({ ok: true, value: { left: 150, top: 0, width: 100, height: 10 } });
    });
  });

  describe('validation', () => {
    it('rejects a far corner above the near corner', () => {
      const result = resolve(at(0, 60), { origin: 'minimum', at: at(100, 50) });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        'Error processing image: Bottom cannot be less than top for crop operation { from: (0px, 60px), to: minimum (100px, 50px) }'
      );
    });

    it('rejects a far corner left of the near corner', () => {
      const result = resolve(at(150, 0), { origin: 'minimum', at: at(100, 50) });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        'Error processing image: Right cannot be less than left for crop operation { from: (150px, 0px), to: minimum (100px, 50px) }'
      );
    });

    it('checks the vertical axis first', () => {
      const result = resolve(at(150, 60), { origin: 'minimum', at: at(100, 50) });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.metadata['axis']).toBe('y');
    });

    it('rejects an empty region', () => {
      const result = resolve(at(10, 10), { origin: 'minimum', at: at(10, 50) });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        'Error processing image: Crop region is empty for crop operation { from: (10px, 10px), to: minimum (10px, 50px) }'
      );
    });

    it('rejects a zero-size crop-start region', () => {
      const result = resolve(at(10, 10), { origin: 'crop-start', at: at(0, 0) });
      expect(result.ok).toBe(false);
    });
  });
});

describe('describeCrop', () => {
  it('lists both corners', () => {
    expect(describeCrop({
      type: 'crop',
      from: { x: pixels(5), y: percentOrThrow(0.25) },
      to: { origin: 'crop-start', at: at(50, 40) },
    })).toBe('{ from: (5px, 25%), to: crop-start (50px, 40px) }');
  });
});

describe('clipToBounds', () => {
  it('keeps regions inside the image', () => {
    expect(clipToBounds({ left: 10, top: 10, width: 50, height: 20 }, 200, 100))
      .toEqual({ left: 10, top: 10, width: 50, height: 20 });
  });

  it('cuts regions at the right and bottom edges', () => {
    expect(clipToBounds({ left: 100, top: 50, width: 120, height: 60 }, 200, 100))
      .toEqual({ left: 100, top: 50, width: 100, height: 50 });
  });

  it('collapses regions that start outside the image', () => {
    expect(clipToBounds({ left: 250, top: 0, width: 10, height: 10 }, 200, 100))
      .toEqual({ left: 200, top: 0, width: 0, height: 10 });
  });
});

describe('resolveFarCorner', () => {
  it('takes a minimum coordinate as the far corner itself', () => {
    const far = resolveFarCorner(
      { origin: 'minimum', at: at(10, 10) },
      { x: PixelUnit.of(5), y: PixelUnit.of(5) },
      WIDTH,
      HEIGHT
    );
    expect(far.ok && { x: far.value.x.pixels, y: far.value.y.pixels }).toEqual({ x: 10, y: 10 });
  });
});
