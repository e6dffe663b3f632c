import { describe, expect, it } from 'vitest';
import { describeFormat, formatFromPath, formatOf, mimeTypeOf } from './formats.js';

describe('formatFromPath', () => {
  it('infers common formats from the extension', () => {
    expect(formatFromPath('out/photo.webp')).toEqual({ type: 'webp' });
    expect(formatFromPath('photo.PNG')).toEqual({ type: 'png' });
    expect(formatFromPath('scan.tiff')).toEqual({ type: 'tiff' });
  });

  it('fills in JPEG quality', () => {
    expect(formatFromPath('photo.jpg', 90)).toEqual({ type: 'jpeg', quality: 90 });
    expect(formatFromPath('photo.jpeg')).toEqual({ type: 'jpeg', quality: 80 });
  });

  it('knows extensions without a registered MIME type', () => {
    expect(formatFromPath('frame.qoi')).toEqual({ type: 'qoi' });
    expect(formatFromPath('frame.ff')).toEqual({ type: 'farbfeld' });
  });

  it('returns null for anything else', () => {
    expect(formatFromPath('notes.txt')).toBeNull();
    expect(formatFromPath('no-extension')).toBeNull();
  });
});

describe('mimeTypeOf', () => {
  it('returns the canonical type', () => {
    expect(mimeTypeOf('jpeg')).toBe('image/jpeg');
    expect(mimeTypeOf({ type: 'avif' })).toBe('image/avif');
  });
});

describe('formatOf', () => {
  it('only carries quality for JPEG', () => {
    expect(formatOf('gif', 50)).toEqual({ type: 'gif' });
    expect(formatOf('jpeg', 50)).toEqual({ type: 'jpeg', quality: 50 });
  });
});

describe('describeFormat', () => {
  it('mentions JPEG quality', () => {
    expect(describeFormat({ type: 'jpeg', quality: 75 })).toBe('jpeg (quality 75)');
    expect(describeFormat({ type: 'png' })).toBe('png');
  });
});
