/**
 * Output Format Utilities
 *
 * MIME mapping for the closed set of output containers, and inference of a
 * format from an output file name.
 */

import mimeTypes from 'mime-types';
import type { OutputFormat, OutputFormatType } from './types.js';

export const OUTPUT_FORMAT_TYPES = [
  'png',
  'jpeg',
  'gif',
  'ico',
  'bmp',
  'farbfeld',
  'tga',
  'openexr',
  'tiff',
  'avif',
  'qoi',
  'webp',
] as const satisfies readonly OutputFormatType[];

export const DEFAULT_JPEG_QUALITY = 80;

/**
 * Canonical MIME type first, then aliases seen in the wild
 */
const FORMAT_MIME_TYPES: Record<OutputFormatType, readonly string[]> = {
  png: ['image/png'],
  jpeg: ['image/jpeg', 'image/jpg', 'image/pjpeg'],
  gif: ['image/gif'],
  ico: ['image/vnd.microsoft.icon', 'image/x-icon'],
  bmp: ['image/bmp', 'image/x-ms-bmp'],
  farbfeld: ['image/x-farbfeld'],
  tga: ['image/x-tga', 'image/x-targa'],
  openexr: ['image/x-exr', 'image/aces'],
  tiff: ['image/tiff'],
  avif: ['image/avif'],
  qoi: ['image/x-qoi', 'image/qoi'],
  webp: ['image/webp'],
};

/**
 * Extensions mime-types does not know about
 */
const EXTENSION_FALLBACKS: Record<string, OutputFormatType> = {
  ff: 'farbfeld',
  qoi: 'qoi',
  exr: 'openexr',
  tga: 'tga',
};

/**
 * Get MIME type for an output format
 */
export function mimeTypeOf(format: OutputFormat | OutputFormatType): string {
  const type = typeof format === 'string' ? format : format.type;
  return FORMAT_MIME_TYPES[type][0] ?? 'application/octet-stream';
}

/**
 * Build a format value, filling in JPEG quality
 */
export function formatOf(type: OutputFormatType, jpegQuality = DEFAULT_JPEG_QUALITY): OutputFormat {
  return type === 'jpeg' ? { type, quality: jpegQuality } : { type };
}

/**
 * Infer the output format from a file name
 *
 * @example
 * formatFromPath('out/photo.webp') // → { type: 'webp' }
 * formatFromPath('photo.jpg', 90)  // → { type: 'jpeg', quality: 90 }
 * formatFromPath('notes.txt')      // → null
 */
export function formatFromPath(path: string, jpegQuality = DEFAULT_JPEG_QUALITY): OutputFormat | null {
  const mime = mimeTypes.lookup(path);
  if (mime) {
    const normalized = mime.toLowerCase();
    for (const type of OUTPUT_FORMAT_TYPES) {
      if (FORMAT_MIME_TYPES[type].includes(normalized)) {
        return formatOf(type, jpegQuality);
      }
    }
  }

  const extension = /\.([^./\\]+)$/.exec(path)?.[1]?.toLowerCase();
  const fallback = extension ? EXTENSION_FALLBACKS[extension] : undefined;
  return fallback ? formatOf(fallback, jpegQuality) : null;
}

/**
 * Human-readable format description (e.g. "jpeg (quality 80)")
 */
export function describeFormat(format: OutputFormat): string {
  return format.type === 'jpeg' ? `jpeg (quality ${format.quality})` : format.type;
}
