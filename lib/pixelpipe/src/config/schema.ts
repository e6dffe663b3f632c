/**
 * Zod Validation Schemas
 * pixelpipe
 *
 * Shape of the pipeline configuration document. Parsing is two-phase: zod
 * checks the document shape, then units are turned into domain values so
 * that an out-of-range percentage surfaces as PercentageOutOfRangeError.
 *
 * @example
 * ```json
 * {
 *   "outFormat": { "type": "jpeg", "quality": 85 },
 *   "operations": [
 *     { "type": "crop", "from": { "x": 10, "y": "5%" }, "to": { "origin": "maximum", "x": "10%", "y": 0 } },
 *     { "type": "resize", "width": "50%", "height": 200, "cropMode": "fill" }
 *   ]
 * }
 * ```
 */

import * as z from 'zod';
import { err, ok, type Result } from '../core/result.js';
import { ConfigurationError, type PercentageOutOfRangeError } from '../errors.js';
import type { Coordinate } from '../geometry/coordinate.js';
import { percent, pixels, type Unit } from '../geometry/units.js';
import { MAX_BRIGHTNESS_AMOUNT } from '../operations/adjust-brightness.js';
import {
  CROP_MODES,
  FILTER_TYPES,
  type Operation,
  type PipelineDocument,
} from '../types.js';

// ============ UNIT SCHEMAS ============

const PIXEL_STRING = /^(\d+)px$/;
const UNIT_STRING = /^(\d+px|-?\d+(\.\d+)?%)$/;

export const PixelCountSchema = z.number()
  .int('Pixel counts must be integers')
  .nonnegative('Pixel counts cannot be negative');

/**
 * 12 | "12px" | "25%" | { pixel: 12 } | { percentage: 0.25 }
 */
export const UnitSchema = z.union([
  PixelCountSchema,
  z.string().regex(UNIT_STRING, 'Expected "<n>px" or "<n>%"'),
  z.strictObject({ pixel: PixelCountSchema }),
  z.strictObject({ percentage: z.number() }),
]);

export type UnitInput = z.infer<typeof UnitSchema>;

export const CoordinateSchema = z.object({
  x: UnitSchema,
  y: UnitSchema,
});

export type CoordinateInput = z.infer<typeof CoordinateSchema>;

// ============ OPERATION SCHEMAS ============

export const AdjustBrightnessSchema = z.object({
  type: z.literal('adjust-brightness'),
  adjustment: z.enum(['darken', 'brighten']),
  /** 16-bit magnitude */
  amount: z.number().int().min(0).max(MAX_BRIGHTNESS_AMOUNT),
});

export const BlurSchema = z.object({
  type: z.literal('blur'),
  sigma: z.number(),
});

export const CropSchema = z.object({
  type: z.literal('crop'),
  from: CoordinateSchema,
  to: z.object({
    origin: z.enum(['minimum', 'maximum', 'crop-start']),
    x: UnitSchema,
    y: UnitSchema,
  }),
});

export const GrayscaleSchema = z.object({
  type: z.literal('grayscale'),
});

export const ResizeSchema = z.object({
  type: z.literal('resize'),
  width: UnitSchema,
  height: UnitSchema,
  /** Nearest-neighbour unless stated */
  filter: z.enum(FILTER_TYPES).default('nearest'),
  cropMode: z.enum(CROP_MODES),
});

export const OperationSchema = z.discriminatedUnion('type', [
  AdjustBrightnessSchema,
  BlurSchema,
  CropSchema,
  GrayscaleSchema,
  ResizeSchema,
]);

export type OperationInput = z.infer<typeof OperationSchema>;

// ============ OUTPUT FORMAT SCHEMAS ============

export const OutputFormatSchema = z.union([
  z.object({
    type: z.literal('jpeg'),
    quality: z.number().int().min(0).max(100),
  }),
  z.object({
    type: z.enum([
      'png',
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
    ]),
  }),
]);

// ============ DOCUMENT SCHEMA ============

export const PipelineDocumentSchema = z.object({
  /** Inferred from the output file name when absent */
  outFormat: OutputFormatSchema.optional(),
  operations: z.array(OperationSchema),
});

export type PipelineDocumentInput = z.input<typeof PipelineDocumentSchema>;

// ============ CONVERSION ============

type Converted<T> = Result<T, PercentageOutOfRangeError>;

export function toUnit(input: UnitInput): Converted<Unit> {
  if (typeof input === 'number') return ok(pixels(input));

  if (typeof input === 'string') {
    const pixelMatch = PIXEL_STRING.exec(input);
    if (pixelMatch) return ok(pixels(Number(pixelMatch[1])));
    return percent(Number(input.slice(0, -1)) / 100);
  }

  if ('pixel' in input) return ok(pixels(input.pixel));
  return percent(input.percentage);
}

function toCoordinate(input: CoordinateInput): Converted<Coordinate> {
  const x = toUnit(input.x);
  if (!x.ok) return x;
  const y = toUnit(input.y);
  if (!y.ok) return y;
  return ok({ x: x.value, y: y.value });
}

export function toOperation(input: OperationInput): Converted<Operation> {
  switch (input.type) {
    case 'adjust-brightness':
    case 'blur':
    case 'grayscale':
      return ok(input);

    case 'crop': {
      const from = toCoordinate(input.from);
      if (!from.ok) return from;
      const at = toCoordinate(input.to);
      if (!at.ok) return at;
      const crop: Operation = {
        type: 'crop',
        from: from.value,
        to: { origin: input.to.origin, at: at.value },
      };
      return ok(crop);
    }

    case 'resize': {
      const width = toUnit(input.width);
      if (!width.ok) return width;
      const height = toUnit(input.height);
      if (!height.ok) return height;
      const resize: Operation = {
        type: 'resize',
        width: width.value,
        height: height.value,
        filter: input.filter,
        cropMode: input.cropMode,
      };
      return ok(resize);
    }
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a parsed document (e.g. from JSON.parse) and build domain values.
 */
export function parsePipelineDocument(
  input: unknown
): Result<PipelineDocument, ConfigurationError | PercentageOutOfRangeError> {
  const parsed = PipelineDocumentSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ConfigurationError('Invalid pipeline configuration:', formatIssues(parsed.error)));
  }

  const operations: Operation[] = [];
  for (const raw of parsed.data.operations) {
    const operation = toOperation(raw);
    if (!operation.ok) return operation;
    operations.push(operation.value);
  }

  return ok({
    outFormat: parsed.data.outFormat ?? null,
    operations,
  });
}
