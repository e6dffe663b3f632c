/**
 * Pixelpipe Error Classes
 * pixelpipe
 *
 * Typed errors with codes. Recoverable failures travel inside a Result;
 * the pixel arithmetic errors are contract violations and are thrown.
 */

export interface PipelineErrorOptions {
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base Pipeline Error
 */
export class PipelineError extends Error {
  public readonly code: string;
  public readonly metadata: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = options.metadata ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
    };
  }
}

/**
 * Unit Errors
 */
export class PercentageOutOfRangeError extends PipelineError {
  public readonly percentage: number;

  constructor(percentage: number) {
    super(
      `Percentage out of range: ${percentage}`,
      'PERCENTAGE_OUT_OF_RANGE',
      { metadata: { percentage } }
    );
    this.percentage = percentage;
  }
}

export class InvalidPixelCountError extends PipelineError {
  constructor(pixels: number) {
    super(
      `Pixel count must be a non-negative integer. Got: ${pixels}`,
      'INVALID_PIXEL_COUNT',
      { metadata: { pixels } }
    );
  }
}

export class PixelUnderflowError extends PipelineError {
  constructor(minuend: number, subtrahend: number) {
    super(
      `Cannot subtract ${subtrahend}px from ${minuend}px: minuend must be strictly greater`,
      'PIXEL_UNDERFLOW',
      { metadata: { minuend, subtrahend } }
    );
  }
}

/**
 * Operation Errors
 */
export class OperationError extends PipelineError {
  public readonly operation: string;

  constructor(operation: string, message: string, metadata: Record<string, unknown> = {}) {
    super(`Error processing image: ${message}`, 'OPERATION_FAILED', {
      metadata: { operation, ...metadata },
    });
    this.operation = operation;
  }
}

/**
 * The pixel-transform collaborator threw while applying an operation
 */
export class TransformError extends PipelineError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(
      `Image transform "${operation}" failed: ${describeCause(cause)}`,
      'TRANSFORM_FAILED',
      { metadata: { operation }, cause }
    );
    this.operation = operation;
  }
}

/**
 * Image I/O Errors
 */
export class ImageDecodeError extends PipelineError {
  constructor(source: string, cause: unknown) {
    super(
      `Failed to decode image from ${source}: ${describeCause(cause)}`,
      'IMAGE_DECODE_FAILED',
      { metadata: { source }, cause }
    );
  }
}

export class ImageEncodeError extends PipelineError {
  constructor(format: string, cause: unknown) {
    super(
      `Failed to encode image as ${format}: ${describeCause(cause)}`,
      'IMAGE_ENCODE_FAILED',
      { metadata: { format }, cause }
    );
  }
}

export class OutputWriteError extends PipelineError {
  constructor(path: string, cause: unknown) {
    super(
      `Failed to write output to ${path}: ${describeCause(cause)}`,
      'OUTPUT_WRITE_FAILED',
      { metadata: { path }, cause }
    );
  }
}

export class UnsupportedFormatError extends PipelineError {
  constructor(format: string, supported: readonly string[] = []) {
    super(
      `Output format "${format}" is not supported by this transformer. Supported: ${supported.join(', ')}`,
      'UNSUPPORTED_FORMAT',
      { metadata: { format, supported: [...supported] } }
    );
  }
}

/**
 * Configuration Errors
 */
export class ConfigurationError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    const details = issues.length > 0
      ? [message, ...issues.map(issue => `  - ${issue}`)].join('\n')
      : message;

    super(details, 'CONFIGURATION_ERROR', { metadata: { issues }, cause });
    this.issues = issues;
  }
}

/**
 * Error Code Constants
 */
export const ERROR_CODES = {
  PERCENTAGE_OUT_OF_RANGE: 'PERCENTAGE_OUT_OF_RANGE',
  INVALID_PIXEL_COUNT: 'INVALID_PIXEL_COUNT',
  PIXEL_UNDERFLOW: 'PIXEL_UNDERFLOW',
  OPERATION_FAILED: 'OPERATION_FAILED',
  TRANSFORM_FAILED: 'TRANSFORM_FAILED',
  IMAGE_DECODE_FAILED: 'IMAGE_DECODE_FAILED',
  IMAGE_ENCODE_FAILED: 'IMAGE_ENCODE_FAILED',
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Check if error is from pixelpipe
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
