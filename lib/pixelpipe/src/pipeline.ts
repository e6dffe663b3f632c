/**
 * Pipeline Executor
 *
 * Applies an ordered list of operations to one image. Each step is awaited
 * before the next starts and receives the previous step's output; the first
 * failure ends the run and is returned as-is.
 *
 * @example
 * ```ts
 * const transformer = createSharpTransformer();
 * const image = await transformer.decode('photo.jpg');
 *
 * const result = await runPipeline(image, [
 *   { type: 'grayscale' },
 *   { type: 'resize', width: percentOrThrow(0.5), height: percentOrThrow(0.5), filter: 'lanczos3', cropMode: 'preserve' },
 * ], { transformer });
 *
 * if (result.ok) {
 *   await fs.writeFile('out.png', await transformer.encode(result.value, { type: 'png' }));
 * }
 * ```
 */

import { writeFile } from 'node:fs/promises';
import { ok, tryCatch, type Result } from './core/result.js';
import type { EventBus } from './core/events.js';
import {
  ImageDecodeError,
  ImageEncodeError,
  OutputWriteError,
  isPipelineError,
  type OperationError,
  type PipelineError,
  type TransformError,
} from './errors.js';
import { applyOperation } from './operations/index.js';
import type {
  Logger,
  Operation,
  OutputFormat,
  PixelTransformer,
  RasterImage,
} from './types.js';
import { logger as defaultLogger } from './utils/logger.js';

export interface PipelineOptions {
  /** Pixel-transform collaborator doing the actual work */
  transformer: PixelTransformer;
  /** Progress events (optional) */
  events?: EventBus;
  /** Defaults to the module logger */
  logger?: Logger;
}

export type PipelineFailure = OperationError | TransformError;

/**
 * Run operations in order against an image.
 */
export async function runPipeline(
  image: RasterImage,
  operations: readonly Operation[],
  options: PipelineOptions
): Promise<Result<RasterImage, PipelineFailure>> {
  const { transformer, events } = options;
  const log = options.logger ?? defaultLogger;
  const startedAt = Date.now();

  let current = image;

  for (const [step, operation] of operations.entries()) {
    const stepStartedAt = Date.now();
    await events?.emit('operation.started', { step, operation, input: { ...current.info } });
    log.debug(`[pixelpipe] step ${step}: ${operation.type}`, {
      width: current.info.width,
      height: current.info.height,
    });

    const result = await applyOperation(operation, current, transformer);

    if (!result.ok) {
      log.warn(`[pixelpipe] step ${step} (${operation.type}) failed: ${result.error.message}`);
      await events?.emit('pipeline.failed', { step, operation: operation.type, error: result.error });
      return result;
    }

    current = result.value;
    await events?.emit('operation.completed', {
      step,
      operation: operation.type,
      output: { ...current.info },
      durationMs: Date.now() - stepStartedAt,
    });
  }

  await events?.emit('pipeline.completed', {
    steps: operations.length,
    output: { ...current.info },
    durationMs: Date.now() - startedAt,
  });

  return ok(current);
}

/**
 * Decode a file (or bytes) and run the operations on it.
 */
export async function processImage(
  source: Buffer | string,
  operations: readonly Operation[],
  options: PipelineOptions
): Promise<Result<RasterImage, PipelineError>> {
  const decoded = await tryCatch(
    () => options.transformer.decode(source),
    (error) => new ImageDecodeError(typeof source === 'string' ? source : 'buffer', error)
  );
  if (!decoded.ok) return decoded;

  return runPipeline(decoded.value, operations, options);
}

/**
 * Encode with the transformer; its own typed errors pass through.
 */
export async function encodeImage(
  image: RasterImage,
  format: OutputFormat,
  transformer: PixelTransformer
): Promise<Result<Buffer, PipelineError>> {
  return tryCatch(
    () => transformer.encode(image, format),
    (error) => (isPipelineError(error) ? error : new ImageEncodeError(format.type, error))
  );
}

/**
 * Read, process, encode and write one file.
 */
export async function processAndSave(
  inPath: string,
  outPath: string,
  outFormat: OutputFormat,
  operations: readonly Operation[],
  options: PipelineOptions
): Promise<Result<RasterImage, PipelineError>> {
  const processed = await processImage(inPath, operations, options);
  if (!processed.ok) return processed;

  const encoded = await encodeImage(processed.value, outFormat, options.transformer);
  if (!encoded.ok) return encoded;

  const written = await tryCatch(
    () => writeFile(outPath, encoded.value),
    (error) => new OutputWriteError(outPath, error)
  );
  if (!written.ok) return written;

  return processed;
}
