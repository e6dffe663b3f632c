/**
 * pixelpipe CLI
 *
 * Reads an image, applies the operations from a configuration file and
 * writes the result.
 */

import { loadConfig } from '../config/loader.js';
import { mergeConfig } from '../config/defaults.js';
import { err, type Result } from '../core/result.js';
import { ConfigurationError, type PipelineError } from '../errors.js';
import { describeFormat, formatFromPath } from '../formats.js';
import { processAndSave } from '../pipeline.js';
import { createSharpTransformer } from '../processing/sharp-transformer.js';
import type { Logger, PixelpipeConfig, PixelTransformer, RasterImage } from '../types.js';
import { logger, setLogger } from '../utils/logger.js';
import { USAGE, parseCliArgs, type CliOptions } from './args.js';

export interface CliDependencies {
  /** Defaults to a sharp transformer built from the kit config */
  transformer?: PixelTransformer;
  config?: PixelpipeConfig;
  /** Where usage text goes */
  stdout?: (text: string) => void;
}

/**
 * Console sink that drops debug output unless asked for it
 */
export function createCliLogger(verbose: boolean, sink: Logger = console): Logger {
  return {
    info: (...args) => sink.info(...args),
    warn: (...args) => sink.warn(...args),
    error: (...args) => sink.error(...args),
    debug: (...args) => {
      if (verbose) sink.debug(...args);
    },
  };
}

async function execute(
  options: CliOptions,
  dependencies: CliDependencies
): Promise<Result<RasterImage, PipelineError>> {
  const config = mergeConfig(dependencies.config);
  const document = await loadConfig(options.config);
  if (!document.ok) return document;

  const outFormat = document.value.outFormat
    ?? formatFromPath(options.out, config.defaultJpegQuality);
  if (!outFormat) {
    return err(new ConfigurationError(
      `No outFormat in ${options.config} and none can be inferred from ${options.out}`
    ));
  }

  const transformer = dependencies.transformer ?? createSharpTransformer(config.sharp);
  logger.debug(`[pixelpipe] ${document.value.operations.length} operation(s), output ${describeFormat(outFormat)}`);

  return processAndSave(options.file, options.out, outFormat, document.value.operations, {
    transformer,
    logger: config.logger,
  });
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const stdout = dependencies.stdout ?? ((text: string) => console.log(text));
  const command = parseCliArgs(argv);
  const verbose = command.ok && command.value.kind === 'run' && command.value.options.verbose;
  setLogger(dependencies.config?.logger ?? createCliLogger(verbose));

  if (!command.ok) {
    logger.error(command.error.message);
    stdout(USAGE);
    return 2;
  }

  if (command.value.kind === 'help') {
    stdout(USAGE);
    return 0;
  }

  const { options } = command.value;
  const result = await execute(options, dependencies);
  if (!result.ok) {
    logger.error(result.error.message);
    return 1;
  }

  const { width, height } = result.value.info;
  logger.info(`Wrote ${options.out} (${width}x${height})`);
  return 0;
}
