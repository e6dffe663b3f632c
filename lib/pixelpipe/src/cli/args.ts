/**
 * Command-line argument parsing
 */

import { parseArgs } from 'node:util';
import { err, ok, type Result } from '../core/result.js';
import { ConfigurationError } from '../errors.js';

export interface CliOptions {
  /** File to process */
  file: string;
  /** Output file */
  out: string;
  /** Path to a pipeline configuration file */
  config: string;
  /** Print per-step debug logs */
  verbose: boolean;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: CliOptions };

export const USAGE = [
  'Usage: pixelpipe --file <input> --out <output> --config <pipeline.json|pipeline.toml>',
  '',
  'Options:',
  '  -f, --file <path>     File to process',
  '  -o, --out <path>      Output file',
  '  -c, --config <path>   Pipeline configuration file (JSON or TOML)',
  '  -v, --verbose         Log every step',
  '  -h, --help            Show this help',
].join('\n');

export function parseCliArgs(argv: readonly string[]): Result<CliCommand, ConfigurationError> {
  let values: {
    file?: string;
    out?: string;
    config?: string;
    verbose?: boolean;
    help?: boolean;
  };

  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        file: { type: 'string', short: 'f' },
        out: { type: 'string', short: 'o' },
        config: { type: 'string', short: 'c' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(reason, [], error));
  }

  if (values.help) return ok({ kind: 'help' });

  const missing = (['file', 'out', 'config'] as const)
    .filter(name => !values[name])
    .map(name => `--${name} is required`);

  if (missing.length > 0 || !values.file || !values.out || !values.config) {
    return err(new ConfigurationError('Missing arguments:', missing));
  }

  return ok({
    kind: 'run',
    options: {
      file: values.file,
      out: values.out,
      config: values.config,
      verbose: values.verbose ?? false,
    },
  });
}
