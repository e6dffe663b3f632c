/**
 * Configuration document loader
 *
 * Pipeline documents are JSON or TOML, picked by file extension. Keys may be
 * camelCase or snake_case (`out_format`, `crop_mode`).
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { err, type Result } from '../core/result.js';
import { ConfigurationError, type PercentageOutOfRangeError } from '../errors.js';
import type { PipelineDocument } from '../types.js';
import { parsePipelineDocument } from './schema.js';

export type LoadConfigError = ConfigurationError | PercentageOutOfRangeError;

export type ConfigSyntax = 'json' | 'toml';

export function syntaxOf(path: string): ConfigSyntax {
  return extname(path).toLowerCase() === '.toml' ? 'toml' : 'json';
}

function camelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

/**
 * Rename snake_case keys at every depth; values are left alone
 */
export function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys);
  if (typeof value !== 'object' || value === null) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [camelCase(key), normalizeKeys(entry)])
  );
}

function decode(text: string, syntax: ConfigSyntax): unknown {
  return syntax === 'toml' ? parseToml(text) : JSON.parse(text);
}

/**
 * Parse a document; syntax defaults to the one implied by `source`
 */
export function parseConfig(
  text: string,
  source = 'config',
  syntax: ConfigSyntax = syntaxOf(source)
): Result<PipelineDocument, LoadConfigError> {
  let document: unknown;
  try {
    document = decode(text, syntax);
  } catch (error) {
    return err(new ConfigurationError(`${source} is not valid ${syntax.toUpperCase()}`, [], error));
  }
  return parsePipelineDocument(normalizeKeys(document));
}

/**
 * Read and parse a JSON or TOML configuration file
 */
export async function loadConfig(path: string): Promise<Result<PipelineDocument, LoadConfigError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigurationError(`Cannot read configuration file ${path}: ${reason}`, [], error));
  }
  return parseConfig(text, path);
}
