/**
 * pixelpipe Default Configuration
 */
import { DEFAULT_JPEG_QUALITY } from '../formats.js';
import type { PixelpipeConfig } from '../types.js';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  sharp: {
    concurrency: 2, // Threads per image
    cache: false,   // Disable Sharp cache to reduce memory usage
  },
  defaultJpegQuality: DEFAULT_JPEG_QUALITY,
} as const satisfies PixelpipeConfig;

export type ResolvedConfig = PixelpipeConfig & {
  sharp: NonNullable<PixelpipeConfig['sharp']>;
  defaultJpegQuality: number;
};

/**
 * Merge user config with defaults
 */
export function mergeConfig(config: PixelpipeConfig = {}): ResolvedConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    sharp: { ...DEFAULT_CONFIG.sharp, ...config.sharp },
    defaultJpegQuality: config.defaultJpegQuality ?? DEFAULT_CONFIG.defaultJpegQuality,
  };
}
