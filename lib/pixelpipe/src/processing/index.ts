/**
 * Image Processing Module
 *
 * sharp-backed implementation of the pixel-transform collaborator, plus
 * encoders for the containers sharp cannot write.
 */

export {
  SharpTransformer,
  createSharpTransformer,
  effectiveBlurSigma,
  SHARP_OUTPUT_FORMATS,
  SUPPORTED_OUTPUT_FORMATS,
} from './sharp-transformer.js';
export {
  RAW_ENCODERS,
  encodeBmp,
  encodeFarbfeld,
  encodeQoi,
  encodeTga,
  wrapPngInIco,
  toRgba,
} from './encoders.js';
export type { RawEncoder, RawEncoderFormat } from './encoders.js';
export type { PixelTransformer, ResizePlan, SharpOptions } from '../types.js';
