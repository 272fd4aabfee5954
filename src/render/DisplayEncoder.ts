/**
 * DisplayEncoder - Scene-linear frame to 8-bit sRGB frame
 *
 * Each pixel is mapped independently: perceptual tonemap in ACEScg,
 * conversion to linear sRGB, sRGB transfer curve, 8-bit quantization.
 * Color channels round to the nearest code value; alpha is truncated.
 * No state is kept between calls.
 */

import { MAX_8BIT } from '../config/RenderConfig';
import { acescgToLinearSrgb } from '../color/ColorSpaces';
import {
  DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS,
  tonemapPerceptual,
  validateTonemapperParams,
  type PerceptualTonemapperParams,
} from '../color/PerceptualTonemapper';
import { srgbEncode } from '../color/TransferFunctions';
import { clamp } from '../utils/math';
import { createDisplayFrame, type DisplayFrame, type SceneLinearFrame } from './FrameBuffer';

/**
 * Quantize an encoded [0, 1] value to the nearest 8-bit code value.
 */
export function quantizeColorChannel(encoded: number): number {
  if (Number.isNaN(encoded)) return 0;
  return Math.round(clamp(encoded, 0, 1) * MAX_8BIT);
}

/**
 * Quantize linear alpha by truncating `255 * alpha`, saturating to
 * [0, 255] with NaN mapping to 0.
 */
export function quantizeAlpha(alpha: number): number {
  const scaled = Math.trunc(MAX_8BIT * alpha);
  if (Number.isNaN(scaled)) return 0;
  return clamp(scaled, 0, MAX_8BIT);
}

/**
 * Encode one scene-linear RGBA pixel into `out` at `offset`.
 */
export function encodePixel(
  r: number,
  g: number,
  b: number,
  a: number,
  params: PerceptualTonemapperParams,
  out: Uint8ClampedArray,
  offset: number
): void {
  const display = tonemapPerceptual([r, g, b], params);
  const linear = acescgToLinearSrgb(display);

  out[offset] = quantizeColorChannel(srgbEncode(clamp(linear[0], 0, 1)));
  out[offset + 1] = quantizeColorChannel(srgbEncode(clamp(linear[1], 0, 1)));
  out[offset + 2] = quantizeColorChannel(srgbEncode(clamp(linear[2], 0, 1)));
  out[offset + 3] = quantizeAlpha(a);
}

/**
 * Convert a scene-linear frame into a display frame of the same size.
 *
 * @throws ValidationError for invalid tonemap parameters
 */
export function encodeToDisplay(
  frame: SceneLinearFrame,
  params: PerceptualTonemapperParams = DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS
): DisplayFrame {
  validateTonemapperParams(params);
  const display = createDisplayFrame(frame.width, frame.height);
  const src = frame.data;
  const dst = display.data;

  for (let i = 0; i < src.length; i += 4) {
    encodePixel(src[i], src[i + 1], src[i + 2], src[i + 3], params, dst, i);
  }

  return display;
}
