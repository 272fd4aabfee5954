/**
 * PerceptualTonemapper - Scene-referred to display-referred tone mapping
 *
 * Compresses luminance with an extended Reinhard curve and rescales the
 * color by the luminance ratio, so hue and chroma ratios survive the
 * compression. Whatever the display gamut still cannot hold is
 * desaturated toward the neutral of the same luminance instead of being
 * clipped per channel.
 *
 * Input and output are linear ACEScg. The output is display-referred: its
 * sRGB image lies inside [0, 1].
 */

import {
  TONEMAP_DEFAULT_EXPOSURE,
  TONEMAP_DEFAULT_WHITE_POINT,
} from '../config/RenderConfig';
import { ValidationError } from '../core/errors';
import { acescgToLinearSrgb, luminanceAcescg, type RGB } from './ColorSpaces';

export interface PerceptualTonemapperParams {
  /** Exposure offset in stops, applied before compression */
  exposure: number;
  /** Scene luminance that maps to display white; must be > 0 */
  whitePoint: number;
}

export const DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS: Readonly<PerceptualTonemapperParams> =
  Object.freeze({
    exposure: TONEMAP_DEFAULT_EXPOSURE,
    whitePoint: TONEMAP_DEFAULT_WHITE_POINT,
  });

/**
 * @throws ValidationError when exposure is not finite or the white point is
 * not a finite positive number
 */
export function validateTonemapperParams(params: PerceptualTonemapperParams): void {
  if (!Number.isFinite(params.exposure)) {
    throw new ValidationError(`Tonemap exposure must be finite, got ${params.exposure}`);
  }
  if (!Number.isFinite(params.whitePoint) || params.whitePoint <= 0) {
    throw new ValidationError(`Tonemap white point must be a positive number, got ${params.whitePoint}`);
  }
}

/**
 * Extended Reinhard curve on luminance: L * (1 + L / W^2) / (1 + L),
 * capped at 1. Slope 1 at black, reaches 1 at L = W.
 */
export function compressLuminance(luminance: number, whitePoint: number): number {
  if (Number.isNaN(luminance) || luminance <= 0) return 0;
  if (luminance >= whitePoint) return 1;
  const w2 = whitePoint * whitePoint;
  return Math.min(1, (luminance * (1 + luminance / w2)) / (1 + luminance));
}

/**
 * Fraction of chroma (0..1) that can be kept when pulling `linearSrgb`
 * toward the neutral `neutral` so that every channel lands in [0, 1].
 * Same construction as a hue-preserving gamut clip.
 */
export function gamutFitFactor(linearSrgb: RGB, neutral: number): number {
  let keep = 1;
  for (const c of linearSrgb) {
    if (c > 1) keep = Math.min(keep, (1 - neutral) / (c - neutral));
    else if (c < 0) keep = Math.min(keep, neutral / (neutral - c));
  }
  return Math.max(0, keep);
}

// NaN and negatives carry no light; +Infinity is kept so it saturates to white.
function sanitize(value: number): number {
  return value > 0 ? value : 0;
}

/**
 * Map a scene-linear ACEScg color to a display-referred ACEScg color.
 *
 * NaN and negative channels are treated as 0. Infinite luminance maps
 * to display white.
 */
export function tonemapPerceptual(
  color: RGB,
  params: PerceptualTonemapperParams = DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS
): RGB {
  const gain = Math.pow(2, params.exposure);
  const r = sanitize(color[0]) * gain;
  const g = sanitize(color[1]) * gain;
  const b = sanitize(color[2]) * gain;

  const luminance = luminanceAcescg([r, g, b]);
  if (!(luminance > 0)) return [0, 0, 0];
  if (!Number.isFinite(luminance)) return [1, 1, 1];

  const mapped = compressLuminance(luminance, params.whitePoint);
  const scale = mapped / luminance;
  const scaled: RGB = [r * scale, g * scale, b * scale];

  // Neutrals map to neutrals under the AP1 to sRGB matrix, so the fit
  // factor found in sRGB applies unchanged in the working space.
  const keep = gamutFitFactor(acescgToLinearSrgb(scaled), mapped);
  return [
    mapped + (scaled[0] - mapped) * keep,
    mapped + (scaled[1] - mapped) * keep,
    mapped + (scaled[2] - mapped) * keep,
  ];
}
