/**
 * TransferFunctions - Display transfer curves
 *
 * Encode/decode pair for the sRGB transfer function used to take
 * display-referred linear light to gamma-encoded code values.
 *
 * Each function pair follows the naming convention:
 *   - {name}Encode: linear -> encoded (OETF)
 *   - {name}Decode: encoded -> linear (EOTF)
 */

// =============================================================================
// sRGB - IEC 61966-2-1:1999
// =============================================================================

/** Linear value below which the sRGB curve is a straight line */
export const SRGB_LINEAR_CUTOFF = 0.0031308;

/** Encoded value corresponding to SRGB_LINEAR_CUTOFF */
export const SRGB_ENCODED_CUTOFF = 0.04045;

const SRGB_LINEAR_SLOPE = 12.92;
const SRGB_GAMMA = 2.4;
const SRGB_SCALE = 1.055;
const SRGB_OFFSET = 0.055;

/**
 * sRGB OETF (gamma encode) - linear to sRGB
 */
export function srgbEncode(linear: number): number {
  // Handle NaN and Infinity
  if (!Number.isFinite(linear)) {
    return Number.isNaN(linear) ? 0 : (linear > 0 ? 1 : 0);
  }
  // Handle negative values (extended range) - mirror around zero
  if (linear < 0) {
    return -srgbEncode(-linear);
  }
  if (linear <= SRGB_LINEAR_CUTOFF) {
    return SRGB_LINEAR_SLOPE * linear;
  }
  return SRGB_SCALE * Math.pow(linear, 1.0 / SRGB_GAMMA) - SRGB_OFFSET;
}

/**
 * sRGB EOTF (gamma decode) - sRGB to linear
 */
export function srgbDecode(encoded: number): number {
  if (!Number.isFinite(encoded)) {
    return Number.isNaN(encoded) ? 0 : (encoded > 0 ? 1 : 0);
  }
  if (encoded < 0) {
    return -srgbDecode(-encoded);
  }
  if (encoded <= SRGB_ENCODED_CUTOFF) {
    return encoded / SRGB_LINEAR_SLOPE;
  }
  return Math.pow((encoded + SRGB_OFFSET) / SRGB_SCALE, SRGB_GAMMA);
}
