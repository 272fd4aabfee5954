/**
 * ColorSpaces - Working and display color space definitions
 *
 * The scene is rendered in ACEScg (AP1 primaries, D60 white) and presented
 * in sRGB (Rec.709 primaries, D65 white). Matrices are row-major.
 */

import { AP1_LUMA_R, AP1_LUMA_G, AP1_LUMA_B } from '../config/RenderConfig';

/**
 * 3x3 matrix type for color transforms
 */
export type Matrix3x3 = [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number
];

/**
 * RGB triplet
 */
export type RGB = [number, number, number];

/**
 * ACEScg (AP1) to XYZ (D60)
 * ACES CG working space with AP1 primaries
 */
export const ACESCG_TO_XYZ: Matrix3x3 = [
  0.6624541811, 0.1340042065, 0.1561876870,
  AP1_LUMA_R, AP1_LUMA_G, AP1_LUMA_B,
  -0.0055746495, 0.0040607335, 1.0103391003,
];

/**
 * ACEScg (AP1, D60) to linear sRGB (Rec.709, D65)
 * Bradford chromatic adaptation from D60 to D65. Every row sums to 1,
 * so equal-energy neutrals stay neutral.
 */
export const ACESCG_TO_LINEAR_SRGB: Matrix3x3 = [
  1.70505099, -0.62179212, -0.08325887,
  -0.13025642, 1.14080474, -0.01054832,
  -0.02400336, -0.12896898, 1.15297234,
];

/**
 * Multiply a 3x3 matrix by a 3-element vector
 */
export function multiplyMatrixVector(m: Matrix3x3, v: RGB): RGB {
  return [
    m[0] * v[0] + m[1] * v[1] + m[2] * v[2],
    m[3] * v[0] + m[4] * v[1] + m[5] * v[2],
    m[6] * v[0] + m[7] * v[1] + m[8] * v[2],
  ];
}

/**
 * Relative luminance (Y) of a linear ACEScg value.
 */
export function luminanceAcescg(rgb: RGB): number {
  return AP1_LUMA_R * rgb[0] + AP1_LUMA_G * rgb[1] + AP1_LUMA_B * rgb[2];
}

/**
 * Convert a linear ACEScg value to linear sRGB. The result may fall
 * outside [0, 1] for colors the sRGB gamut cannot hold.
 */
export function acescgToLinearSrgb(rgb: RGB): RGB {
  return multiplyMatrixVector(ACESCG_TO_LINEAR_SRGB, rgb);
}
