/**
 * SceneColor - Scene-linear colors in the ACEScg working space
 *
 * Values are linear light and unbounded above 1.0. Blending happens here,
 * before any display encoding, so gradients carry no gamma artifacts.
 */

import { lerp } from '../utils/math';

export interface SceneColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export function acescg(r: number, g: number, b: number): SceneColor {
  return { r, g, b };
}

/** AP1 red primary */
export const ACESCG_RED: SceneColor = Object.freeze(acescg(1, 0, 0));

/** AP1 green primary */
export const ACESCG_GREEN: SceneColor = Object.freeze(acescg(0, 1, 0));

/** AP1 blue primary */
export const ACESCG_BLUE: SceneColor = Object.freeze(acescg(0, 0, 1));

/**
 * Componentwise linear interpolation `a + t * (b - a)` in the working space.
 * `t` is not clamped.
 */
export function blend(a: SceneColor, b: SceneColor, t: number): SceneColor {
  return acescg(lerp(a.r, b.r, t), lerp(a.g, b.g, t), lerp(a.b, b.b, t));
}
