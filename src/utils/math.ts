/**
 * Shared math utility functions.
 *
 * These are pure functions with zero external dependencies apart from the
 * error types, safe for use in any rendering context.
 */

import { ValidationError } from '../core/errors';

/**
 * Clamp a numeric value to the inclusive range [min, max].
 *
 * Replaces the common pattern `Math.max(min, Math.min(max, value))`.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Linear interpolation: `a + t * (b - a)`. `t` is not clamped.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a);
}

/**
 * Affine remap of `x` from [inMin, inMax] into [outMin, outMax].
 *
 * No clamping is applied, so values outside the input range extrapolate
 * linearly. The input range must not be empty.
 *
 * @throws ValidationError when `inMin === inMax` (the remap would divide by zero)
 */
export function fitRange(
  x: number,
  inMin: number,
  inMax: number,
  outMin: number,
  outMax: number
): number {
  if (inMin === inMax) {
    throw new ValidationError(`fitRange: empty input range [${inMin}, ${inMax}]`);
  }
  return ((outMax - outMin) * (x - inMin)) / (inMax - inMin) + outMin;
}
