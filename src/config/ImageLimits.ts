/**
 * Centralized frame buffer dimension limits.
 *
 * Frame allocation rejects dimensions outside these bounds before any
 * typed array is created.
 */
export const IMAGE_LIMITS = {
  /** Smallest allowed value for image width or height */
  MIN_DIMENSION: 1,
  /** Maximum value for image width or height (16384 pixels) */
  MAX_DIMENSION: 16384,
  /** Maximum total pixel count (64 megapixels) */
  MAX_PIXELS: 67108864,
} as const;
