/**
 * ImageLimits config - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { IMAGE_LIMITS } from './ImageLimits';

describe('IMAGE_LIMITS', () => {
  it('IL-U001: MIN_DIMENSION should be 1', () => {
    expect(IMAGE_LIMITS.MIN_DIMENSION).toBe(1);
  });

  it('IL-U002: MAX_DIMENSION should be 16384', () => {
    expect(IMAGE_LIMITS.MAX_DIMENSION).toBe(16384);
  });

  it('IL-U003: MAX_PIXELS should be 67108864 (64 megapixels)', () => {
    expect(IMAGE_LIMITS.MAX_PIXELS).toBe(67108864);
  });

  it('IL-U004: default render buffer fits within the limits', () => {
    expect(1024 * 1024).toBeLessThanOrEqual(IMAGE_LIMITS.MAX_PIXELS);
    expect(IMAGE_LIMITS.MAX_PIXELS).toBeGreaterThan(IMAGE_LIMITS.MAX_DIMENSION);
  });
});
