import { describe, it, expect } from 'vitest';

// Import from centralized config barrel
import {
  // RenderConfig
  RENDER_BUFFER_WIDTH,
  RENDER_BUFFER_HEIGHT,
  RGBA_CHANNELS,
  MAX_8BIT,
  AP1_LUMA_R,
  AP1_LUMA_G,
  AP1_LUMA_B,
  TONEMAP_DEFAULT_EXPOSURE,
  TONEMAP_DEFAULT_WHITE_POINT,
  // UIConfig
  WINDOW_TITLE,
  PANEL_MAX_WIDTH,
  PREVIEW_MAX_WIDTH,
  PREVIEW_MAX_HEIGHT,
  SAVE_BUTTON_WIDTH,
  DEFAULT_FILE_NAME,
  SAVE_FILE_EXTENSION,
  // ImageLimits
  IMAGE_LIMITS,
} from './index';

// ============================================================================
// RenderConfig
// ============================================================================

describe('RenderConfig', () => {
  it('render buffer is 1024 x 1024', () => {
    expect(RENDER_BUFFER_WIDTH).toBe(1024);
    expect(RENDER_BUFFER_HEIGHT).toBe(1024);
  });

  it('channel counts describe RGBA and RGB layouts', () => {
    expect(RGBA_CHANNELS).toBe(4);
    expect(MAX_8BIT).toBe(255);
  });

  it('AP1 luminance coefficients sum to 1', () => {
    expect(AP1_LUMA_R + AP1_LUMA_G + AP1_LUMA_B).toBeCloseTo(1, 9);
  });

  it('tonemap defaults are neutral exposure and a positive white point', () => {
    expect(TONEMAP_DEFAULT_EXPOSURE).toBe(0);
    expect(TONEMAP_DEFAULT_WHITE_POINT).toBe(16);
  });
});

// ============================================================================
// UIConfig
// ============================================================================

describe('UIConfig', () => {
  it('window title', () => {
    expect(WINDOW_TITLE).toBe('Sample Render Image App');
  });

  it('preview fits inside the panel', () => {
    expect(PREVIEW_MAX_WIDTH).toBeLessThanOrEqual(PANEL_MAX_WIDTH);
    expect(PREVIEW_MAX_HEIGHT).toBe(512);
    expect(SAVE_BUTTON_WIDTH).toBe(100);
  });

  it('default file name and extension', () => {
    expect(DEFAULT_FILE_NAME).toBe('sample_file');
    expect(SAVE_FILE_EXTENSION).toBe('.exr');
  });
});

// ============================================================================
// ImageLimits
// ============================================================================

describe('ImageLimits via barrel', () => {
  it('is re-exported', () => {
    expect(IMAGE_LIMITS.MAX_DIMENSION).toBe(16384);
  });
});
