/**
 * FrameBuffer - Flat RGBA pixel buffers
 *
 * Both buffers are row-major with four interleaved channels per pixel and
 * row 0 at the top. The scene-linear frame is transient; the display frame
 * is what the application keeps and presents.
 */

import { IMAGE_LIMITS } from '../config/ImageLimits';
import { RGBA_CHANNELS } from '../config/RenderConfig';
import { ValidationError } from '../core/errors';

/** Floating-point ACEScg RGBA frame, values unbounded above 1.0 */
export interface SceneLinearFrame {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
}

/** 8-bit gamma-encoded sRGB RGBA frame, ready for ImageData */
export interface DisplayFrame {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

/**
 * Validate frame dimensions against IMAGE_LIMITS.
 *
 * @throws ValidationError if dimensions are not integers or exceed limits
 */
export function validateFrameDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new ValidationError(`Frame dimensions must be integers: ${width}x${height}`);
  }
  if (width < IMAGE_LIMITS.MIN_DIMENSION || height < IMAGE_LIMITS.MIN_DIMENSION) {
    throw new ValidationError(`Invalid frame dimensions: ${width}x${height}`);
  }
  if (width > IMAGE_LIMITS.MAX_DIMENSION || height > IMAGE_LIMITS.MAX_DIMENSION) {
    throw new ValidationError(
      `Frame dimensions ${width}x${height} exceed maximum of ${IMAGE_LIMITS.MAX_DIMENSION}x${IMAGE_LIMITS.MAX_DIMENSION}`
    );
  }
  const totalPixels = width * height;
  if (totalPixels > IMAGE_LIMITS.MAX_PIXELS) {
    throw new ValidationError(
      `Frame has ${totalPixels} pixels, exceeding maximum of ${IMAGE_LIMITS.MAX_PIXELS}`
    );
  }
}

export function createSceneLinearFrame(width: number, height: number): SceneLinearFrame {
  validateFrameDimensions(width, height);
  return { width, height, data: new Float32Array(width * height * RGBA_CHANNELS) };
}

export function createDisplayFrame(width: number, height: number): DisplayFrame {
  validateFrameDimensions(width, height);
  return { width, height, data: new Uint8ClampedArray(width * height * RGBA_CHANNELS) };
}

/**
 * Index of the red channel of the pixel at column `x`, buffer row `row`.
 */
export function pixelOffset(frame: { readonly width: number }, x: number, row: number): number {
  return (row * frame.width + x) * RGBA_CHANNELS;
}

/**
 * Read one RGBA pixel as a plain array (tests and pixel readouts).
 */
export function readPixel(
  frame: SceneLinearFrame | DisplayFrame,
  x: number,
  row: number
): [number, number, number, number] {
  const i = pixelOffset(frame, x, row);
  return [frame.data[i], frame.data[i + 1], frame.data[i + 2], frame.data[i + 3]];
}
