/**
 * ImageSynthesizer - Procedural scene-linear test image
 *
 * Renders a two-axis gradient in ACEScg: red to green across, red to blue
 * from bottom to top, the two blended half and half.
 */

import { RENDER_BUFFER_WIDTH, RENDER_BUFFER_HEIGHT } from '../config/RenderConfig';
import { ACESCG_BLUE, ACESCG_GREEN, ACESCG_RED, blend, type SceneColor } from '../color/SceneColor';
import { fitRange } from '../utils/math';
import { createSceneLinearFrame, type SceneLinearFrame } from './FrameBuffer';

/**
 * Gradient color at normalized coordinates (u, v), origin bottom-left.
 * Equal to ((2 - u - v) / 2, u / 2, v / 2).
 */
export function gradientColor(u: number, v: number): SceneColor {
  const horizontal = blend(ACESCG_RED, ACESCG_GREEN, u);
  const vertical = blend(ACESCG_RED, ACESCG_BLUE, v);
  return blend(horizontal, vertical, 0.5);
}

/**
 * Render the gradient into a fully populated scene-linear frame.
 *
 * Buffer rows are written top to bottom while y runs from height - 1 down
 * to 0, so buffer row r carries v = (height - 1 - r) / height.
 * Alpha is always 1.
 */
export function synthesizeGradient(
  width: number = RENDER_BUFFER_WIDTH,
  height: number = RENDER_BUFFER_HEIGHT
): SceneLinearFrame {
  const frame = createSceneLinearFrame(width, height);
  const data = frame.data;

  let index = 0;
  for (let y = height - 1; y >= 0; y--) {
    const v = fitRange(y, 0, height, 0, 1);
    for (let x = 0; x < width; x++) {
      const u = fitRange(x, 0, width, 0, 1);
      const color = gradientColor(u, v);

      data[index] = color.r;
      data[index + 1] = color.g;
      data[index + 2] = color.b;
      data[index + 3] = 1.0;
      index += 4;
    }
  }

  return frame;
}
