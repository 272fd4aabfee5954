/**
 * RenderPipeline - One render pass from synthesis to display frame
 *
 * The scene-linear frame only lives for the duration of the pass; the
 * caller receives the encoded display frame.
 */

import { RENDER_BUFFER_HEIGHT, RENDER_BUFFER_WIDTH } from '../config/RenderConfig';
import { RenderError, toAppError } from '../core/errors';
import {
  DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS,
  type PerceptualTonemapperParams,
} from '../color/PerceptualTonemapper';
import { Logger } from '../utils/Logger';
import { encodeToDisplay } from './DisplayEncoder';
import type { DisplayFrame } from './FrameBuffer';
import { synthesizeGradient } from './ImageSynthesizer';

const log = new Logger('RenderPipeline');

export interface RenderOptions {
  width?: number;
  height?: number;
  tonemap?: PerceptualTonemapperParams;
}

/**
 * Synthesize the gradient and encode it for display.
 *
 * @throws ValidationError for invalid dimensions or tonemap parameters
 * @throws RenderError for any other failure during the pass
 */
export function renderDisplayImage(options: RenderOptions = {}): DisplayFrame {
  const width = options.width ?? RENDER_BUFFER_WIDTH;
  const height = options.height ?? RENDER_BUFFER_HEIGHT;
  const tonemap = options.tonemap ?? DEFAULT_PERCEPTUAL_TONEMAPPER_PARAMS;

  try {
    const stopTotal = log.time(`render ${width}x${height}`);

    const stopSynth = log.time('synthesize');
    const scene = synthesizeGradient(width, height);
    stopSynth();

    const stopEncode = log.time('encode');
    const display = encodeToDisplay(scene, tonemap);
    stopEncode();

    stopTotal();
    return display;
  } catch (err) {
    throw toAppError(err, (detail) => new RenderError(`Render pass failed: ${detail}`));
  }
}
