/**
 * AppTasks - Asynchronous render and save work requested by the store
 *
 * Both tasks run on the main thread. `render` yields once before the
 * pass so the UI can paint the busy state first.
 */

import type { DisplayFrame } from '../render/FrameBuffer';
import { renderDisplayImage, type RenderOptions } from '../render/RenderPipeline';
import { Logger } from '../utils/Logger';
import { RenderError, SaveError, toAppError } from './errors';

export interface AppTaskRunner {
  render(): Promise<DisplayFrame>;
  /** Resolves with the path that was saved. */
  save(path: string, image: DisplayFrame | null): Promise<string>;
}

function nextTick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export class DefaultAppTaskRunner implements AppTaskRunner {
  constructor(
    private readonly renderOptions: RenderOptions = {},
    private readonly log: Logger = new Logger('AppTasks')
  ) {}

  async render(): Promise<DisplayFrame> {
    await nextTick();
    try {
      return renderDisplayImage(this.renderOptions);
    } catch (err) {
      throw toAppError(err, (detail) => new RenderError(`Render pass failed: ${detail}`));
    }
  }

  /**
   * Save stub: announces the write and resolves without touching disk.
   * Logged at warn so the notice survives the production log level.
   */
  async save(path: string, image: DisplayFrame | null): Promise<string> {
    if (!image) {
      throw new SaveError(path, 'nothing has been rendered yet');
    }
    this.log.warn(`Saving ${path} to disk..`);
    return path;
  }
}
