/**
 * RenderPreview - Shows the latest display frame at 1:1
 *
 * The canvas is never scaled down; frames larger than the preview area
 * scroll inside it.
 */

import { PREVIEW_MAX_HEIGHT, PREVIEW_MAX_WIDTH } from '../../config/UIConfig';
import type { DisplayFrame } from '../../render/FrameBuffer';
import { Logger } from '../../utils/Logger';
import type { UIControl } from '../UIControl';

const log = new Logger('RenderPreview');

export class RenderPreview implements UIControl {
  private container: HTMLElement;
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D | null = null;
  private frame: DisplayFrame | null = null;

  constructor() {
    this.container = document.createElement('div');
    this.container.dataset.testid = 'render-preview';
    this.container.style.cssText = `
      max-width: ${PREVIEW_MAX_WIDTH}px;
      max-height: ${PREVIEW_MAX_HEIGHT}px;
      overflow: auto;
      background: var(--viewer-bg);
      border: 1px solid var(--border-primary);
      border-radius: 4px;
    `;

    this.canvas = document.createElement('canvas');
    this.canvas.dataset.testid = 'render-preview-canvas';
    this.canvas.setAttribute('role', 'img');
    this.canvas.setAttribute('aria-label', 'Rendered image');
    this.canvas.style.cssText = `
      display: none;
      flex-shrink: 0;
    `;

    this.container.appendChild(this.canvas);
  }

  setImage(frame: DisplayFrame | null): void {
    if (frame === this.frame) return;
    this.frame = frame;

    if (!frame) {
      this.canvas.width = 0;
      this.canvas.height = 0;
      this.canvas.style.display = 'none';
      return;
    }

    this.canvas.width = frame.width;
    this.canvas.height = frame.height;
    this.canvas.style.width = `${frame.width}px`;
    this.canvas.style.height = `${frame.height}px`;
    this.canvas.style.display = 'block';

    const ctx = this.getContext();
    if (!ctx) {
      log.warn('2D canvas context unavailable, preview left blank');
      return;
    }
    const imageData = ctx.createImageData(frame.width, frame.height);
    imageData.data.set(frame.data);
    ctx.putImageData(imageData, 0, 0);
  }

  getImage(): DisplayFrame | null {
    return this.frame;
  }

  private getContext(): CanvasRenderingContext2D | null {
    if (!this.ctx) {
      this.ctx = this.canvas.getContext('2d');
    }
    return this.ctx;
  }

  getElement(): HTMLElement {
    return this.container;
  }

  render(): HTMLElement {
    return this.container;
  }

  dispose(): void {
    this.frame = null;
    this.ctx = null;
  }
}
