import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import type { UIControl } from '../UIControl';

export interface RenderButtonEvents extends EventMap {
  renderRequested: void;
}

export class RenderButton extends EventEmitter<RenderButtonEvents> implements UIControl {
  private button: HTMLButtonElement;
  private disposed = false;

  constructor() {
    super();

    this.button = document.createElement('button');
    this.button.type = 'button';
    this.button.dataset.testid = 'render-button';
    this.button.textContent = 'Render';
    this.button.setAttribute('aria-label', 'Render image');
    this.button.style.cssText = `
      width: 100%;
      background: var(--accent-primary);
      border: 1px solid var(--accent-primary);
      color: #ffffff;
      padding: 8px 12px;
      border-radius: 4px;
      cursor: pointer;
      font-size: 13px;
      transition: all 0.12s ease;
    `;

    this.button.addEventListener('click', this.handleClick);
    this.button.addEventListener('mouseenter', this.handleMouseEnter);
    this.button.addEventListener('mouseleave', this.handleMouseLeave);
  }

  private handleClick = (): void => {
    if (this.button.disabled) return;
    this.emit('renderRequested', undefined);
  };

  private handleMouseEnter = (): void => {
    if (!this.button.disabled) {
      this.button.style.background = 'var(--accent-hover)';
    }
  };

  private handleMouseLeave = (): void => {
    this.button.style.background = 'var(--accent-primary)';
  };

  /** Disabled while a render is in flight. */
  setBusy(busy: boolean): void {
    this.button.disabled = busy;
    this.button.setAttribute('aria-busy', String(busy));
    this.button.style.cursor = busy ? 'progress' : 'pointer';
    this.button.style.opacity = busy ? '0.6' : '1';
  }

  isBusy(): boolean {
    return this.button.disabled;
  }

  getElement(): HTMLElement {
    return this.button;
  }

  render(): HTMLElement {
    return this.button;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.button.removeEventListener('click', this.handleClick);
    this.button.removeEventListener('mouseenter', this.handleMouseEnter);
    this.button.removeEventListener('mouseleave', this.handleMouseLeave);
    this.removeAllListeners();
  }
}
