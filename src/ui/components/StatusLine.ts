import type { AppState } from '../../core/AppState';
import type { UIControl } from '../UIControl';

export type StatusTone = 'muted' | 'success' | 'error';

export interface StatusDescription {
  text: string;
  tone: StatusTone;
}

const TONE_COLORS: Record<StatusTone, string> = {
  muted: 'var(--text-muted)',
  success: 'var(--success)',
  error: 'var(--error)',
};

/**
 * Busy states take precedence, then the last error, then the last save.
 * Saving writes no file yet, so a completed save reads "Would save".
 */
export function describeStatus(state: AppState): StatusDescription {
  if (state.status === 'rendering') return { text: 'Rendering…', tone: 'muted' };
  if (state.status === 'saving') return { text: 'Saving…', tone: 'muted' };
  if (state.lastError) return { text: state.lastError, tone: 'error' };
  if (state.lastSavedPath) return { text: `Would save ${state.lastSavedPath}`, tone: 'success' };
  return { text: '', tone: 'muted' };
}

export class StatusLine implements UIControl {
  private element: HTMLElement;

  constructor() {
    this.element = document.createElement('div');
    this.element.dataset.testid = 'status-line';
    this.element.setAttribute('role', 'status');
    this.element.setAttribute('aria-live', 'polite');
    this.element.style.cssText = `
      min-height: 16px;
      font-size: 12px;
      color: var(--text-muted);
    `;
  }

  update(state: AppState): void {
    const { text, tone } = describeStatus(state);
    this.element.textContent = text;
    this.element.style.color = TONE_COLORS[tone];
    this.element.dataset.tone = tone;
  }

  getElement(): HTMLElement {
    return this.element;
  }

  render(): HTMLElement {
    return this.element;
  }

  dispose(): void {
    this.element.textContent = '';
  }
}
