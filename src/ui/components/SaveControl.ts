/**
 * SaveControl - File name field and Save button on one row
 */

import { ROW_SPACING, SAVE_BUTTON_WIDTH } from '../../config/UIConfig';
import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import type { UIControl } from '../UIControl';

export interface SaveControlEvents extends EventMap {
  fileNameChanged: string;
  saveRequested: void;
}

export class SaveControl extends EventEmitter<SaveControlEvents> implements UIControl {
  private container: HTMLElement;
  private input: HTMLInputElement;
  private button: HTMLButtonElement;
  private disposed = false;

  constructor(initialFileName = '') {
    super();

    this.container = document.createElement('div');
    this.container.dataset.testid = 'save-control';
    this.container.style.cssText = `
      display: flex;
      align-items: center;
      gap: ${ROW_SPACING}px;
    `;

    this.input = document.createElement('input');
    this.input.type = 'text';
    this.input.dataset.testid = 'save-file-name';
    this.input.placeholder = 'Your file name';
    this.input.value = initialFileName;
    this.input.setAttribute('aria-label', 'File name');
    this.input.style.cssText = `
      flex: 1;
      min-width: 0;
      background: var(--bg-secondary);
      border: 1px solid var(--border-primary);
      color: var(--text-primary);
      padding: 6px 8px;
      border-radius: 4px;
      font-size: 13px;
    `;

    this.button = document.createElement('button');
    this.button.type = 'button';
    this.button.dataset.testid = 'save-button';
    this.button.textContent = 'Save';
    this.button.style.cssText = `
      width: ${SAVE_BUTTON_WIDTH}px;
      flex-shrink: 0;
      background: var(--bg-secondary);
      border: 1px solid var(--border-primary);
      color: var(--text-primary);
      padding: 6px 10px;
      border-radius: 4px;
      cursor: pointer;
      font-size: 13px;
    `;

    this.input.addEventListener('input', this.handleInput);
    this.input.addEventListener('keydown', this.handleKeyDown);
    this.button.addEventListener('click', this.handleClick);

    this.container.appendChild(this.input);
    this.container.appendChild(this.button);
  }

  private handleInput = (): void => {
    this.emit('fileNameChanged', this.input.value);
  };

  private handleKeyDown = (e: KeyboardEvent): void => {
    if (e.key === 'Enter') {
      e.preventDefault();
      this.requestSave();
    }
  };

  private handleClick = (): void => {
    this.requestSave();
  };

  private requestSave(): void {
    if (this.button.disabled) return;
    this.emit('saveRequested', undefined);
  }

  /** Update the field without emitting fileNameChanged. */
  setFileName(fileName: string): void {
    if (this.input.value !== fileName) {
      this.input.value = fileName;
    }
  }

  getFileName(): string {
    return this.input.value;
  }

  setBusy(busy: boolean): void {
    this.button.disabled = busy;
    this.button.setAttribute('aria-busy', String(busy));
    this.button.style.cursor = busy ? 'progress' : 'pointer';
  }

  getElement(): HTMLElement {
    return this.container;
  }

  render(): HTMLElement {
    return this.container;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.input.removeEventListener('input', this.handleInput);
    this.input.removeEventListener('keydown', this.handleKeyDown);
    this.button.removeEventListener('click', this.handleClick);
    this.removeAllListeners();
  }
}
