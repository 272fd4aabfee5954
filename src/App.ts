/**
 * App - Composition root
 *
 * Builds the single-column layout (preview, Render button, save row and
 * status line), forwards component events to the store as messages and
 * pushes every state change back into the components.
 */

import { PANEL_MAX_WIDTH, ROW_SPACING } from './config/UIConfig';
import { AppStore } from './core/AppStore';
import type { AppMessage, AppState } from './core/AppState';
import { DefaultAppTaskRunner } from './core/AppTasks';
import { AppError } from './core/errors';
import { RenderButton } from './ui/components/RenderButton';
import { RenderPreview } from './ui/components/RenderPreview';
import { SaveControl } from './ui/components/SaveControl';
import { StatusLine } from './ui/components/StatusLine';
import { Logger } from './utils/Logger';

const log = new Logger('App');

export class App {
  private readonly store: AppStore;
  private readonly preview = new RenderPreview();
  private readonly renderButton = new RenderButton();
  private readonly saveControl: SaveControl;
  private readonly statusLine = new StatusLine();
  private container: HTMLElement | null = null;
  private root: HTMLElement | null = null;
  private unsubscribers: Array<() => void> = [];

  constructor(store: AppStore = new AppStore(new DefaultAppTaskRunner())) {
    this.store = store;
    this.saveControl = new SaveControl(store.getState().fileName);
  }

  getStore(): AppStore {
    return this.store;
  }

  /**
   * Attach to the element matching `selector` and run the first render.
   *
   * @throws AppError if no element matches
   */
  async mount(selector: string): Promise<void> {
    this.container = document.querySelector<HTMLElement>(selector);
    if (!this.container) {
      throw new AppError(`Container not found: ${selector}`, 'MOUNT_ERROR');
    }

    this.createLayout(this.container);
    this.bindEvents();
    this.syncFromState(this.store.getState());

    log.info(`Mounted into ${selector}`);
    await this.store.initialize();
  }

  private createLayout(container: HTMLElement): void {
    const root = document.createElement('div');
    root.dataset.testid = 'app-root';
    root.style.cssText = `
      display: flex;
      flex-direction: column;
      align-items: center;
      gap: ${ROW_SPACING}px;
      max-width: ${PANEL_MAX_WIDTH}px;
      margin: 0 auto;
      padding: ${ROW_SPACING}px;
      background: var(--bg-primary);
      color: var(--text-primary);
      font-family: system-ui, sans-serif;
    `;

    const controls = document.createElement('div');
    controls.style.cssText = `
      display: flex;
      flex-direction: column;
      gap: ${ROW_SPACING}px;
      width: 100%;
    `;
    controls.appendChild(this.renderButton.getElement());
    controls.appendChild(this.saveControl.getElement());
    controls.appendChild(this.statusLine.getElement());

    root.appendChild(this.preview.getElement());
    root.appendChild(controls);
    container.appendChild(root);
    this.root = root;
  }

  private bindEvents(): void {
    this.unsubscribers.push(
      this.store.on('stateChanged', (state) => this.syncFromState(state)),
      this.renderButton.on('renderRequested', () => this.send({ type: 'renderPressed' })),
      this.saveControl.on('fileNameChanged', (fileName) => this.send({ type: 'fileNameChanged', fileName })),
      this.saveControl.on('saveRequested', () => this.send({ type: 'savePressed' }))
    );
  }

  private send(message: AppMessage): void {
    this.store.dispatch(message).catch((err) => {
      log.error(`Failed to handle ${message.type}:`, err);
    });
  }

  private syncFromState(state: AppState): void {
    const busy = state.status !== 'idle';
    this.preview.setImage(state.renderedImage);
    this.renderButton.setBusy(busy);
    this.saveControl.setBusy(busy);
    this.saveControl.setFileName(state.fileName);
    this.statusLine.update(state);
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];

    this.store.dispose();
    this.preview.dispose();
    this.renderButton.dispose();
    this.saveControl.dispose();
    this.statusLine.dispose();

    this.root?.remove();
    this.root = null;
    this.container = null;
  }
}
