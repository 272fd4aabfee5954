/**
 * AppStore - Owns the application state and runs the commands it issues
 *
 * Messages go through the pure `update` reducer. A resulting command is
 * executed through the task runner and its outcome is fed back as a
 * completion or failure message. Every state change emits `stateChanged`.
 */

import { EventEmitter, type EventMap } from '../utils/EventEmitter';
import { Logger } from '../utils/Logger';
import {
  createInitialState,
  update,
  type AppCommand,
  type AppMessage,
  type AppState,
} from './AppState';
import type { AppTaskRunner } from './AppTasks';
import { RenderError, SaveError, toAppError } from './errors';
import type { ManagerBase } from './ManagerBase';

export interface AppStoreEvents extends EventMap {
  stateChanged: AppState;
}

const log = new Logger('AppStore');

export class AppStore extends EventEmitter<AppStoreEvents> implements ManagerBase {
  private state: AppState;
  private disposed = false;

  constructor(
    private readonly tasks: AppTaskRunner,
    initialState: AppState = createInitialState()
  ) {
    super();
    this.state = initialState;
  }

  getState(): AppState {
    return this.state;
  }

  /** Render once on startup so the preview is populated. */
  initialize(): Promise<void> {
    return this.dispatch({ type: 'renderPressed' });
  }

  /**
   * Apply a message. Resolves after the command it issued, if any, has
   * finished and its result has been applied. Never rejects for task
   * failures; those become failure messages.
   */
  async dispatch(message: AppMessage): Promise<void> {
    if (this.disposed) return;

    if (message.type === 'fileNameChanged') {
      log.debug(`File name changed to "${message.fileName}"`);
    }

    const { state, command } = update(this.state, message);
    this.setState(state);

    if (command) {
      const result = await this.execute(command);
      if (this.disposed) {
        log.debug(`Dropping ${result.type} after dispose`);
        return;
      }
      await this.dispatch(result);
    }
  }

  private async execute(command: AppCommand): Promise<AppMessage> {
    switch (command.type) {
      case 'render':
        try {
          const image = await this.tasks.render();
          return { type: 'renderCompleted', image };
        } catch (err) {
          const error = toAppError(err, (detail) => new RenderError(`Render pass failed: ${detail}`));
          log.error('Render failed:', error);
          return { type: 'renderFailed', error };
        }

      case 'save':
        try {
          const path = await this.tasks.save(command.path, command.image);
          return { type: 'saveCompleted', path };
        } catch (err) {
          const error = toAppError(err, (detail) => new SaveError(command.path, detail));
          log.error('Save failed:', error);
          return { type: 'saveFailed', error };
        }
    }
  }

  private setState(next: AppState): void {
    if (next === this.state) return;
    this.state = next;
    this.emit('stateChanged', next);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.removeAllListeners();
  }
}
