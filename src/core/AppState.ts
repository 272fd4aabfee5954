/**
 * AppState - Immutable application state and its reducer
 *
 * UI events and task outcomes arrive as tagged messages. `update` is pure:
 * it returns the next state and at most one command for the store to run.
 * Render and save are only accepted while idle.
 */

import { DEFAULT_FILE_NAME, SAVE_FILE_EXTENSION } from '../config/UIConfig';
import type { DisplayFrame } from '../render/FrameBuffer';
import type { AppError } from './errors';

export type AppStatus = 'idle' | 'rendering' | 'saving';

export interface AppState {
  readonly fileName: string;
  readonly fileNameWithExt: string;
  /** Replaced wholesale on each render, never mutated */
  readonly renderedImage: DisplayFrame | null;
  readonly status: AppStatus;
  readonly lastError: string | null;
  readonly lastSavedPath: string | null;
}

export type AppMessage =
  | { readonly type: 'fileNameChanged'; readonly fileName: string }
  | { readonly type: 'renderPressed' }
  | { readonly type: 'renderCompleted'; readonly image: DisplayFrame }
  | { readonly type: 'renderFailed'; readonly error: AppError }
  | { readonly type: 'savePressed' }
  | { readonly type: 'saveCompleted'; readonly path: string }
  | { readonly type: 'saveFailed'; readonly error: AppError };

export type AppCommand =
  | { readonly type: 'render' }
  | { readonly type: 'save'; readonly path: string; readonly image: DisplayFrame | null };

export interface UpdateResult {
  readonly state: AppState;
  readonly command: AppCommand | null;
}

export function withSaveExtension(fileName: string): string {
  return `${fileName}${SAVE_FILE_EXTENSION}`;
}

export function createInitialState(fileName: string = DEFAULT_FILE_NAME): AppState {
  return {
    fileName,
    fileNameWithExt: withSaveExtension(fileName),
    renderedImage: null,
    status: 'idle',
    lastError: null,
    lastSavedPath: null,
  };
}

function unchanged(state: AppState): UpdateResult {
  return { state, command: null };
}

export function update(state: AppState, message: AppMessage): UpdateResult {
  switch (message.type) {
    case 'fileNameChanged':
      return unchanged({
        ...state,
        fileName: message.fileName,
        fileNameWithExt: withSaveExtension(message.fileName),
      });

    case 'renderPressed':
      if (state.status !== 'idle') return unchanged(state);
      return {
        state: { ...state, status: 'rendering', lastError: null },
        command: { type: 'render' },
      };

    case 'renderCompleted':
      return unchanged({ ...state, renderedImage: message.image, status: 'idle', lastError: null });

    case 'renderFailed':
      return unchanged({ ...state, status: 'idle', lastError: message.error.message });

    case 'savePressed':
      if (state.status !== 'idle') return unchanged(state);
      if (state.fileName.trim() === '') {
        return unchanged({ ...state, lastError: 'Enter a file name before saving' });
      }
      return {
        state: { ...state, status: 'saving', lastError: null },
        command: { type: 'save', path: state.fileNameWithExt, image: state.renderedImage },
      };

    case 'saveCompleted':
      return unchanged({ ...state, status: 'idle', lastSavedPath: message.path, lastError: null });

    case 'saveFailed':
      return unchanged({ ...state, status: 'idle', lastError: message.error.message });
  }
}
