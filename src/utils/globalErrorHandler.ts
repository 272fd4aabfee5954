import { Logger } from './Logger';

const log = new Logger('GlobalErrorHandler');

let installed = false;

const onUnhandledRejection = (event: PromiseRejectionEvent): void => {
  log.error('Unhandled promise rejection:', event.reason);
};

const onError = (event: ErrorEvent): void => {
  log.error('Uncaught error:', event.error ?? event.message);
};

/**
 * Install global listeners for uncaught errors and unhandled promise rejections.
 * Called once at startup from main.ts.
 */
export function installGlobalErrorHandler(): void {
  if (installed || typeof window === 'undefined') return;
  installed = true;

  // No preventDefault(): the browser's own console entry keeps the source-mapped stack.
  window.addEventListener('unhandledrejection', onUnhandledRejection);
  window.addEventListener('error', onError);
}

/** @internal - exposed for testing only */
export function _resetForTesting(): void {
  if (installed && typeof window !== 'undefined') {
    window.removeEventListener('unhandledrejection', onUnhandledRejection);
    window.removeEventListener('error', onError);
  }
  installed = false;
}
