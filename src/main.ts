import { App } from './App';
import { WINDOW_TITLE } from './config';
import { installGlobalErrorHandler } from './utils/globalErrorHandler';
import { Logger } from './utils/Logger';
import { applyDarkTheme } from './utils/ThemeManager';

const log = new Logger('main');

installGlobalErrorHandler();
applyDarkTheme();
document.title = WINDOW_TITLE;

const app = new App();

// Startup failure is unrecoverable: log it, then let it reach the global handler.
app.mount('#app').catch((err: unknown) => {
  log.error('Failed to start application:', err);
  app.dispose();
  throw err;
});
