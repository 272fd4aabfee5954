/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** Overrides the default log level: `debug`, `info`, `warn` or `error`. */
  readonly VITE_LOG_LEVEL?: string;
}
