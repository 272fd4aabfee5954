/**
 * Configuration barrel export.
 *
 * Re-exports every centralized constant so consumers can import from
 * `src/config` (or a relative path to this directory) instead of
 * reaching into individual config modules.
 */

export * from './ImageLimits';
export * from './RenderConfig';
export * from './UIConfig';
