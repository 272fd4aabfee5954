/**
 * Centralized UI-related constants.
 *
 * Window title, preview and panel sizing, and the file naming used by the
 * save control.
 */

// ---------------------------------------------------------------------------
// Window
// ---------------------------------------------------------------------------

/** Document title shown by the host window */
export const WINDOW_TITLE = 'Sample Render Image App';

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/** Maximum width (px) of the centered control column */
export const PANEL_MAX_WIDTH = 800;

/** Maximum width (px) of the rendered image viewport */
export const PREVIEW_MAX_WIDTH = 800;

/** Maximum height (px) of the rendered image viewport */
export const PREVIEW_MAX_HEIGHT = 512;

/** Spacing (px) used for row padding and gaps */
export const ROW_SPACING = 10;

/** Fixed width (px) of the save button */
export const SAVE_BUTTON_WIDTH = 100;

// ---------------------------------------------------------------------------
// Save
// ---------------------------------------------------------------------------

/** File name shown in the save field on startup */
export const DEFAULT_FILE_NAME = 'sample_file';

/** Extension appended to the file name on save */
export const SAVE_FILE_EXTENSION = '.exr';
