/**
 * Centralized rendering and color-processing constants.
 *
 * Frame buffer dimensions, channel layout, and the working-space luminance
 * coefficients shared by the synthesizer, tonemapper and display encoder.
 */

// ---------------------------------------------------------------------------
// Frame Buffer Layout
// ---------------------------------------------------------------------------

/** Width (px) of the procedurally rendered test image */
export const RENDER_BUFFER_WIDTH = 1024;

/** Height (px) of the procedurally rendered test image */
export const RENDER_BUFFER_HEIGHT = 1024;

/** Number of RGBA channels */
export const RGBA_CHANNELS = 4;

/** Largest 8-bit code value */
export const MAX_8BIT = 255;

// ---------------------------------------------------------------------------
// ACEScg (AP1) Luminance Coefficients
// ---------------------------------------------------------------------------

/** AP1 red luminance coefficient (Y row of the AP1 to XYZ matrix) */
export const AP1_LUMA_R = 0.2722287168;

/** AP1 green luminance coefficient */
export const AP1_LUMA_G = 0.6740817658;

/** AP1 blue luminance coefficient */
export const AP1_LUMA_B = 0.0536895174;

// ---------------------------------------------------------------------------
// Perceptual Tonemap Defaults
// ---------------------------------------------------------------------------

/** Default exposure offset in stops applied before tonemapping */
export const TONEMAP_DEFAULT_EXPOSURE = 0;

/** Default scene luminance that maps to display white */
export const TONEMAP_DEFAULT_WHITE_POINT = 16;
