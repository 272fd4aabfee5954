/**
 * ThemeManager - Applies the application color palette
 *
 * The palette is written as CSS custom properties on the document root;
 * components only reference the variables.
 */

export interface ThemeColors {
  // Background colors
  bgPrimary: string;
  bgSecondary: string;

  // Text colors
  textPrimary: string;
  textMuted: string;

  borderPrimary: string;

  // Accent colors
  accentPrimary: string;
  accentHover: string;

  // Semantic colors
  success: string;
  error: string;

  // Preview backdrop
  viewerBg: string;
}

export const DARK_THEME: Readonly<ThemeColors> = Object.freeze({
  bgPrimary: '#1a1a1a',
  bgSecondary: '#252525',

  textPrimary: '#e0e0e0',
  textMuted: '#666666',

  borderPrimary: '#444444',

  accentPrimary: '#4a9eff',
  accentHover: '#5aafff',

  success: '#4ade80',
  error: '#f87171',

  viewerBg: '#1e1e1e',
});

const CSS_VARIABLES: ReadonlyArray<readonly [keyof ThemeColors, string]> = [
  ['bgPrimary', '--bg-primary'],
  ['bgSecondary', '--bg-secondary'],
  ['textPrimary', '--text-primary'],
  ['textMuted', '--text-muted'],
  ['borderPrimary', '--border-primary'],
  ['accentPrimary', '--accent-primary'],
  ['accentHover', '--accent-hover'],
  ['success', '--success'],
  ['error', '--error'],
  ['viewerBg', '--viewer-bg'],
];

/**
 * Write the dark palette onto `root` as CSS custom properties.
 */
export function applyDarkTheme(root: HTMLElement = document.documentElement): void {
  for (const [key, variable] of CSS_VARIABLES) {
    root.style.setProperty(variable, DARK_THEME[key]);
  }
  root.dataset.theme = 'dark';
}
