/**
 * ThemeManager Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DARK_THEME, applyDarkTheme } from './ThemeManager';

describe('ThemeManager', () => {
  afterEach(() => {
    document.documentElement.removeAttribute('style');
    delete document.documentElement.dataset.theme;
  });

  it('THEME-001: writes the dark palette as CSS custom properties', () => {
    const root = document.createElement('div');
    applyDarkTheme(root);
    expect(root.style.getPropertyValue('--bg-primary')).toBe('#1a1a1a');
    expect(root.style.getPropertyValue('--accent-primary')).toBe('#4a9eff');
    expect(root.style.getPropertyValue('--viewer-bg')).toBe('#1e1e1e');
    expect(root.dataset.theme).toBe('dark');
  });

  it('THEME-002: defaults to the document root', () => {
    applyDarkTheme();
    expect(document.documentElement.style.getPropertyValue('--error')).toBe(DARK_THEME.error);
    expect(document.documentElement.dataset.theme).toBe('dark');
  });

  it('THEME-003: sets every variable the components reference', () => {
    const root = document.createElement('div');
    applyDarkTheme(root);
    for (const variable of [
      '--bg-primary',
      '--bg-secondary',
      '--text-primary',
      '--text-muted',
      '--border-primary',
      '--accent-primary',
      '--accent-hover',
      '--success',
      '--error',
      '--viewer-bg',
    ]) {
      expect(root.style.getPropertyValue(variable)).not.toBe('');
    }
  });
});
