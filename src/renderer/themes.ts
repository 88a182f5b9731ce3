/**
 * Color themes
 * A theme only supplies colors; switching themes never changes geometry
 */

import type { ThemeName, ThemePalette } from '../core/types';

export const THEMES: Readonly<Record<ThemeName, Readonly<ThemePalette>>> = Object.freeze({
  light: Object.freeze({
    background: '#ffffff',
    primaryText: '#333333',
    secondaryText: '#555555',
    baseline: '#333333',
    connector: '#999999',
  }),
  dark: Object.freeze({
    background: '#222222',
    primaryText: '#eeeeee',
    secondaryText: '#aaaaaa',
    baseline: '#555555',
    connector: '#666666',
  }),
});

// Shared by both themes
export const MARKER_COLOR = '#4a6da7';
export const ANCHOR_COLOR = '#e74c3c';

/**
 * Pick the light or dark palette and apply any color overrides
 */
export function resolvePalette(darkMode: boolean, overrides: Partial<ThemePalette> = {}): ThemePalette {
  const base = THEMES[darkMode ? 'dark' : 'light'];
  return {
    background: overrides.background ?? base.background,
    primaryText: overrides.primaryText ?? base.primaryText,
    secondaryText: overrides.secondaryText ?? base.secondaryText,
    baseline: overrides.baseline ?? base.baseline,
    connector: overrides.connector ?? base.connector,
  };
}
