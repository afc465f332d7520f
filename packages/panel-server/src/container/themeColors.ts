import type { PanelConfig } from '@edgebar/shared';

export type Rgba = [number, number, number, number];

export const DEFAULT_DARK_BACKGROUND: Rgba = [0.106, 0.106, 0.11, 1];
export const DEFAULT_LIGHT_BACKGROUND: Rgba = [0.925, 0.925, 0.93, 1];

export interface ThemeColors {
  isDark: boolean;
  dark: Rgba;
  light: Rgba;
}

export function currentThemeColor(theme: ThemeColors): Rgba {
  return theme.isDark ? [...theme.dark] : [...theme.light];
}

/**
 * Background of a panel under the given theme. Alpha is always the panel opacity.
 */
export function deriveBackgroundColor(
  config: Pick<PanelConfig, 'background' | 'opacity'>,
  theme: ThemeColors,
): Rgba {
  const { background, opacity } = config;
  if (background === 'theme_default') {
    const [r, g, b] = currentThemeColor(theme);
    return [r, g, b, opacity];
  }
  if (background === 'dark') {
    const [r, g, b] = theme.dark;
    return [r, g, b, opacity];
  }
  if (background === 'light') {
    const [r, g, b] = theme.light;
    return [r, g, b, opacity];
  }
  const [r, g, b] = background.color;
  return [r, g, b, opacity];
}

/**
 * Whether a theme color change for `mode` affects a panel with this background.
 */
export function followsThemeColor(
  config: Pick<PanelConfig, 'background'>,
  mode: 'dark' | 'light',
  isDark: boolean,
): boolean {
  if (config.background === mode) {
    return true;
  }
  return config.background === 'theme_default' && isDark === (mode === 'dark');
}
