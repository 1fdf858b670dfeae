export interface Theme {
  name: string;
  background: string;
  surface: string;
  text: string;
  muted: string;
  primary: string;
  accent: string;
  success: string;
  warning: string;
  error: string;
  border: string;
}

export const THEMES: readonly Theme[] = [
  {
    name: 'mocha',
    background: '#1e1e2e',
    surface: '#313244',
    text: '#cdd6f4',
    muted: '#7f849c',
    primary: '#89b4fa',
    accent: '#cba6f7',
    success: '#a6e3a1',
    warning: '#f9e2af',
    error: '#f38ba8',
    border: '#585b70',
  },
  {
    name: 'macchiato',
    background: '#24273a',
    surface: '#363a4f',
    text: '#cad3f5',
    muted: '#8087a2',
    primary: '#8aadf4',
    accent: '#c6a0f6',
    success: '#a6da95',
    warning: '#eed49f',
    error: '#ed8796',
    border: '#5b6078',
  },
  {
    name: 'frappe',
    background: '#303446',
    surface: '#414559',
    text: '#c6d0f5',
    muted: '#838ba7',
    primary: '#8caaee',
    accent: '#ca9ee6',
    success: '#a6d189',
    warning: '#e5c890',
    error: '#e78284',
    border: '#626880',
  },
  {
    name: 'latte',
    background: '#eff1f5',
    surface: '#ccd0da',
    text: '#4c4f69',
    muted: '#8c8fa1',
    primary: '#1e66f5',
    accent: '#8839ef',
    success: '#40a02b',
    warning: '#df8e1d',
    error: '#d20f39',
    border: '#acb0be',
  },
];

export const THEME_NAMES: readonly string[] = THEMES.map((t) => t.name);

export function findTheme(name: string): Theme | null {
  return THEMES.find((t) => t.name === name.trim().toLowerCase()) ?? null;
}

/** Unknown names fall back to the first palette. */
export function themeByName(name: string): Theme {
  const found = findTheme(name);
  if (found) return found;
  const [fallback] = THEMES;
  if (!fallback) throw new Error('No themes defined');
  return fallback;
}
