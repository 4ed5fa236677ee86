/**
 * Themes
 *
 * Colour tables live in data/themes.json; this module validates them once
 * and exposes lookup plus the CSS variables the dashboard page emits.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const ThemeColorsSchema = z.object({
  bg_black: z.string(),
  bg_darker: z.string(),
  bg_dark: z.string(),
  bg_panel: z.string(),
  bg_border: z.string(),
  primary: z.string(),
  primary_glow: z.string(),
  primary_dark: z.string(),
  secondary: z.string(),
  secondary_glow: z.string(),
  success: z.string(),
  warning: z.string(),
  error: z.string(),
  status_online: z.string(),
  status_offline: z.string(),
  text_primary: z.string(),
  text_secondary: z.string(),
  text_muted: z.string()
});

export type ThemeColors = z.infer<typeof ThemeColorsSchema>;

const ThemeSchema = z.object({
  name: z.string(),
  display_name: z.string(),
  colors: ThemeColorsSchema
});

export type Theme = z.infer<typeof ThemeSchema>;

const ThemeTableSchema = z.object({
  default: z.string(),
  aliases: z.record(z.string(), z.string()).default({}),
  themes: z.record(z.string(), ThemeSchema)
});

type ThemeTable = z.infer<typeof ThemeTableSchema>;

const THEMES_FILE = fileURLToPath(new URL('../../data/themes.json', import.meta.url));

let table: ThemeTable | null = null;

function loadThemes(): ThemeTable {
  if (table === null) {
    table = ThemeTableSchema.parse(JSON.parse(fs.readFileSync(THEMES_FILE, 'utf-8')));
  }
  return table;
}

function lookup(themes: ThemeTable, name: string): Theme | undefined {
  const key = Object.hasOwn(themes.aliases, name) ? themes.aliases[name] : name;
  return key !== undefined && Object.hasOwn(themes.themes, key) ? themes.themes[key] : undefined;
}

/**
 * Theme by name (aliases included); throws for unknown names
 */
export function getTheme(name: string): Theme {
  const themes = loadThemes();
  const theme = lookup(themes, name);
  if (!theme) {
    const available = [...Object.keys(themes.themes), ...Object.keys(themes.aliases)].join(', ');
    throw new ConfigurationError(`Unknown theme '${name}'. Available: ${available}`, { theme: name });
  }
  return theme;
}

/**
 * Theme by name, falling back to the default theme
 */
export function resolveTheme(name: string | undefined): Theme {
  const themes = loadThemes();
  if (name !== undefined) {
    const theme = lookup(themes, name);
    if (theme) {
      return theme;
    }
  }
  return getTheme(themes.default);
}

/**
 * Theme names, excluding legacy aliases
 */
export function listThemes(): string[] {
  return Object.keys(loadThemes().themes);
}

/**
 * "#ff1b8d" -> "255, 27, 141"
 */
export function hexToRgb(hex: string): string {
  const value = hex.replace(/^#/, '');
  if (!/^[0-9a-fA-F]{6}$/.test(value)) {
    throw new ConfigurationError(`Invalid hex colour: ${hex}`, { hex });
  }
  return [0, 2, 4].map(offset => parseInt(value.slice(offset, offset + 2), 16)).join(', ');
}

/**
 * CSS custom properties for every theme colour, plus an -rgb variant
 * for use inside rgba()
 */
export function themeCssVariables(theme: Theme): string {
  return Object.entries(theme.colors)
    .map(([key, hex]) => {
      const name = `--theme-${key.replace(/_/g, '-')}`;
      return `${name}: ${hex}; ${name}-rgb: ${hexToRgb(hex)};`;
    })
    .join('\n      ');
}
