import { ConfigError } from '@cloudctl/shared';
import type { Color } from './widgets.js';

export const THEME_NAMES = ['default', 'dark'] as const;

export type ThemeName = (typeof THEME_NAMES)[number];

/**
 * Colors for one terminal background. Built once at startup and handed to
 * the terminal, which styles every widget it creates with it.
 */
export interface DashboardTheme {
  readonly name: ThemeName;
  readonly description: string;
  readonly text: Color;
  readonly border: Color;
  readonly bar: Color;
  readonly barLabel: Color;
  readonly barNumber: Color;
  readonly gauge: Color;
  readonly gaugeLabel: Color;
  readonly activeTab: Color;
  readonly inactiveTab: Color;
}

export const THEMES: Readonly<Record<ThemeName, DashboardTheme>> = {
  default: {
    name: 'default',
    description: 'with bright fonts, optimized for dark terminal backgrounds',
    text: 'white',
    border: 'white',
    bar: 'cyan',
    barLabel: 'white',
    barNumber: 'white',
    gauge: 'white',
    gaugeLabel: 'white',
    activeTab: 'yellow',
    inactiveTab: 'white',
  },
  dark: {
    name: 'dark',
    description: 'with dark fonts, optimized for bright terminal backgrounds',
    text: 'black',
    border: 'black',
    bar: 'blue',
    barLabel: 'black',
    barNumber: 'black',
    gauge: 'black',
    gaugeLabel: 'black',
    activeTab: 'yellow',
    inactiveTab: 'black',
  },
};

function isThemeName(name: string): name is ThemeName {
  return (THEME_NAMES as readonly string[]).includes(name);
}

export function resolveTheme(name: string): DashboardTheme {
  if (!isThemeName(name)) {
    throw new ConfigError(`unknown theme: ${name}`, { available: [...THEME_NAMES] });
  }
  return THEMES[name];
}
