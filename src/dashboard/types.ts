/**
 * Dashboard type definitions.
 *
 * Defines configuration options and themes for the terminal dashboard.
 */

/**
 * Dashboard color theme configuration.
 */
export interface DashboardTheme {
  /** Primary accent color for borders and highlights */
  readonly primary: string;
  /** Color for rates and healthy states */
  readonly success: string;
  /** Color for warnings */
  readonly warning: string;
  /** Color for errors */
  readonly error: string;
  /** Default text color */
  readonly text: string;
  /** Muted text color for secondary information */
  readonly textMuted: string;
  /** Background color */
  readonly background: string;
}

/**
 * Available color themes.
 */
export type ThemeName = 'dark' | 'light';

/**
 * Dashboard configuration options.
 */
export interface DashboardConfig {
  /**
   * Maximum number of lines kept in the event log.
   * @default 200
   */
  readonly maxEventLogSize: number;

  /**
   * Color theme to use.
   * @default 'dark'
   */
  readonly theme: ThemeName;

  /**
   * Called when the user presses q, Escape or Ctrl+C.
   */
  readonly onQuit: () => void;

  /**
   * Receives the run summary once the screen is gone.
   * @default prints to stdout
   */
  readonly onSummary: (summary: string) => void;
}

/**
 * Partial configuration options for user customization.
 */
export type DashboardOptions = Partial<DashboardConfig>;

export type EventSeverity = 'info' | 'success' | 'warning' | 'error';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: DashboardConfig = {
  maxEventLogSize: 200,
  theme: 'dark',
  onQuit: () => undefined,
  onSummary: (summary) => console.log(summary),
};

/**
 * Dark theme color palette.
 */
export const DARK_THEME: DashboardTheme = {
  primary: 'cyan',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'white',
  textMuted: 'gray',
  background: 'black',
} as const;

/**
 * Light theme color palette.
 */
export const LIGHT_THEME: DashboardTheme = {
  primary: 'blue',
  success: 'green',
  warning: 'yellow',
  error: 'red',
  text: 'black',
  textMuted: 'gray',
  background: 'white',
} as const;

/**
 * Get theme configuration by name.
 */
export function getTheme(name: ThemeName): DashboardTheme {
  return name === 'dark' ? DARK_THEME : LIGHT_THEME;
}
