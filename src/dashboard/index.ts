/**
 * Terminal dashboard for load scenarios.
 *
 * @module dashboard
 */

export { DashboardReporter } from './dashboard.js';
export { renderRates, renderScenario, renderSummary } from './render.js';
export {
  type DashboardConfig,
  type DashboardOptions,
  type DashboardTheme,
  type ThemeName,
  type EventSeverity,
  DEFAULT_CONFIG,
  DARK_THEME,
  LIGHT_THEME,
  getTheme,
} from './types.js';
