/**
 * Home Dashboard
 *
 * Self-hosted status dashboard that streams or polls widget data sources and
 * pushes rendered fragments to every connected browser.
 *
 * @module home-dashboard
 */

// Core types
export * from './types/index.js';

// Refresh engine
export {
  RefreshDriver,
  probeUpdateStream,
  type RefreshDriverOptions,
  Broadcaster,
  type BroadcasterOptions
} from './engine/index.js';

// Supervision
export {
  ConnectionRegistry,
  type Session,
  WidgetSupervisor,
  type WidgetSupervisorOptions
} from './supervisor/index.js';

// Configuration
export * from './config/index.js';

// Integrations
export * from './integrations/index.js';

// Themes
export {
  getTheme,
  resolveTheme,
  listThemes,
  hexToRgb,
  themeCssVariables,
  type Theme,
  type ThemeColors
} from './themes/index.js';

// Transport
export * from './dashboard/index.js';

// Utilities
export * from './utils/errors.js';
export { createLogger, silentLogger, isLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { escapeHtml } from './utils/html.js';
