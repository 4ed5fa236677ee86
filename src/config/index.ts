/**
 * Configuration Module
 *
 * Server settings from the environment and the dashboard config files.
 */

export {
  type ServerConfig,
  loadServerConfig,
  validateServerConfig,
  getDefaultServerConfig,
  createServerConfig
} from './server.js';

export { ConfigLoader, CONFIG_FILE, CREDENTIALS_FILE } from './ConfigLoader.js';

export {
  type AppConfig,
  type Credentials,
  type DashboardSettings,
  type LayoutConfig,
  type WidgetConfig,
  type WidgetPosition,
  AppConfigSchema,
  CredentialsSchema,
  DashboardSettingsSchema,
  LayoutConfigSchema,
  WidgetConfigSchema
} from './schema.js';
