/**
 * Config Loader
 *
 * Reads config.toml (required) and credentials.toml (optional) from the
 * config directory, validates them and caches the result until reload().
 */

import * as fs from 'fs';
import * as path from 'path';
import TOML from '@iarna/toml';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import {
  AppConfigSchema,
  CredentialsSchema,
  describeIssues,
  type AppConfig,
  type Credentials,
  type DashboardSettings,
  type LayoutConfig,
  type WidgetConfig
} from './schema.js';

export const CONFIG_FILE = 'config.toml';
export const CREDENTIALS_FILE = 'credentials.toml';

/**
 * Environment variables that override a credential field
 */
const CREDENTIAL_ENV_OVERRIDES: ReadonlyArray<{ env: string; integration: string; field: string }> = [
  { env: 'TODOIST_API_TOKEN', integration: 'todoist', field: 'api_token' },
  { env: 'UNIFI_PROTECT_PASSWORD', integration: 'unifi_protect', field: 'password' }
];

export class ConfigLoader {
  readonly configDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private config: AppConfig | null = null;
  private credentials: Credentials | null = null;

  constructor(configDir: string = './config', env: NodeJS.ProcessEnv = process.env) {
    this.configDir = path.resolve(configDir);
    this.env = env;
  }

  /**
   * Load and validate config.toml
   */
  loadConfig(): AppConfig {
    if (this.config === null) {
      const file = path.join(this.configDir, CONFIG_FILE);
      if (!fs.existsSync(file)) {
        throw new ConfigurationError(`Config file not found: ${file}`, { file });
      }
      this.config = this.parseFile(file, AppConfigSchema);
    }
    return this.config;
  }

  /**
   * Load credentials.toml; a missing file means no credentials
   */
  loadCredentials(): Credentials {
    if (this.credentials === null) {
      const file = path.join(this.configDir, CREDENTIALS_FILE);
      const fromFile = fs.existsSync(file) ? this.parseFile(file, CredentialsSchema) : {};
      this.credentials = this.applyEnvOverrides(fromFile);
    }
    return this.credentials;
  }

  getDashboardConfig(): DashboardSettings {
    return { ...this.loadConfig().dashboard };
  }

  getLayoutConfig(): LayoutConfig {
    return { ...this.loadConfig().layout };
  }

  getWidgetConfigs(): WidgetConfig[] {
    return [...this.loadConfig().layout.widgets];
  }

  /**
   * Credentials for one integration (empty if not configured)
   */
  getIntegrationCredentials(integrationName: string): Record<string, unknown> {
    return { ...(this.loadCredentials()[integrationName] ?? {}) };
  }

  /**
   * Force reload of all configuration files
   */
  reload(): void {
    this.config = null;
    this.credentials = null;
  }

  private parseFile<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
    let raw: unknown;
    try {
      raw = TOML.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse ${path.basename(file)}: ${reason}`, { file });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid ${path.basename(file)}: ${describeIssues(result.error).join('; ')}`,
        { file }
      );
    }
    return result.data;
  }

  private applyEnvOverrides(credentials: Credentials): Credentials {
    const merged: Credentials = { ...credentials };
    for (const { env, integration, field } of CREDENTIAL_ENV_OVERRIDES) {
      const value = this.env[env];
      if (value === undefined || value === '') {
        continue;
      }
      merged[integration] = { ...(merged[integration] ?? {}), [field]: value };
    }
    return merged;
  }
}
