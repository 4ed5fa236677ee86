/**
 * Server Configuration
 *
 * Externalized configuration for the HTTP/WebSocket server.
 * All settings can be overridden via environment variables.
 */

import { isLogLevel, type LogLevel } from '../utils/logger.js';

/**
 * Server configuration interface
 */
export interface ServerConfig {
  /** Port to listen on (default: 9753) */
  port: number;
  /** Host to bind to (default: 0.0.0.0) */
  host: string;
  /** Directory holding config.toml and credentials.toml (default: ./config) */
  configDir: string;
  /** Logging threshold (default: info) */
  logLevel: LogLevel;
  /** CORS origin for API responses (default: *) */
  corsOrigin: string;
  /** How long one viewer may take to accept a message before it is dropped (default: 5000) */
  sendTimeoutMs: number;
}

/**
 * Default server configuration values
 */
const defaults: ServerConfig = {
  port: 9753,
  host: '0.0.0.0',
  configDir: './config',
  logLevel: 'info',
  corsOrigin: '*',
  sendTimeoutMs: 5000
};

/**
 * Parse an integer from environment variable with fallback
 */
function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse a string from environment variable with fallback
 */
function parseStringEnv(value: string | undefined, fallback: string): string {
  return value !== undefined && value !== '' ? value : fallback;
}

function parseLogLevelEnv(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Load server configuration from environment variables
 *
 * Environment Variables:
 * - DASHBOARD_PORT: Port to listen on (default: 9753)
 * - DASHBOARD_HOST: Host to bind to (default: 0.0.0.0)
 * - DASHBOARD_CONFIG_DIR: Config directory (default: ./config)
 * - DASHBOARD_LOG_LEVEL: debug | info | warn | error | silent (default: info)
 * - DASHBOARD_CORS_ORIGIN: CORS origin (default: *)
 * - DASHBOARD_SEND_TIMEOUT_MS: per-viewer send timeout (default: 5000)
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseIntEnv(env.DASHBOARD_PORT, defaults.port),
    host: parseStringEnv(env.DASHBOARD_HOST, defaults.host),
    configDir: parseStringEnv(env.DASHBOARD_CONFIG_DIR, defaults.configDir),
    logLevel: parseLogLevelEnv(env.DASHBOARD_LOG_LEVEL, defaults.logLevel),
    corsOrigin: parseStringEnv(env.DASHBOARD_CORS_ORIGIN, defaults.corsOrigin),
    sendTimeoutMs: parseIntEnv(env.DASHBOARD_SEND_TIMEOUT_MS, defaults.sendTimeoutMs)
  };
}

/**
 * Validate server configuration
 * @returns Array of validation error messages, empty if valid
 */
export function validateServerConfig(config: ServerConfig): string[] {
  const errors: string[] = [];

  // Port 0 asks the OS for an ephemeral port
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push(`Invalid port: ${config.port}. Must be between 0 and 65535.`);
  }

  if (config.host.trim() === '') {
    errors.push('Invalid host: must not be empty.');
  }

  if (config.configDir.trim() === '') {
    errors.push('Invalid configDir: must not be empty.');
  }

  if (!Number.isInteger(config.sendTimeoutMs) || config.sendTimeoutMs <= 0) {
    errors.push(`Invalid sendTimeoutMs: ${config.sendTimeoutMs}. Must be a positive integer.`);
  }

  return errors;
}

/**
 * Get the default server configuration
 */
export function getDefaultServerConfig(): ServerConfig {
  return { ...defaults };
}

/**
 * Create a server configuration with custom overrides
 */
export function createServerConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  const envConfig = loadServerConfig();
  return {
    ...envConfig,
    ...overrides
  };
}
