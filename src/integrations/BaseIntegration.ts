/**
 * Base Integration
 *
 * Common shape of every widget data source: validated credentials, the
 * snapshot/render contract, and an update stream that is unsupported unless
 * a subclass overrides it.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { describeIssues } from '../config/schema.js';
import type { WidgetSource } from '../types/index.js';
import { IntegrationConfigError, StreamingNotSupportedError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Static description of an integration, available without instantiating it
 */
export interface IntegrationMeta {
  /** Unique identifier, also the credentials table name (e.g. "todoist") */
  name: string;
  displayName: string;
  /** Seconds between snapshots in polling mode */
  refreshInterval: number;
}

export interface IntegrationOptions {
  logger?: Logger;
}

/** Key fragments that are never exposed to templates */
const SENSITIVE_KEY_PARTS = ['api_key', 'token', 'secret', 'password', 'credentials', 'key'];

export abstract class BaseIntegration<TConfig extends object, TData> implements WidgetSource<TData> {
  readonly id: string;
  readonly displayName: string;
  readonly refreshIntervalSeconds: number;

  protected readonly config: TConfig;
  protected readonly logger: Logger;

  /** Config fields treated as secrets regardless of their name */
  protected readonly secretFields: ReadonlySet<string>;

  constructor(
    meta: IntegrationMeta,
    schema: ZodType<TConfig, ZodTypeDef, unknown>,
    rawConfig: Record<string, unknown>,
    options: IntegrationOptions & { secretFields?: readonly string[] } = {}
  ) {
    this.id = meta.name;
    this.displayName = meta.displayName;
    this.refreshIntervalSeconds = meta.refreshInterval;
    this.secretFields = new Set(options.secretFields ?? []);
    this.logger = (options.logger ?? createLogger('integration')).child(meta.name);

    const result = schema.safeParse(rawConfig);
    if (!result.success) {
      throw new IntegrationConfigError(meta.name, describeIssues(result.error));
    }
    this.config = result.data;
  }

  /**
   * Fetch data for the widget from the integration's upstream
   */
  abstract fetchData(): Promise<TData>;

  /**
   * Render the widget's HTML fragment
   */
  abstract renderWidget(data: TData): string;

  snapshot(): Promise<TData> {
    return this.fetchData();
  }

  /**
   * Lazy sequence of snapshots driven by upstream changes. Integrations
   * without push support keep this default.
   */
  openUpdateStream(_signal: AbortSignal): AsyncIterable<TData> {
    throw new StreamingNotSupportedError(this.id);
  }

  /**
   * Release upstream clients
   */
  async close(): Promise<void> {
    // Nothing to release by default
  }

  getConfigValue<K extends keyof TConfig>(key: K, fallback?: NonNullable<TConfig[K]>): TConfig[K] {
    const value = this.config[key];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    return value;
  }

  /**
   * Config with secrets removed, safe to hand to a template
   */
  getSafeConfig(): Record<string, unknown> {
    const safe: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.config)) {
      if (this.secretFields.has(key)) {
        continue;
      }
      const lower = key.toLowerCase();
      if (SENSITIVE_KEY_PARTS.some(part => lower.includes(part))) {
        continue;
      }
      safe[key] = value;
    }
    return safe;
  }
}
