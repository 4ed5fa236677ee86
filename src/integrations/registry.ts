/**
 * Integration Registry
 *
 * Static map of the built-in integrations and the loader that turns the
 * layout's widget list into live integration instances.
 */

import type { ConfigLoader } from '../config/ConfigLoader.js';
import { UnknownIntegrationError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { WidgetSource } from '../types/index.js';
import type { IntegrationMeta, IntegrationOptions } from './BaseIntegration.js';
import { CamerasIntegration } from './cameras/CamerasIntegration.js';
import { ExampleIntegration } from './example/ExampleIntegration.js';
import { SystemMetricsIntegration } from './system/SystemMetricsIntegration.js';
import { TodoistIntegration } from './todoist/TodoistIntegration.js';

/** A constructed integration as the engine and server see it */
export type Integration = WidgetSource;

export interface IntegrationFactory extends IntegrationMeta {
  create(credentials: Record<string, unknown>, options?: IntegrationOptions): Integration;
}

export type IntegrationRegistry = ReadonlyMap<string, IntegrationFactory>;

function factory(
  meta: IntegrationMeta,
  create: (credentials: Record<string, unknown>, options?: IntegrationOptions) => Integration
): [string, IntegrationFactory] {
  return [meta.name, { ...meta, create }];
}

/**
 * Built-in integrations keyed by name
 */
export function discoverIntegrations(): IntegrationRegistry {
  return new Map([
    factory(SystemMetricsIntegration.meta, (credentials, options) => new SystemMetricsIntegration(credentials, options)),
    factory(TodoistIntegration.meta, (credentials, options) => new TodoistIntegration(credentials, options)),
    factory(CamerasIntegration.meta, (credentials, options) => new CamerasIntegration(credentials, options)),
    factory(ExampleIntegration.meta, (credentials, options) => new ExampleIntegration(credentials, options))
  ]);
}

/**
 * Instantiate one integration by name
 */
export function loadIntegration(
  name: string,
  credentials: Record<string, unknown>,
  registry: IntegrationRegistry = discoverIntegrations(),
  options?: IntegrationOptions
): Integration {
  const entry = registry.get(name);
  if (!entry) {
    throw new UnknownIntegrationError(name);
  }
  return entry.create(credentials, options);
}

/**
 * Instantiate every enabled widget in layout order. Unknown names and
 * construction failures are logged and left out; the first entry for a
 * name wins.
 */
export function loadAllIntegrations(
  configLoader: ConfigLoader,
  registry: IntegrationRegistry = discoverIntegrations(),
  logger: Logger = createLogger('integrations')
): Map<string, Integration> {
  const loaded = new Map<string, Integration>();

  for (const widget of configLoader.getWidgetConfigs()) {
    const name = widget.integration;
    if (!name || !widget.enabled) {
      continue;
    }
    if (!registry.has(name)) {
      logger.warn(`Unknown integration '${name}' in layout; skipping`);
      continue;
    }
    if (loaded.has(name)) {
      logger.debug(`Integration '${name}' already loaded; skipping duplicate`);
      continue;
    }

    try {
      const integration = loadIntegration(name, configLoader.getIntegrationCredentials(name), registry, { logger });
      loaded.set(name, integration);
      logger.info(`Loaded integration: ${name}`);
    } catch (error) {
      logger.error(`Failed to load integration '${name}'`, error);
    }
  }

  return loaded;
}
