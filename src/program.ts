/**
 * Command-line program: flags override the DASHBOARD_* environment
 * settings, signals trigger a graceful stop.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { ServerConfig } from './config/server.js';
import { DashboardServer } from './dashboard/DashboardServer.js';
import { createLogger } from './utils/logger.js';

/** Hard exit if a graceful stop hangs */
const SHUTDOWN_TIMEOUT_MS = 10000;

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Must be an integer between 0 and 65535.');
  }
  return port;
}

interface CliOptions {
  host?: string;
  port?: number;
  configDir?: string;
}

export function buildProgram(run: (overrides: Partial<ServerConfig>) => Promise<void>): Command {
  return new Command()
    .name('home-dashboard')
    .description('Self-hosted status dashboard with live widget updates')
    .version('1.0.0')
    .option('--host <host>', 'interface to bind (env DASHBOARD_HOST)')
    .option('--port <port>', 'port to listen on (env DASHBOARD_PORT)', parsePort)
    .option('--config-dir <dir>', 'directory with config.toml and credentials.toml (env DASHBOARD_CONFIG_DIR)')
    .action(async (options: CliOptions) => {
      const overrides: Partial<ServerConfig> = {};
      if (options.host !== undefined) overrides.host = options.host;
      if (options.port !== undefined) overrides.port = options.port;
      if (options.configDir !== undefined) overrides.configDir = options.configDir;
      await run(overrides);
    });
}

export async function serve(overrides: Partial<ServerConfig>): Promise<void> {
  const logger = createLogger('cli');
  const server = new DashboardServer({ config: overrides });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}; shutting down`);

    const forceExit = setTimeout(() => {
      logger.error(`Shutdown did not finish within ${SHUTDOWN_TIMEOUT_MS}ms; exiting`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.stop().then(
      () => process.exit(0),
      error => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
}
