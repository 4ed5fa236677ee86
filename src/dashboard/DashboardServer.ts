/**
 * Dashboard Server
 *
 * HTTP and WebSocket transport for the dashboard. One instance owns the
 * connection registry, the broadcaster and the widget supervisor; nothing
 * lives at module scope.
 *
 * Routes:
 * - GET  /                     full page with pre-rendered widgets
 * - GET  /api/widgets/:name    current fragment for one widget
 * - GET  /api/integrations     known integrations and their refresh mode
 * - GET  /health               liveness and counts
 * - POST /api/refresh          ask every browser to reload
 * - WS   /ws                   widget_update push channel
 */

import * as http from 'http';
import { URL } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { ConfigLoader } from '../config/ConfigLoader.js';
import type { DashboardSettings, LayoutConfig } from '../config/schema.js';
import { createServerConfig, validateServerConfig, type ServerConfig } from '../config/server.js';
import { Broadcaster } from '../engine/Broadcaster.js';
import {
  discoverIntegrations,
  loadAllIntegrations,
  type Integration,
  type IntegrationRegistry
} from '../integrations/registry.js';
import { ConnectionRegistry, type Session } from '../supervisor/ConnectionRegistry.js';
import { WidgetSupervisor } from '../supervisor/WidgetSupervisor.js';
import { resolveTheme } from '../themes/index.js';
import { PING, PONG } from '../types/index.js';
import { ConfigurationError, formatError } from '../utils/errors.js';
import { escapeHtml } from '../utils/html.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { renderPage, type PageWidget } from './page.js';

// ============================================================================
// HTTP UTILITIES
// ============================================================================

type HttpMethod = 'GET' | 'POST';

type RouteHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse,
  params: Record<string, string>
) => Promise<void>;

interface Route {
  method: HttpMethod;
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
}

function sendJson(res: http.ServerResponse, data: unknown, statusCode: number = 200): void {
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Cache-Control', 'no-store');
  res.statusCode = statusCode;
  res.end(JSON.stringify(data));
}

function sendHtml(res: http.ServerResponse, html: string, statusCode: number = 200): void {
  res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.setHeader('Cache-Control', 'no-store');
  res.statusCode = statusCode;
  res.end(html);
}

function sendError(res: http.ServerResponse, message: string, statusCode: number = 500): void {
  sendJson(res, { error: message }, statusCode);
}

function errorFragment(message: string): string {
  return `<div class="widget-error">${escapeHtml(message)}</div>`;
}

function isHttpMethod(method: string | undefined): method is HttpMethod {
  return method === 'GET' || method === 'POST';
}

// ============================================================================
// WEBSOCKET SESSIONS
// ============================================================================

/** Outgoing bytes a viewer may leave unread before sends to it fail */
export const MAX_BUFFERED_BYTES = 1024 * 1024;

/**
 * Session backed by a ws socket; send resolves once the frame is flushed
 */
export class WebSocketSession implements Session {
  readonly id: string;
  private readonly socket: WebSocket;

  constructor(socket: WebSocket, id: string = uuidv4()) {
    this.socket = socket;
    this.id = id;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`Session ${this.id} is not open`));
        return;
      }
      if (this.socket.bufferedAmount > MAX_BUFFERED_BYTES) {
        reject(new Error(`Session ${this.id} has ${this.socket.bufferedAmount} bytes unsent`));
        return;
      }
      this.socket.send(data, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }
}

// ============================================================================
// SERVER
// ============================================================================

export interface DashboardServerOptions {
  config?: Partial<ServerConfig>;
  configLoader?: ConfigLoader;
  registry?: IntegrationRegistry;
  /** Pre-built integrations; skips loading from the layout */
  integrations?: Map<string, Integration>;
  logger?: Logger;
}

export class DashboardServer {
  readonly config: ServerConfig;
  readonly connections: ConnectionRegistry;
  readonly broadcaster: Broadcaster;

  private readonly configLoader: ConfigLoader;
  private readonly registry: IntegrationRegistry;
  private readonly logger: Logger;
  private readonly routes: Route[] = [];
  private integrations: Map<string, Integration>;
  private readonly preloaded: boolean;
  private supervisor: WidgetSupervisor | null = null;
  private server: http.Server | null = null;
  private wss: WebSocketServer | null = null;

  constructor(options: DashboardServerOptions = {}) {
    this.config = createServerConfig(options.config);
    this.logger = options.logger ?? createLogger('dashboard', { level: this.config.logLevel });
    this.configLoader = options.configLoader ?? new ConfigLoader(this.config.configDir);
    this.registry = options.registry ?? discoverIntegrations();
    this.integrations = options.integrations ?? new Map();
    this.preloaded = options.integrations !== undefined;
    this.connections = new ConnectionRegistry();
    this.broadcaster = new Broadcaster(this.connections, {
      logger: this.logger.child('broadcaster'),
      sendTimeoutMs: this.config.sendTimeoutMs
    });
    this.registerRoutes();
  }

  /**
   * Load integrations, start their refresh tasks and listen
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const errors = validateServerConfig(this.config);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid server configuration: ${errors.join(', ')}`, { errors });
    }

    if (!this.preloaded) {
      this.integrations = this.loadIntegrations();
    }

    this.supervisor = new WidgetSupervisor(this.integrations.values(), this.broadcaster, {
      logger: this.logger.child('supervisor')
    });
    this.supervisor.start();

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        this.logger.error(`Unhandled error for ${req.method} ${req.url}`, error);
        if (!res.headersSent) {
          sendError(res, 'Internal server error');
        } else {
          res.end();
        }
      });
    });
    const wss = new WebSocketServer({ server, path: '/ws' });
    wss.on('connection', socket => this.handleConnection(socket));
    this.server = server;
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.logger.info(`Dashboard listening on http://${this.config.host}:${this.port}`);
    this.logger.info(`WebSocket endpoint: ws://${this.config.host}:${this.port}/ws`);
  }

  /**
   * Stop refresh tasks, close every session and the listener
   */
  async stop(): Promise<void> {
    if (this.supervisor) {
      await this.supervisor.stop();
      this.supervisor = null;
    }

    const closed = this.connections.closeAll();
    if (closed > 0) {
      this.logger.info(`Closed ${closed} session(s)`);
    }

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>(resolve => wss.close(() => resolve()));
    }

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.logger.info('Dashboard stopped');
    }
  }

  /** Bound port; differs from config.port when listening on port 0 */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  getIntegrations(): ReadonlyMap<string, Integration> {
    return this.integrations;
  }

  private loadIntegrations(): Map<string, Integration> {
    try {
      return loadAllIntegrations(this.configLoader, this.registry, this.logger.child('integrations'));
    } catch (error) {
      this.logger.error('Could not load integrations; serving without widgets', error);
      return new Map();
    }
  }

  // --------------------------------------------------------------------------
  // WebSocket
  // --------------------------------------------------------------------------

  private handleConnection(socket: WebSocket): void {
    const session = new WebSocketSession(socket);
    this.connections.register(session);
    this.logger.debug(`Session ${session.id} connected (${this.connections.size} open)`);

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary || data.toString() !== PING) {
        return;
      }
      session.send(PONG).catch(error => {
        this.logger.debug(`Failed to answer ping from ${session.id}`, error);
      });
    });

    const drop = (): void => {
      if (this.connections.unregister(session)) {
        this.logger.debug(`Session ${session.id} disconnected (${this.connections.size} open)`);
      }
    };
    socket.on('close', drop);
    socket.on('error', error => {
      this.logger.debug(`Session ${session.id} errored`, error);
      drop();
    });
  }

  // --------------------------------------------------------------------------
  // HTTP
  // --------------------------------------------------------------------------

  private route(method: HttpMethod, path: string, handler: RouteHandler): void {
    const paramNames: string[] = [];
    const patternStr = path.replace(/:(\w+)/g, (_match, name: string) => {
      paramNames.push(name);
      return '([^/]+)';
    });

    this.routes.push({
      method,
      pattern: new RegExp(`^${patternStr}$`),
      paramNames,
      handler
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    res.setHeader('Access-Control-Allow-Origin', this.config.corsOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method;

    if (isHttpMethod(method)) {
      for (const r of this.routes) {
        if (r.method !== method) continue;

        const match = url.pathname.match(r.pattern);
        if (!match) continue;

        const params: Record<string, string> = {};
        r.paramNames.forEach((name, i) => {
          params[name] = decodeURIComponent(match[i + 1] ?? '');
        });

        await r.handler(req, res, params);
        return;
      }
    }

    sendError(res, 'Not found', 404);
  }

  private registerRoutes(): void {
    this.route('GET', '/', async (_req, res) => {
      let dashboard: DashboardSettings;
      let layout: LayoutConfig;
      try {
        dashboard = this.configLoader.getDashboardConfig();
        layout = this.configLoader.getLayoutConfig();
      } catch (error) {
        this.logger.error('Cannot render dashboard', error);
        sendHtml(res, errorFragment('Dashboard configuration could not be loaded'), 500);
        return;
      }

      const seen = new Set<string>();
      const entries: Array<{ name: string; integration: Integration; position: PageWidget['position'] }> = [];
      for (const widget of layout.widgets) {
        const name = widget.integration;
        if (!name || seen.has(name)) continue;
        const integration = this.integrations.get(name);
        if (!integration) continue;
        seen.add(name);
        entries.push({ name, integration, position: widget.position });
      }
      // Sources handed in directly may have no layout entry
      for (const [name, integration] of this.integrations) {
        if (!seen.has(name)) {
          entries.push({ name, integration, position: {} });
        }
      }

      const widgets = await Promise.all(
        entries.map(async ({ name, integration, position }): Promise<PageWidget> => {
          let html: string;
          try {
            html = integration.renderWidget(await integration.snapshot());
          } catch (error) {
            this.logger.error(`Error loading widget ${name}`, error);
            html = errorFragment(`Error loading ${name}`);
          }
          return { name, displayName: integration.displayName, html, position };
        })
      );

      sendHtml(
        res,
        renderPage({
          title: dashboard.title,
          theme: resolveTheme(dashboard.theme),
          columns: layout.columns,
          widgets
        })
      );
    });

    this.route('GET', '/api/widgets/:name', async (_req, res, params) => {
      const name = params['name'] ?? '';
      const integration = this.integrations.get(name);
      if (!integration) {
        sendHtml(res, errorFragment(`Unknown integration: ${name}`), 404);
        return;
      }

      try {
        sendHtml(res, integration.renderWidget(await integration.snapshot()));
      } catch (error) {
        this.logger.error(`Error fetching widget ${name}`, error);
        sendHtml(res, errorFragment('Error loading widget'), 500);
      }
    });

    this.route('GET', '/api/integrations', async (_req, res) => {
      const result: Record<string, {
        display_name: string;
        refresh_interval: number;
        loaded: boolean;
        mode: string | null;
      }> = {};

      for (const [name, entry] of this.registry) {
        result[name] = {
          display_name: entry.displayName,
          refresh_interval: entry.refreshInterval,
          loaded: this.integrations.has(name),
          mode: this.supervisor?.getMode(name) ?? null
        };
      }

      sendJson(res, result);
    });

    this.route('GET', '/health', async (_req, res) => {
      try {
        this.configLoader.loadConfig();
      } catch (error) {
        sendJson(res, { status: 'unhealthy', errors: [formatError(error)] });
        return;
      }

      sendJson(res, {
        status: 'healthy',
        integrations: this.integrations.size,
        connections: this.connections.size
      });
    });

    this.route('POST', '/api/refresh', async (_req, res) => {
      const delivered = await this.broadcaster.deliver({ type: 'refresh' });
      this.logger.info(`Refresh requested; delivered to ${delivered} session(s)`);
      sendJson(res, { delivered });
    });
  }
}
