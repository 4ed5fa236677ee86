/**
 * Dashboard Module Exports
 */

export {
  DashboardServer,
  WebSocketSession,
  type DashboardServerOptions
} from './DashboardServer.js';

export { renderPage, type PageOptions, type PageWidget } from './page.js';
