/**
 * Dashboard page template
 *
 * Full HTML document: theme variables, the widget grid with pre-rendered
 * cards, and the client script that keeps the cards live over /ws.
 */

import type { WidgetPosition } from '../config/schema.js';
import { themeCssVariables, type Theme } from '../themes/index.js';
import { escapeHtml, joinHtml } from '../utils/html.js';

export interface PageWidget {
  name: string;
  displayName: string;
  html: string;
  position: WidgetPosition;
}

export interface PageOptions {
  title: string;
  theme: Theme;
  columns: number;
  widgets: PageWidget[];
}

/** Client keepalive and reconnect timings */
export const PING_INTERVAL_MS = 30000;
export const RECONNECT_DELAY_MS = 5000;

function gridStyle(position: WidgetPosition): string {
  return joinHtml([
    position.col !== undefined && `grid-column-start: ${position.col + 1};`,
    position.row !== undefined && `grid-row-start: ${position.row + 1};`,
    position.width !== undefined && `grid-column-end: span ${position.width};`,
    position.height !== undefined && `grid-row-end: span ${position.height};`
  ]);
}

function renderCard(widget: PageWidget): string {
  const style = gridStyle(widget.position);
  return `<section class="widget" data-integration="${escapeHtml(widget.name)}"${style ? ` style="${style}"` : ''}>
      <h2 class="widget-title">${escapeHtml(widget.displayName)}</h2>
      <div class="widget-body">${widget.html}</div>
    </section>`;
}

const CLIENT_SCRIPT = `(function () {
  var scheme = location.protocol === 'https:' ? 'wss:' : 'ws:';
  var pingTimer = null;

  function swap(name, html) {
    var cards = document.querySelectorAll('[data-integration]');
    for (var i = 0; i < cards.length; i++) {
      if (cards[i].getAttribute('data-integration') === name) {
        var body = cards[i].querySelector('.widget-body');
        if (body) body.innerHTML = html;
      }
    }
  }

  function connect() {
    var socket = new WebSocket(scheme + '//' + location.host + '/ws');

    socket.onopen = function () {
      pingTimer = setInterval(function () {
        if (socket.readyState === WebSocket.OPEN) socket.send('ping');
      }, ${PING_INTERVAL_MS});
    };

    socket.onmessage = function (event) {
      if (event.data === 'pong') return;
      var message;
      try {
        message = JSON.parse(event.data);
      } catch (e) {
        return;
      }
      if (message.type === 'widget_update') {
        swap(message.integration, message.html);
      } else if (message.type === 'refresh') {
        location.reload();
      }
    };

    socket.onclose = function () {
      clearInterval(pingTimer);
      setTimeout(connect, ${RECONNECT_DELAY_MS});
    };
  }

  connect();
})();`;

export function renderPage(options: PageOptions): string {
  const cards = options.widgets.map(renderCard).join('\n    ');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(options.title)}</title>
  <style>
    :root {
      ${themeCssVariables(options.theme)}
    }

    * { box-sizing: border-box; }

    body {
      margin: 0;
      padding: 1rem;
      background: var(--theme-bg-black);
      color: var(--theme-text-secondary);
      font-family: ui-monospace, SFMono-Regular, Menlo, monospace;
    }

    header h1 {
      margin: 0 0 1rem;
      color: var(--theme-text-primary);
      text-shadow: 0 0 8px rgba(var(--theme-primary-glow-rgb), 0.5);
    }

    .grid {
      display: grid;
      grid-template-columns: repeat(${options.columns}, minmax(0, 1fr));
      gap: 1rem;
    }

    .widget {
      background: var(--theme-bg-panel);
      border: 1px solid var(--theme-bg-border);
      box-shadow: 0 0 12px rgba(var(--theme-primary-rgb), 0.15);
      padding: 0.75rem 1rem;
      overflow: hidden;
    }

    .widget-title {
      margin: 0 0 0.5rem;
      font-size: 0.9rem;
      text-transform: uppercase;
      letter-spacing: 0.1em;
      color: var(--theme-primary);
    }

    .widget-error { color: var(--theme-error); }
    .metric-warn, .overdue { color: var(--theme-warning); }
    .metric-ok, .camera-online { color: var(--theme-success); }
    .camera-offline { color: var(--theme-status-offline); }
    .empty, .task-project, .task-due { color: var(--theme-text-muted); }
    .camera-stream { width: 100%; display: block; }
  </style>
</head>
<body>
  <header><h1>${escapeHtml(options.title)}</h1></header>
  <main class="grid">
    ${cards}
  </main>
  <script>
${CLIENT_SCRIPT}
  </script>
</body>
</html>`;
}
