/**
 * Basic Usage Example
 *
 * Runs the dashboard with one built-in polling integration and one custom
 * streaming source, without any config files for the widgets.
 */

import {
  DashboardServer,
  ExampleIntegration,
  type WidgetSource,
  escapeHtml,
  sleep
} from '../src/index.js';

/**
 * Counts up once a second and pushes every value
 */
const counter: WidgetSource<number> = {
  id: 'counter',
  displayName: 'Counter',
  refreshIntervalSeconds: 10,

  async snapshot() {
    return 0;
  },

  async *openUpdateStream(signal: AbortSignal) {
    let value = 0;
    while (!signal.aborted) {
      yield value++;
      await sleep(1000, signal);
    }
  },

  renderWidget(value: number) {
    return `<div class="counter">${escapeHtml(value)}</div>`;
  }
};

async function main() {
  const server = new DashboardServer({
    config: { port: 9753, host: '127.0.0.1', configDir: './config' },
    integrations: new Map<string, WidgetSource>([
      ['example', new ExampleIntegration({ message: 'Hello from the example' })],
      ['counter', counter]
    ])
  });

  await server.start();
  console.log(`Open http://127.0.0.1:${server.port}/`);

  process.on('SIGINT', () => {
    server.stop().then(
      () => process.exit(0),
      (error) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  });
}

main().catch((error) => {
  console.error('Example failed:', error);
  process.exit(1);
});
