/**
 * End-to-end dispatch: sources -> refresh drivers -> broadcaster -> sessions
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader } from '../src/config/ConfigLoader.js';
import { Broadcaster } from '../src/engine/Broadcaster.js';
import { discoverIntegrations, loadAllIntegrations } from '../src/integrations/registry.js';
import { ConnectionRegistry } from '../src/supervisor/ConnectionRegistry.js';
import { WidgetSupervisor } from '../src/supervisor/WidgetSupervisor.js';
import type { WidgetSource } from '../src/types/index.js';
import { silentLogger } from '../src/utils/logger.js';
import {
  FakeSession,
  RecordingLogger,
  StalledSession,
  pollingSource,
  streamingSource
} from './helpers.js';

function updatesFor(session: FakeSession, integration: string): string[] {
  return session
    .messages()
    .flatMap(message =>
      message.type === 'widget_update' && message.integration === integration ? [message.html] : []
    );
}

describe('widget dispatch', () => {
  let registry: ConnectionRegistry;
  let broadcaster: Broadcaster;

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new ConnectionRegistry();
    broadcaster = new Broadcaster(registry, { logger: silentLogger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should push streamed and polled updates to every session', async () => {
    const first = new FakeSession('first');
    const second = new FakeSession('second');
    registry.register(first);
    registry.register(second);

    const streamer = streamingSource(['v1', 'v2'], { id: 'a' });
    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1, values: ['b1', 'b2', 'b3'] });
    const supervisor = new WidgetSupervisor([streamer, poller], broadcaster, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(updatesFor(first, 'a')).toEqual(['<p>v1</p>', '<p>v2</p>']);
    expect(updatesFor(first, 'b')).toEqual(['<p>b1</p>']);

    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);

    expect(updatesFor(first, 'b')).toEqual(['<p>b1</p>', '<p>b2</p>', '<p>b3</p>']);
    expect(second.sent).toEqual(first.sent);
    expect(streamer.snapshots).toBe(0);
    expect(supervisor.getMode('a')).toBe('streaming');
    expect(supervisor.getMode('b')).toBe('polling');

    await supervisor.stop();
  });

  it('should drop a session whose send fails and keep serving the rest', async () => {
    const healthy = new FakeSession('healthy');
    const dead = new FakeSession('dead', new Error('socket closed'));
    registry.register(healthy);
    registry.register(dead);

    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1, values: ['b1', 'b2'] });
    const supervisor = new WidgetSupervisor([poller], broadcaster, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(registry.size).toBe(1);
    expect(registry.snapshot()).toEqual([healthy]);

    await vi.advanceTimersByTimeAsync(1000);

    expect(updatesFor(healthy, 'b')).toEqual(['<p>b1</p>', '<p>b2</p>']);
    await supervisor.stop();
  });

  it('should drop a stalled session without holding other viewers', async () => {
    const stalled = new StalledSession();
    const healthy = new FakeSession('healthy');
    registry.register(stalled);
    registry.register(healthy);

    const bounded = new Broadcaster(registry, { logger: silentLogger, sendTimeoutMs: 1000 });
    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1, values: ['b1', 'b2', 'b3'] });
    const supervisor = new WidgetSupervisor([poller], bounded, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(updatesFor(healthy, 'b')).toEqual(['<p>b1</p>']);

    await vi.advanceTimersByTimeAsync(1000);
    expect(registry.snapshot()).toEqual([healthy]);
    expect(stalled.closed).toEqual({ code: 1011, reason: 'Delivery failed' });

    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(updatesFor(healthy, 'b')).toEqual(['<p>b1</p>', '<p>b2</p>', '<p>b3</p>']);
    expect(stalled.attempts).toBe(1);

    await supervisor.stop();
  });

  it('should stop while a send is still pending', async () => {
    const stalled = new StalledSession();
    registry.register(stalled);

    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1 });
    const supervisor = new WidgetSupervisor([poller], broadcaster, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(stalled.attempts).toBe(1);

    let stopped = false;
    const stopping = supervisor.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);

    expect(stopped).toBe(true);
    await stopping;
    expect(supervisor.taskCount).toBe(0);
    expect(poller.calls).toBe(1);
  });

  it('should publish nothing further once stopped during a poll wait', async () => {
    const session = new FakeSession('viewer');
    registry.register(session);

    const streamer = streamingSource(['v1'], { id: 'a' });
    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 60 });
    const supervisor = new WidgetSupervisor([streamer, poller], broadcaster, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(session.sent).toHaveLength(2);

    await supervisor.stop();
    await vi.advanceTimersByTimeAsync(180000);

    expect(session.sent).toHaveLength(2);
    expect(poller.calls).toBe(1);
    expect(streamer.released).toBe(true);
    expect(supervisor.taskCount).toBe(0);
  });

  it('should keep dispatching when one source fails to negotiate', async () => {
    const session = new FakeSession('viewer');
    registry.register(session);

    const broken: WidgetSource<string> = {
      id: 'broken',
      displayName: 'Broken',
      refreshIntervalSeconds: 1,
      async snapshot() {
        return 'unused';
      },
      openUpdateStream() {
        throw new Error('auth failed');
      },
      renderWidget(data: string) {
        return data;
      }
    };
    const logger = new RecordingLogger();
    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1, values: ['b1', 'b2'] });
    const supervisor = new WidgetSupervisor([broken, poller], broadcaster, { logger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(1000);

    expect(updatesFor(session, 'b')).toEqual(['<p>b1</p>', '<p>b2</p>']);
    expect(updatesFor(session, 'broken')).toEqual([]);
    expect(logger.messages('error')).toEqual(["Refresh task for 'broken' could not start"]);

    await supervisor.stop();
  });

  it('should deliver nothing while nobody is connected', async () => {
    const poller = pollingSource({ id: 'b', refreshIntervalSeconds: 1 });
    const supervisor = new WidgetSupervisor([poller], broadcaster, { logger: silentLogger });

    supervisor.start();
    await vi.advanceTimersByTimeAsync(0);
    const late = new FakeSession('late');
    registry.register(late);
    await vi.advanceTimersByTimeAsync(1000);

    expect(poller.calls).toBe(2);
    expect(updatesFor(late, 'b')).toEqual(['<p>v</p>']);

    await supervisor.stop();
  });
});

describe('layout loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'dashboard-dispatch-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should run tasks only for integrations that constructed', async () => {
    fs.writeFileSync(
      path.join(dir, 'config.toml'),
      [
        '[[layout.widgets]]',
        'integration = "todoist"',
        '',
        '[[layout.widgets]]',
        'integration = "example"',
        ''
      ].join('\n')
    );
    const loaded = loadAllIntegrations(new ConfigLoader(dir, {}), discoverIntegrations(), silentLogger);
    const registry = new ConnectionRegistry();
    const session = new FakeSession('viewer');
    registry.register(session);
    const supervisor = new WidgetSupervisor(loaded.values(), new Broadcaster(registry, { logger: silentLogger }), {
      logger: silentLogger
    });

    expect(supervisor.start()).toBe(1);
    expect(supervisor.hasTask('example')).toBe(true);
    expect(supervisor.hasTask('todoist')).toBe(false);

    await vi.waitFor(() => expect(updatesFor(session, 'example')).toHaveLength(1));
    await supervisor.stop();
  });
});
