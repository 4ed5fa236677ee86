import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WidgetSupervisor } from './WidgetSupervisor.js';
import type { UpdateSink, WidgetSource } from '../types/index.js';
import { silentLogger } from '../utils/logger.js';
import { RecordingSink, pollingSource, streamingSource } from '../../tests/helpers.js';

function failingNegotiation(id: string): WidgetSource<string> {
  return {
    id,
    displayName: 'Broken',
    refreshIntervalSeconds: 1,
    async snapshot() {
      return 'unused';
    },
    async *openUpdateStream() {
      throw new Error('login rejected');
    },
    renderWidget(data: string) {
      return data;
    }
  };
}

describe('WidgetSupervisor', () => {
  let sink: RecordingSink;

  beforeEach(() => {
    sink = new RecordingSink();
  });

  it('should start one task per source', async () => {
    const supervisor = new WidgetSupervisor(
      [streamingSource(['s1'], { id: 'a' }), streamingSource(['s2'], { id: 'b' })],
      sink,
      { logger: silentLogger }
    );

    expect(supervisor.start()).toBe(2);
    expect(supervisor.taskCount).toBe(2);
    expect(supervisor.hasTask('a')).toBe(true);
    expect(supervisor.hasTask('b')).toBe(true);

    await vi.waitFor(() => expect(sink.published).toHaveLength(2));
    await supervisor.stop();
  });

  it('should not start a second task for a source already running', async () => {
    const supervisor = new WidgetSupervisor([streamingSource(['s'], { id: 'a' })], sink, {
      logger: silentLogger
    });

    supervisor.start();
    expect(supervisor.start()).toBe(0);
    expect(supervisor.taskCount).toBe(1);

    await supervisor.stop();
  });

  it('should report each task mode once negotiated', async () => {
    const supervisor = new WidgetSupervisor(
      [streamingSource(['s'], { id: 'streamer' }), pollingSource({ id: 'poller', refreshIntervalSeconds: 60 })],
      sink,
      { logger: silentLogger }
    );

    supervisor.start();
    await vi.waitFor(() => expect(sink.published).toHaveLength(2));

    expect(supervisor.getMode('streamer')).toBe('streaming');
    expect(supervisor.getMode('poller')).toBe('polling');
    expect(supervisor.getMode('missing')).toBeNull();

    await supervisor.stop();
  });

  it('should keep other tasks running when one fails to negotiate', async () => {
    const healthy = streamingSource(['fine'], { id: 'healthy' });
    const supervisor = new WidgetSupervisor([failingNegotiation('broken'), healthy], sink, {
      logger: silentLogger
    });

    supervisor.start();
    await vi.waitFor(() => {
      const states = supervisor.getTaskStates();
      expect(states.find(state => state.sourceId === 'broken')?.status).toBe('failed');
    });

    expect(sink.htmlFor('healthy')).toEqual(['<p>fine</p>']);
    expect(sink.htmlFor('broken')).toEqual([]);

    await supervisor.stop();
  });

  it('should cancel every task and close every source on stop', async () => {
    const a = streamingSource(['1'], { id: 'a' });
    const b = pollingSource({ id: 'b', refreshIntervalSeconds: 60 });
    const close = vi.fn(async () => undefined);
    const closable: WidgetSource<string> = { ...b, close };
    const supervisor = new WidgetSupervisor([a, closable], sink, { logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(sink.published).toHaveLength(2));
    await supervisor.stop();

    expect(supervisor.taskCount).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
    await vi.waitFor(() => expect(a.released).toBe(true));
  });

  it('should finish stopping when a source fails to close', async () => {
    const source: WidgetSource<string> = {
      ...pollingSource({ id: 'p', refreshIntervalSeconds: 60 }),
      close: async () => {
        throw new Error('already closed');
      }
    };
    const supervisor = new WidgetSupervisor([source], sink, { logger: silentLogger });

    supervisor.start();
    await expect(supervisor.stop()).resolves.toBeUndefined();
  });

  it('should stop while a broadcast is still pending', async () => {
    let attempts = 0;
    const stalled: UpdateSink = {
      broadcast(): Promise<void> {
        attempts++;
        return new Promise<void>(() => undefined);
      }
    };
    const source = pollingSource();
    const supervisor = new WidgetSupervisor([source], stalled, { logger: silentLogger });

    supervisor.start();
    await vi.waitFor(() => expect(attempts).toBe(1));
    await supervisor.stop();

    expect(supervisor.taskCount).toBe(0);
    expect(source.calls).toBe(1);
  });

  it('should publish nothing after stop', async () => {
    vi.useFakeTimers();
    try {
      const source = pollingSource({ id: 'p', refreshIntervalSeconds: 1 });
      const supervisor = new WidgetSupervisor([source], sink, { logger: silentLogger });

      supervisor.start();
      await vi.advanceTimersByTimeAsync(0);
      await supervisor.stop();
      const published = sink.published.length;

      await vi.advanceTimersByTimeAsync(5000);
      expect(sink.published).toHaveLength(published);
    } finally {
      vi.useRealTimers();
    }
  });
});
