/**
 * In-process fakes shared by the engine, supervisor and scenario tests
 */

import type { Session } from '../src/supervisor/ConnectionRegistry.js';
import {
  ServerMessageSchema,
  type ServerMessage,
  type UpdateSink,
  type WidgetSource
} from '../src/types/index.js';
import { StreamingNotSupportedError } from '../src/utils/errors.js';
import type { Logger } from '../src/utils/logger.js';

export class FakeSession implements Session {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;

  constructor(
    readonly id: string,
    private readonly failWith: Error | null = null
  ) {}

  async send(data: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  messages(): ServerMessage[] {
    return this.sent.map(line => ServerMessageSchema.parse(JSON.parse(line)));
  }
}

/**
 * Session whose sends never settle, like a viewer that stopped reading
 */
export class StalledSession implements Session {
  attempts = 0;
  closed: { code?: number; reason?: string } | null = null;

  constructor(readonly id: string = 'stalled') {}

  send(): Promise<void> {
    this.attempts++;
    return new Promise<void>(() => undefined);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  context: string;
  message: string;
  error?: unknown;
}

/**
 * Logger that keeps every entry, shared with its children
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly context = 'test',
    readonly entries: LogEntry[] = []
  ) {}

  debug(message: string, error?: unknown): void {
    this.entries.push({ level: 'debug', context: this.context, message, error });
  }

  info(message: string, error?: unknown): void {
    this.entries.push({ level: 'info', context: this.context, message, error });
  }

  warn(message: string, error?: unknown): void {
    this.entries.push({ level: 'warn', context: this.context, message, error });
  }

  error(message: string, error?: unknown): void {
    this.entries.push({ level: 'error', context: this.context, message, error });
  }

  child(context: string): Logger {
    return new RecordingLogger(`${this.context}:${context}`, this.entries);
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

export interface Published {
  sourceId: string;
  html: string;
}

export class RecordingSink implements UpdateSink {
  readonly published: Published[] = [];

  async broadcast(sourceId: string, html: string): Promise<void> {
    this.published.push({ sourceId, html });
  }

  htmlFor(sourceId: string): string[] {
    return this.published.filter(entry => entry.sourceId === sourceId).map(entry => entry.html);
  }
}

export interface PollingSourceOptions {
  id?: string;
  refreshIntervalSeconds?: number;
  values?: string[];
}

/**
 * Source without an update stream; snapshot returns the next value each call
 * and repeats the last one when the list runs out
 */
export function pollingSource(options: PollingSourceOptions = {}): WidgetSource<string> & { calls: number } {
  const values = options.values ?? ['v'];
  const source = {
    id: options.id ?? 'poller',
    displayName: 'Poller',
    refreshIntervalSeconds: options.refreshIntervalSeconds ?? 1,
    calls: 0,
    async snapshot(): Promise<string> {
      const value = values[Math.min(source.calls, values.length - 1)] ?? '';
      source.calls++;
      return value;
    },
    renderWidget(data: string): string {
      return `<p>${data}</p>`;
    }
  };
  return source;
}

/**
 * Source whose update stream yields the given values then waits for abort
 */
export function streamingSource(
  values: string[],
  options: { id?: string; endAfterValues?: boolean } = {}
): WidgetSource<string> & { snapshots: number; released: boolean } {
  const source = {
    id: options.id ?? 'streamer',
    displayName: 'Streamer',
    refreshIntervalSeconds: 60,
    snapshots: 0,
    released: false,
    async snapshot(): Promise<string> {
      source.snapshots++;
      return 'snapshot';
    },
    async *openUpdateStream(signal: AbortSignal): AsyncGenerator<string> {
      try {
        for (const value of values) {
          yield value;
        }
        if (options.endAfterValues) {
          return;
        }
        await new Promise<void>(resolve => {
          if (signal.aborted) {
            resolve();
          } else {
            signal.addEventListener('abort', () => resolve(), { once: true });
          }
        });
      } finally {
        source.released = true;
      }
    },
    renderWidget(data: string): string {
      return `<p>${data}</p>`;
    }
  };
  return source;
}

/**
 * Source that signals "no streaming" by throwing from openUpdateStream
 */
export function refusingSource(id = 'refuser'): WidgetSource<string> {
  return {
    id,
    displayName: 'Refuser',
    refreshIntervalSeconds: 1,
    async snapshot() {
      return 'polled';
    },
    openUpdateStream(): AsyncIterable<string> {
      throw new StreamingNotSupportedError(id);
    },
    renderWidget(data: string) {
      return `<p>${data}</p>`;
    }
  };
}

/**
 * Let pending promise callbacks run
 */
export async function flushMicrotasks(times = 10): Promise<void> {
  for (let i = 0; i < times; i++) {
    await Promise.resolve();
  }
}
