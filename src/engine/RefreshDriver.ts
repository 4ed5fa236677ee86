/**
 * Refresh Driver
 *
 * Owns the refresh loop for one widget source. On start it probes the
 * source's update stream once:
 *
 * - supported:   publish the first snapshot, then publish every further
 *                element as it arrives (streaming mode)
 * - unsupported: snapshot, publish, wait `refreshIntervalSeconds`, repeat
 *                (polling mode)
 * - error:       the task fails with a NegotiationError
 *
 * The mode never changes once chosen. Per-element and per-cycle failures are
 * logged and skipped; a stream that breaks or ends after negotiation ends the
 * task without a restart. `stop()` interrupts whatever the task is waiting on:
 * the first pull, the next element, the poll interval or a pending broadcast.
 */

import type {
  DataSource,
  RefreshMode,
  RefreshTaskState,
  StreamProbe,
  TaskStatus,
  UpdateSink,
  WidgetSource
} from '../types/index.js';
import { raceAbort } from '../utils/abort.js';
import {
  NegotiationError,
  StreamingNotSupportedError,
  formatError,
  sleep
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Open a source's update stream and pull its first element.
 */
export async function probeUpdateStream<TData>(
  source: DataSource<TData>,
  signal: AbortSignal
): Promise<StreamProbe<TData>> {
  if (typeof source.openUpdateStream !== 'function') {
    return { kind: 'unsupported' };
  }

  let iterator: AsyncIterator<TData>;
  try {
    iterator = source.openUpdateStream(signal)[Symbol.asyncIterator]();
  } catch (error) {
    return classifyProbeFailure(error);
  }

  try {
    const first = await raceAbort(iterator.next(), signal);
    if (first.done) {
      return {
        kind: 'error',
        cause: new Error('update stream ended before producing a value')
      };
    }
    return { kind: 'supported', first: first.value, iterator };
  } catch (error) {
    releaseIterator(iterator);
    return classifyProbeFailure(error);
  }
}

function classifyProbeFailure<TData>(error: unknown): StreamProbe<TData> {
  if (error instanceof StreamingNotSupportedError) {
    return { kind: 'unsupported' };
  }
  return { kind: 'error', cause: error };
}

/**
 * Ask an iterator to finish without waiting on it; a generator parked on an
 * upstream wait only completes once that wait settles.
 */
function releaseIterator<TData>(iterator: AsyncIterator<TData>, logger?: Logger): void {
  if (typeof iterator.return !== 'function') {
    return;
  }
  iterator.return().then(
    () => undefined,
    error => logger?.debug('Update stream cleanup failed', error)
  );
}

export interface RefreshDriverOptions {
  logger?: Logger;
}

export class RefreshDriver<TData = unknown> {
  private readonly source: WidgetSource<TData>;
  private readonly sink: UpdateSink;
  private readonly logger: Logger;
  private readonly controller = new AbortController();

  private mode: RefreshMode = 'negotiating';
  private status: TaskStatus = 'idle';
  private updatesPublished = 0;
  private lastUpdateAt: string | null = null;
  private lastError: string | null = null;
  private task: Promise<void> | null = null;

  constructor(source: WidgetSource<TData>, sink: UpdateSink, options: RefreshDriverOptions = {}) {
    this.source = source;
    this.sink = sink;
    this.logger = (options.logger ?? createLogger('refresh')).child(source.id);
  }

  get sourceId(): string {
    return this.source.id;
  }

  /**
   * Start the refresh task. Calling again returns the same task.
   * The promise rejects with NegotiationError if the source cannot begin.
   */
  start(): Promise<void> {
    if (!this.task) {
      this.status = 'running';
      this.task = this.run();
    }
    return this.task;
  }

  /**
   * Cancel the task and wait for it to settle. Never rejects.
   */
  async stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    if (this.task) {
      await this.task.then(
        () => undefined,
        () => undefined
      );
    }
  }

  getState(): RefreshTaskState {
    return {
      sourceId: this.source.id,
      mode: this.mode,
      status: this.status,
      updatesPublished: this.updatesPublished,
      lastUpdateAt: this.lastUpdateAt,
      lastError: this.lastError
    };
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    const probe = await probeUpdateStream(this.source, signal);

    if (signal.aborted) {
      if (probe.kind === 'supported') {
        releaseIterator(probe.iterator, this.logger);
      }
      this.status = 'cancelled';
      return;
    }

    switch (probe.kind) {
      case 'supported':
        this.mode = 'streaming';
        this.logger.info('Streaming updates');
        await this.publish(probe.first);
        await this.consume(probe.iterator, signal);
        return;

      case 'unsupported':
        this.mode = 'polling';
        this.logger.info(
          `No update stream; polling every ${this.source.refreshIntervalSeconds}s`
        );
        await this.poll(signal);
        return;

      case 'error':
        this.status = 'failed';
        this.lastError = formatError(probe.cause);
        throw new NegotiationError(this.source.id, probe.cause);
    }
  }

  private async consume(iterator: AsyncIterator<TData>, signal: AbortSignal): Promise<void> {
    for (;;) {
      let result: IteratorResult<TData>;
      try {
        result = await raceAbort(iterator.next(), signal);
      } catch (error) {
        if (signal.aborted) {
          releaseIterator(iterator, this.logger);
          this.status = 'cancelled';
          return;
        }
        this.lastError = formatError(error);
        this.status = 'ended';
        this.logger.error('Update stream failed; no further updates', error);
        return;
      }

      if (result.done) {
        this.status = 'ended';
        this.logger.warn('Update stream completed unexpectedly; no further updates');
        return;
      }

      await this.publish(result.value);
    }
  }

  private async poll(signal: AbortSignal): Promise<void> {
    const intervalMs = this.source.refreshIntervalSeconds * 1000;

    while (!signal.aborted) {
      try {
        const data = await raceAbort(this.source.snapshot(), signal);
        await this.publish(data);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.lastError = formatError(error);
        this.logger.error('Snapshot failed', error);
      }

      try {
        await sleep(intervalMs, signal);
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }

    this.status = 'cancelled';
  }

  /**
   * Render and forward one snapshot; failures are logged and skipped
   */
  private async publish(data: TData): Promise<void> {
    let html: string;
    try {
      html = this.source.renderWidget(data);
    } catch (error) {
      this.lastError = formatError(error);
      this.logger.error('Render failed', error);
      return;
    }

    if (html === '') {
      this.logger.debug('Renderer produced an empty fragment; skipping');
      return;
    }

    try {
      await raceAbort(this.sink.broadcast(this.source.id, html), this.controller.signal);
      this.updatesPublished++;
      this.lastUpdateAt = new Date().toISOString();
    } catch (error) {
      if (this.controller.signal.aborted) {
        return;
      }
      this.lastError = formatError(error);
      this.logger.error('Broadcast failed', error);
    }
  }
}
