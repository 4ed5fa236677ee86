/**
 * Widget Supervisor
 *
 * Runs one RefreshDriver per loaded widget source for the lifetime of the
 * process. A source that fails to negotiate is logged and marked failed;
 * it never keeps the other sources from starting or running.
 */

import { RefreshDriver } from '../engine/RefreshDriver.js';
import type { RefreshMode, RefreshTaskState, UpdateSink, WidgetSource } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface WidgetSupervisorOptions {
  logger?: Logger;
}

interface RefreshTask {
  source: WidgetSource;
  driver: RefreshDriver;
  done: Promise<void>;
}

export class WidgetSupervisor {
  private readonly sources: readonly WidgetSource[];
  private readonly sink: UpdateSink;
  private readonly logger: Logger;
  private tasks: Map<string, RefreshTask> = new Map();

  constructor(sources: Iterable<WidgetSource>, sink: UpdateSink, options: WidgetSupervisorOptions = {}) {
    this.sources = Array.from(sources);
    this.sink = sink;
    this.logger = options.logger ?? createLogger('supervisor');
  }

  /**
   * Spawn a refresh task for every source that does not have one yet
   */
  start(): number {
    let started = 0;

    for (const source of this.sources) {
      if (this.tasks.has(source.id)) {
        continue;
      }

      const driver = new RefreshDriver(source, this.sink, { logger: this.logger });
      const done = driver.start().then(
        () => {
          this.logger.debug(`Refresh task for '${source.id}' finished`);
        },
        error => {
          this.logger.error(`Refresh task for '${source.id}' could not start`, error);
        }
      );

      this.tasks.set(source.id, { source, driver, done });
      started++;
    }

    this.logger.info(`Started ${started} refresh task(s)`);
    return started;
  }

  /**
   * Cancel every task, wait for all of them to settle, then release the
   * sources' clients. Safe to call when tasks already ended on their own.
   */
  async stop(): Promise<void> {
    const tasks = Array.from(this.tasks.values());
    this.tasks.clear();

    await Promise.all(tasks.map(task => task.driver.stop()));
    await Promise.all(tasks.map(task => task.done));

    const closing = await Promise.allSettled(
      tasks.map(task => (task.source.close ? task.source.close() : Promise.resolve()))
    );
    closing.forEach((result, index) => {
      const task = tasks[index];
      if (result.status === 'rejected' && task) {
        this.logger.warn(`Failed to close '${task.source.id}'`, result.reason);
      }
    });

    if (tasks.length > 0) {
      this.logger.info(`Stopped ${tasks.length} refresh task(s)`);
    }
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  hasTask(sourceId: string): boolean {
    return this.tasks.has(sourceId);
  }

  getMode(sourceId: string): RefreshMode | null {
    return this.tasks.get(sourceId)?.driver.getState().mode ?? null;
  }

  getTaskStates(): RefreshTaskState[] {
    return Array.from(this.tasks.values(), task => task.driver.getState());
  }
}
