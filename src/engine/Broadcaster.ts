/**
 * Broadcaster
 *
 * Delivers one message to every registered session. A session whose send
 * fails, or does not settle within `sendTimeoutMs`, is dropped from the
 * registry and closed as part of the same call; nothing a single session
 * does can make a broadcast throw or hold it past the timeout.
 */

import type { ConnectionRegistry, Session } from '../supervisor/ConnectionRegistry.js';
import type { ServerMessage, UpdateSink } from '../types/index.js';
import { SendTimeoutError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_SEND_TIMEOUT_MS = 5000;

export interface BroadcasterOptions {
  logger?: Logger;
  sendTimeoutMs?: number;
}

export class Broadcaster implements UpdateSink {
  private registry: ConnectionRegistry;
  private logger: Logger;
  private sendTimeoutMs: number;

  constructor(registry: ConnectionRegistry, options: BroadcasterOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? createLogger('broadcaster');
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  /**
   * Push a rendered widget fragment to every session
   */
  async broadcast(sourceId: string, html: string): Promise<void> {
    await this.deliver({ type: 'widget_update', integration: sourceId, html });
  }

  /**
   * Push any server message to every session.
   * Resolves to the number of sessions that accepted it.
   */
  async deliver(message: ServerMessage): Promise<number> {
    if (this.registry.size === 0) {
      return 0;
    }

    const sessions = this.registry.snapshot();
    const payload = JSON.stringify(message);

    const results = await Promise.allSettled(
      sessions.map(session => this.sendTo(session, payload))
    );

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        delivered++;
        return;
      }
      const session = sessions[index];
      if (session && this.registry.unregister(session)) {
        this.logger.debug(`Dropped session ${session.id} after failed send`, result.reason);
        session.close?.(1011, 'Delivery failed');
      }
    });

    return delivered;
  }

  // Session.send may throw synchronously; fold that into the rejection path
  private async sendTo(session: Session, payload: string): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new SendTimeoutError(session.id, this.sendTimeoutMs)),
        this.sendTimeoutMs
      );
    });

    try {
      await Promise.race([session.send(payload), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
