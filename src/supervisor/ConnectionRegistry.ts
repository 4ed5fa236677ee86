/**
 * Connection Registry
 *
 * Tracks the live set of viewer sessions. The transport registers a session
 * when a browser connects and unregisters it on close; the broadcaster works
 * from a point-in-time snapshot so membership changes during a delivery never
 * affect the loop in progress.
 */

export interface Session {
  readonly id: string;
  send(data: string): Promise<void>;
  close?(code?: number, reason?: string): void;
}

export class ConnectionRegistry {
  private sessions: Set<Session> = new Set();

  /**
   * Add a session. Returns false if it was already registered.
   */
  register(session: Session): boolean {
    if (this.sessions.has(session)) {
      return false;
    }
    this.sessions.add(session);
    return true;
  }

  /**
   * Remove a session. Returns false if it was not registered.
   */
  unregister(session: Session): boolean {
    return this.sessions.delete(session);
  }

  has(session: Session): boolean {
    return this.sessions.has(session);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Copy of the current membership, safe to iterate while sessions come and go
   */
  snapshot(): Session[] {
    return Array.from(this.sessions);
  }

  /**
   * Close and forget every session
   */
  closeAll(code: number = 1001, reason: string = 'Server shutting down'): number {
    const sessions = this.snapshot();
    this.sessions.clear();
    for (const session of sessions) {
      session.close?.(code, reason);
    }
    return sessions.length;
  }
}
