/**
 * Tracks live streamable HTTP sessions and closes idle ones
 */

export interface ClosableTransport {
  close(): Promise<void>;
}

interface SessionEntry<T extends ClosableTransport> {
  transport: T;
  createdAt: number;
  lastAccessedAt: number;
}

export class SessionManager<T extends ClosableTransport> {
  private sessions: Map<string, SessionEntry<T>> = new Map();
  private readonly sessionTimeout: number = 3600000; // 1 hour

  constructor(sessionTimeout?: number) {
    if (sessionTimeout) {
      this.sessionTimeout = sessionTimeout;
    }
  }

  add(sessionId: string, transport: T): void {
    const now = Date.now();
    this.sessions.set(sessionId, { transport, createdAt: now, lastAccessedAt: now });
  }

  get(sessionId: string): T | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }

    session.lastAccessedAt = Date.now();
    return session.transport;
  }

  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Closes sessions idle for longer than the timeout. Returns how many were
   * closed.
   */
  async cleanup(now: number = Date.now()): Promise<number> {
    const expired: Array<[string, T]> = [];
    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastAccessedAt > this.sessionTimeout) {
        expired.push([sessionId, session.transport]);
      }
    }

    for (const [sessionId, transport] of expired) {
      this.sessions.delete(sessionId);
      await transport.close();
    }

    return expired.length;
  }

  async closeAll(): Promise<void> {
    const transports = Array.from(this.sessions.values()).map(session => session.transport);
    this.sessions.clear();
    await Promise.all(transports.map(transport => transport.close()));
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }
}
