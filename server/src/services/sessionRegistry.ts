import type { Connection } from '../types/game';

export interface Session {
  connection: Connection;
  username: string | null;
}

/**
 * Authentication state for every live connection, keyed by connection id.
 * Holds no game state.
 */
export class SessionRegistry {
  private readonly sessions = new Map<number, Session>();

  register(connection: Connection): Session {
    const session: Session = { connection, username: null };
    this.sessions.set(connection.id, session);
    return session;
  }

  authenticate(connection: Connection, username: string): void {
    const session = this.sessions.get(connection.id);
    if (!session) throw new Error(`No session for connection ${connection.id}`);
    session.username = username;
  }

  isAuthenticated(connection: Connection): boolean {
    return this.usernameOf(connection) !== undefined;
  }

  usernameOf(connection: Connection): string | undefined {
    return this.sessions.get(connection.id)?.username ?? undefined;
  }

  remove(connection: Connection): void {
    this.sessions.delete(connection.id);
  }

  get size(): number {
    return this.sessions.size;
  }
}
