import { z } from 'zod';
import type { DbProvider } from '../lib/db';

export interface User {
  username: string;
  password_hash: string;
}

/** What the game core needs from wherever credentials live. */
export interface CredentialStore {
  getUserByUsername(username: string): Promise<User | null>;
  /** Rejects with DuplicateUserError when the name is taken. */
  createUser(opts: { username: string; passwordHash: string }): Promise<User>;
}

export class DuplicateUserError extends Error {
  constructor(readonly username: string) {
    super(`User ${username} already exists`);
    this.name = 'DuplicateUserError';
  }
}

const userRow = z.object({ username: z.string(), password_hash: z.string() });

/**
 * Credentials in the `players` table, with an in-memory store used when no
 * database is configured or a query fails. Usernames match exactly.
 */
export class UsersRepo implements CredentialStore {
  // In-memory fallback store
  private readonly memUsers = new Map<string, User>();

  constructor(private readonly db: DbProvider | null = null) {}

  async createUser(opts: { username: string; passwordHash: string }): Promise<User> {
    const user: User = { username: opts.username, password_hash: opts.passwordHash };
    if (this.db) {
      let rows: unknown[] | null = null;
      try {
        const db = await this.db();
        const result = await db.query(
          `insert into players (username, password_hash)
           values ($1, $2)
           on conflict (username) do nothing
           returning username, password_hash`,
          [opts.username, opts.passwordHash]
        );
        rows = result.rows;
      } catch (err) {
        console.warn('[users] create failed, keeping user in memory:', err instanceof Error ? err.message : err);
      }
      if (rows) {
        if (rows.length === 0) throw new DuplicateUserError(opts.username);
        return userRow.parse(rows[0]);
      }
    }
    if (this.memUsers.has(opts.username)) throw new DuplicateUserError(opts.username);
    this.memUsers.set(opts.username, user);
    return user;
  }

  async getUserByUsername(username: string): Promise<User | null> {
    if (this.db) {
      try {
        const db = await this.db();
        const { rows } = await db.query(
          `select username, password_hash from players where username = $1 limit 1`,
          [username]
        );
        if (rows.length > 0) return userRow.parse(rows[0]);
      } catch (err) {
        console.warn('[users] lookup failed, using memory store:', err instanceof Error ? err.message : err);
      }
    }
    return this.memUsers.get(username) ?? null;
  }
}
