import { Pool } from 'pg';
import { env } from '../config/env';

/** The slice of a pg Pool the repositories use, so tests can hand in a stub. */
export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type DbProvider = () => Promise<Queryable>;

let pool: Pool | null = null;
// Set after the first successful round trip; cleared when the pool closes.
let verified = false;

function poolFor(connectionString: string): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString,
      ssl: { rejectUnauthorized: false },
      connectionTimeoutMillis: 5000,
    });
  }
  return pool;
}

/**
 * Returns the shared pool, checking it once with `select 1`. A failed check
 * rejects, and the repositories treat that as "use the memory store".
 */
export async function ensureDb(): Promise<Queryable> {
  if (!env.databaseUrl) throw new Error('DATABASE_URL is not configured');
  const p = poolFor(env.databaseUrl);
  if (verified) return p;
  try {
    await p.query('select 1');
  } catch (err) {
    console.error('[db] connection check failed:', err instanceof Error ? err.message : err);
    throw err;
  }
  verified = true;
  return p;
}

export async function closeDb(): Promise<void> {
  const p = pool;
  pool = null;
  verified = false;
  if (p) await p.end();
}
