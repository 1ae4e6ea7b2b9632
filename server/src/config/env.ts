import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1024).max(65535).default(5050),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  DATABASE_URL: z.string().min(1).optional(),
  MAX_ROOMS: z.coerce.number().int().positive().default(256),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
});

export interface Env {
  nodeEnv: string;
  port: number;
  /** 0 disables the HTTP status API. */
  statusPort: number;
  databaseUrl: string | null;
  maxRooms: number;
  bcryptRounds: number;
}

export function loadEnv(source: Record<string, string | undefined>): Env {
  // Treat empty strings like unset keys so `PORT=` in a .env falls back to the default.
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    statusPort: e.STATUS_PORT,
    databaseUrl: e.DATABASE_URL ?? null,
    maxRooms: e.MAX_ROOMS,
    bcryptRounds: e.BCRYPT_ROUNDS,
  };
}

export const env = loadEnv(process.env);
