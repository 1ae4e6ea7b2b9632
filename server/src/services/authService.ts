import * as bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { LoginStatus, RegisterStatus } from '../protocol/codec';
import { DuplicateUserError, type CredentialStore } from '../repositories/usersRepo';

export const MIN_PASSWORD_LENGTH = 6;

const alphanumeric = /^[a-zA-Z0-9]+$/;

const registerSchema = z.object({
  username: z.string().min(1).regex(alphanumeric),
  password: z.string().min(1).regex(alphanumeric).min(MIN_PASSWORD_LENGTH),
});

function registerFailure(err: z.ZodError): RegisterStatus {
  const issues = err.issues;
  if (issues.some((i) => i.code === 'too_small' && i.minimum === 1)) return 2;
  if (issues.some((i) => i.code === 'invalid_string')) return 4;
  return 3;
}

export class AuthService {
  // Names with a registration in flight; claimed before the first await.
  private readonly pending = new Set<string>();

  constructor(
    private readonly users: CredentialStore,
    private readonly saltRounds = 10
  ) {}

  async login(username: string, password: string): Promise<LoginStatus> {
    const user = await this.users.getUserByUsername(username);
    if (!user) return 1;
    const ok = await bcrypt.compare(password, user.password_hash);
    return ok ? 0 : 2;
  }

  async register(username: string, password: string): Promise<RegisterStatus> {
    const parsed = registerSchema.safeParse({ username, password });
    if (!parsed.success) return registerFailure(parsed.error);

    const { username: name } = parsed.data;
    if (this.pending.has(name)) return 1;
    this.pending.add(name);
    try {
      const existing = await this.users.getUserByUsername(name);
      if (existing) return 1;

      const salt = await bcrypt.genSalt(this.saltRounds);
      const hash = await bcrypt.hash(parsed.data.password, salt);
      await this.users.createUser({ username: name, passwordHash: hash });
      return 0;
    } catch (err) {
      if (err instanceof DuplicateUserError) return 1;
      throw err;
    } finally {
      this.pending.delete(name);
    }
  }
}
