import { z } from 'zod';
import { StoreUnavailableError } from '../../application/errors.js';
import type { NewUser, User } from '../../domain/auth/user.js';
import type { InsertResult, UserStore } from '../../domain/auth/userStore.js';
import { logger } from '../logger.js';
import type { Queryable } from './pool.js';
import { TimeoutError, withTimeout } from './timeout.js';

const COLUMNS =
  'id, email, password_hash, nickname, avatar_url, roles, is_active, created_at, updated_at';

const userRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  password_hash: z.string(),
  nickname: z.string(),
  avatar_url: z.string().nullable(),
  roles: z.array(z.string()),
  is_active: z.boolean(),
  created_at: z.date(),
  updated_at: z.date(),
});

type UserRow = z.infer<typeof userRowSchema>;

/**
 * A stored row that does not have the expected shape. Internal: never
 * rendered to the caller as a validation failure.
 */
export class CorruptRecordError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorruptRecordError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Connection exceptions (08), admin shutdown / crash (57P0x), and socket errors
const TRANSIENT_PG_CODE = /^(08|57P0)/;
const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function isTransient(err: unknown): boolean {
  if (err instanceof TimeoutError) {
    return true;
  }
  // pg reports pool connect timeouts and dropped connections as plain Errors
  if (err instanceof Error && /timeout|Connection terminated/i.test(err.message)) {
    return true;
  }
  const code = errorCode(err);
  return code !== undefined && (TRANSIENT_PG_CODE.test(code) || TRANSIENT_SOCKET_CODES.has(code));
}

function decodeRow(row: unknown): UserRow {
  const parsed = userRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new CorruptRecordError('Malformed players row', { cause: parsed.error });
  }
  return parsed.data;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    nickname: row.nickname,
    avatarUrl: row.avatar_url,
    roles: row.roles,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * PostgreSQL-backed {@link UserStore} over the `players` table.
 */
export class UserRepo implements UserStore {
  constructor(
    private readonly db: Queryable,
    private readonly timeoutMs: number
  ) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.run(`SELECT ${COLUMNS} FROM players WHERE email = $1`, [email]);

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(decodeRow(result.rows[0]));
  }

  async insert(user: NewUser): Promise<InsertResult> {
    const result = await this.run(
      `INSERT INTO players
         (email, password_hash, nickname, avatar_url, roles, is_active, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (email) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        user.email,
        user.passwordHash,
        user.nickname,
        user.avatarUrl,
        [...user.roles],
        user.isActive,
        user.createdAt,
        user.updatedAt,
      ]
    );

    if (result.rows.length === 0) {
      return { status: 'conflict' };
    }
    return { status: 'created', user: toUser(decodeRow(result.rows[0])) };
  }

  /**
   * Round trip used by the health check.
   */
  async ping(): Promise<void> {
    await this.run('SELECT 1', []);
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await withTimeout(this.db.query<Record<string, unknown>>(text, values), this.timeoutMs);
    } catch (err) {
      if (isTransient(err)) {
        logger.warn({ err }, 'User store unavailable');
        throw new StoreUnavailableError(undefined, { cause: err });
      }
      throw err;
    }
  }
}
