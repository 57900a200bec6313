import bcrypt from 'bcryptjs';
import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { SettingErrors } from '../lib/errors/setting-errors.js';
import { createLogger } from '../lib/logging/logger.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

const log = createLogger('UserStore');

export const USER_KEY_PREFIX = '/karmada/dashboard/users/';
export const BCRYPT_COST = 10;

export const userRoleSchema = z.enum(['admin', 'basic_user']);
export type UserRole = z.infer<typeof userRoleSchema>;

export const userRecordSchema = z.object({
  username: z.string().min(1),
  passwordHash: z.string(),
  email: z.string().default(''),
  role: z.string().default('basic_user'),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type UserRecord = z.infer<typeof userRecordSchema>;

export interface UserUpdate {
  password?: string;
  email?: string;
  role?: string;
}

/**
 * Dashboard users kept in etcd under `/karmada/dashboard/users/<username>`,
 * with bcrypt password hashes.
 */
export class UserStoreService {
  constructor(
    private kv: KeyValueStore,
    private cost = BCRYPT_COST
  ) {}

  private key(username: string): string {
    return `${USER_KEY_PREFIX}${username}`;
  }

  async get(username: string): Promise<Result<UserRecord | null, AppError>> {
    try {
      const raw = await this.kv.get(this.key(username));
      if (raw === null) return ok(null);
      const parsed = userRecordSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        return err(SettingErrors.STORE_ERROR(`stored user ${username} is malformed`));
      }
      return ok(parsed.data);
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
  }

  async exists(username: string): Promise<Result<boolean, AppError>> {
    const user = await this.get(username);
    return user.ok ? ok(user.value !== null) : user;
  }

  async create(
    username: string,
    password: string,
    email: string,
    role: string
  ): Promise<Result<UserRecord, AppError>> {
    const existing = await this.get(username);
    if (!existing.ok) return existing;
    if (existing.value) return err(SettingErrors.USER_EXISTS(username));

    const now = new Date().toISOString();
    const record: UserRecord = {
      username,
      passwordHash: await bcrypt.hash(password, this.cost),
      email,
      role,
      createdAt: now,
      updatedAt: now,
    };
    return this.save(record);
  }

  async update(username: string, update: UserUpdate): Promise<Result<UserRecord, AppError>> {
    const existing = await this.get(username);
    if (!existing.ok) return existing;
    if (!existing.value) return err(SettingErrors.USER_NOT_FOUND(username));

    const record: UserRecord = {
      ...existing.value,
      email: update.email ?? existing.value.email,
      role: update.role ?? existing.value.role,
      passwordHash: update.password
        ? await bcrypt.hash(update.password, this.cost)
        : existing.value.passwordHash,
      updatedAt: new Date().toISOString(),
    };
    return this.save(record);
  }

  async delete(username: string): Promise<Result<boolean, AppError>> {
    try {
      return ok(await this.kv.delete(this.key(username)));
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
  }

  /** All users; records that fail to parse are logged and skipped. */
  async list(): Promise<Result<UserRecord[], AppError>> {
    let entries: Record<string, string>;
    try {
      entries = await this.kv.getPrefix(USER_KEY_PREFIX);
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }

    const users: UserRecord[] = [];
    for (const [key, raw] of Object.entries(entries)) {
      try {
        const parsed = userRecordSchema.safeParse(JSON.parse(raw));
        if (parsed.success) {
          users.push(parsed.data);
          continue;
        }
        log.warn('Skipping malformed user record', { data: { key } });
      } catch (error) {
        log.warn('Skipping unparsable user record', { data: { key }, error });
      }
    }
    users.sort((a, b) => a.username.localeCompare(b.username));
    return ok(users);
  }

  async verifyPassword(username: string, password: string): Promise<Result<UserRecord | null, AppError>> {
    const user = await this.get(username);
    if (!user.ok || !user.value) return user;
    const matches = await bcrypt.compare(password, user.value.passwordHash);
    return ok(matches ? user.value : null);
  }

  /** Create the user when missing; an existing user is left untouched. */
  async ensure(
    username: string,
    password: string,
    email: string,
    role: string
  ): Promise<Result<boolean, AppError>> {
    const exists = await this.exists(username);
    if (!exists.ok) return exists;
    if (exists.value) return ok(false);
    const created = await this.create(username, password, email, role);
    return created.ok ? ok(true) : created;
  }

  private async save(record: UserRecord): Promise<Result<UserRecord, AppError>> {
    try {
      await this.kv.put(this.key(record.username), JSON.stringify(record));
      return ok(record);
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
  }
}
