import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { SettingErrors } from '../lib/errors/setting-errors.js';
import { createLogger } from '../lib/logging/logger.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';
import { type AuthorizationService, isClusterRelation } from './authorization.service.js';
import { type UserRecord, type UserStoreService, userRoleSchema } from './user-store.service.js';

const log = createLogger('UserSettings');

export const SETTING_KEY_PREFIX = 'usersettings/';

const dashboardSettingsSchema = z
  .object({
    defaultView: z.string().optional(),
    refreshInterval: z.number().int().optional(),
    pinnedClusters: z.array(z.string()).optional(),
    hiddenWidgets: z.array(z.string()).optional(),
    widgetLayout: z
      .record(z.object({ row: z.number(), column: z.number(), width: z.number(), height: z.number() }))
      .optional(),
  })
  .passthrough();

export const userSettingSchema = z.object({
  username: z.string().default(''),
  displayName: z.string().optional(),
  theme: z.string().optional(),
  language: z.string().optional(),
  dateFormat: z.string().optional(),
  timeFormat: z.string().optional(),
  password: z.string().optional(),
  preferences: z.record(z.string()).default({}),
  dashboard: dashboardSettingsSchema.optional(),
  clusterPermissions: z.array(z.object({ cluster: z.string().min(1), roles: z.array(z.string()) })).optional(),
});

export type UserSetting = z.infer<typeof userSettingSchema>;

export function defaultSetting(username: string): UserSetting {
  return {
    username,
    theme: 'light',
    language: 'en',
    dateFormat: 'MM/DD/YYYY',
    timeFormat: '12h',
    preferences: {},
    dashboard: { defaultView: 'clusters', refreshInterval: 30 },
  };
}

/** Setting as stored: no password, neither top-level nor in preferences. */
function withoutPassword(setting: UserSetting): UserSetting {
  const { password: _password, ...rest } = setting;
  const { password: _preference, ...preferences } = setting.preferences;
  return { ...rest, preferences };
}

const hasClusterPermissions = (setting: UserSetting) => (setting.clusterPermissions ?? []).length > 0;

const settingKey = (username: string) => `${SETTING_KEY_PREFIX}${username}`;

/** Who is saving a setting. Only privileged callers may change roles or cluster permissions. */
export interface SettingActor {
  privileged: boolean;
}

/**
 * Per-user dashboard settings in etcd. Saving a setting also creates or
 * updates the user it belongs to and grants the requested permissions.
 */
export class UserSettingService {
  constructor(
    private kv: KeyValueStore,
    private users: UserStoreService,
    private authz: AuthorizationService | null = null
  ) {}

  private async read(username: string): Promise<Result<UserSetting | null, AppError>> {
    try {
      const raw = await this.kv.get(settingKey(username));
      if (raw === null) return ok(null);
      const parsed = userSettingSchema.safeParse(JSON.parse(raw));
      return parsed.success
        ? ok(parsed.data)
        : err(SettingErrors.STORE_ERROR(`stored setting for ${username} is malformed`));
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
  }

  private async write(setting: UserSetting): Promise<Result<UserSetting, AppError>> {
    const stored = withoutPassword(setting);
    try {
      await this.kv.put(settingKey(stored.username), JSON.stringify(stored));
      return ok(stored);
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
  }

  /** Stored setting or the defaults, with `preferences.role` filled from the user record. */
  async get(username: string): Promise<Result<UserSetting, AppError>> {
    const stored = await this.read(username);
    if (!stored.ok) return stored;
    const setting = stored.value ?? defaultSetting(username);

    if (!setting.preferences.role) {
      const user = await this.users.get(username);
      if (user.ok && user.value) {
        setting.preferences = { ...setting.preferences, role: user.value.role };
      }
    }
    return ok(setting);
  }

  async create(setting: UserSetting, actor: SettingActor): Promise<Result<UserSetting, AppError>> {
    const password = setting.password || setting.preferences.password;
    if (!password) return err(SettingErrors.PASSWORD_REQUIRED);

    const requested = setting.preferences.role;
    if (requested && !userRoleSchema.safeParse(requested).success) return err(SettingErrors.INVALID_ROLE(requested));
    const email = setting.preferences.email ?? '';

    const existing = await this.users.get(setting.username);
    if (!existing.ok) return existing;

    const currentRole = existing.value?.role ?? 'basic_user';
    const role = requested || (actor.privileged ? 'basic_user' : currentRole);
    if (!actor.privileged && (role !== currentRole || hasClusterPermissions(setting))) {
      return err(SettingErrors.PRIVILEGE_REQUIRED);
    }
    const saved = existing.value
      ? await this.users.update(setting.username, {
          role,
          password,
          email: email || undefined,
        })
      : await this.users.create(setting.username, password, email, role);
    if (!saved.ok) return saved;
    log.info(existing.value ? 'User updated' : 'User created', { data: { username: setting.username, role } });

    await this.grant(saved.value, setting);
    return this.write(setting);
  }

  async update(setting: UserSetting, actor: SettingActor): Promise<Result<UserSetting, AppError>> {
    const user = await this.users.get(setting.username);
    if (!user.ok) return user;
    if (!user.value) return err(SettingErrors.USER_NOT_FOUND(setting.username));

    const current = await this.read(setting.username);
    if (!current.ok) return current;
    if (!current.value) return err(SettingErrors.NOT_FOUND(setting.username));

    const role = setting.preferences.role;
    if (role && !userRoleSchema.safeParse(role).success) return err(SettingErrors.INVALID_ROLE(role));
    if (!actor.privileged && ((role && role !== user.value.role) || hasClusterPermissions(setting))) {
      return err(SettingErrors.PRIVILEGE_REQUIRED);
    }

    const password = setting.password || setting.preferences.password;
    const updated = await this.users.update(setting.username, {
      role: role || undefined,
      email: setting.preferences.email,
      password: password || undefined,
    });
    if (!updated.ok) return updated;

    await this.grant(updated.value, setting);
    return this.write(setting);
  }

  /** Remove the setting (if any) and the user. */
  async delete(username: string): Promise<Result<void, AppError>> {
    try {
      const removed = await this.kv.delete(settingKey(username));
      if (!removed) log.info('User setting not found, deleting user only', { data: { username } });
    } catch (error) {
      return err(SettingErrors.STORE_ERROR(errorMessage(error)));
    }
    const deleted = await this.users.delete(username);
    if (!deleted.ok) return deleted;
    log.info('User deleted', { data: { username } });
    return ok(undefined);
  }

  /** Every user merged with its settings. */
  async listUsers(): Promise<Result<UserSetting[], AppError>> {
    const users = await this.users.list();
    if (!users.ok) return users;

    const result: UserSetting[] = [];
    for (const user of users.value) {
      const setting = await this.read(user.username);
      if (!setting.ok) {
        log.error('Failed to read user setting', { data: { username: user.username }, error: setting.error.message });
        continue;
      }
      const merged = setting.value ?? defaultSetting(user.username);
      const preferences: Record<string, string> = { ...merged.preferences, role: user.role };
      if (user.email) preferences.email = user.email;
      result.push({
        ...merged,
        preferences,
        displayName: merged.displayName || user.email || undefined,
      });
    }
    return ok(result);
  }

  private async grant(user: UserRecord, setting: UserSetting): Promise<void> {
    const authz = this.authz;
    if (!authz) return;

    if (user.role === 'admin') {
      const granted = await authz.grantDashboardRole(user.username, 'admin');
      if (!granted.ok) {
        log.error('Failed to grant dashboard admin', { data: { username: user.username }, error: granted.error.message });
      }
    }

    for (const permission of setting.clusterPermissions ?? []) {
      for (const role of permission.roles) {
        if (!isClusterRelation(role)) {
          log.debug('Skipping unknown cluster role', { data: { username: user.username, role } });
          continue;
        }
        const granted = await authz.grantClusterRelation(user.username, role, permission.cluster);
        if (!granted.ok) {
          log.error('Failed to set cluster permission', {
            data: { username: user.username, cluster: permission.cluster, role },
            error: granted.error.message,
          });
        }
      }
    }
  }
}
