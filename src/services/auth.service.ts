import { decodeProtectedHeader, jwtVerify, SignJWT } from 'jose';
import { z } from 'zod';
import type { AuthUser } from '../lib/api/auth-middleware.js';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { AuthErrors } from '../lib/errors/auth-errors.js';
import { fromKubernetesError } from '../lib/errors/k8s-errors.js';
import type { ClusterConnector } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import type { KeyValueStore } from '../lib/storage/kv-store.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';
import { hasAdminRole, type KeycloakService } from './keycloak.service.js';
import type { UserStoreService } from './user-store.service.js';

const log = createLogger('AuthService');

export const JWT_ISSUER = 'karmada-dashboard-api';
export const TOKEN_TTL_SECONDS = 24 * 60 * 60;
export const LOGIN_TIMEOUT_MS = 5000;
export const SERVICE_ACCOUNT_TOKEN_KEY = 'karmada-dashboard/service-account-token';

const claimsSchema = z.object({
  username: z.string().min(1),
  role: z.string().default(''),
});

export interface LoginResult {
  token: string;
  username: string;
  role: string;
}

export interface MeResult {
  authenticated: true;
  initToken: boolean;
  user: { username: string; name: string; role: string };
}

export interface AuthServiceDeps {
  jwtSecret: string;
  keycloak: KeycloakService;
  connector: ClusterConnector;
  /** Absent when etcd could not be reached at startup. */
  users?: UserStoreService | null;
  kv?: KeyValueStore | null;
}

const RSA_ALGORITHMS = new Set(['RS256', 'RS384', 'RS512']);

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | 'timeout'> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function signingAlgorithm(token: string): string | undefined {
  try {
    return decodeProtectedHeader(token).alg;
  } catch {
    return undefined;
  }
}

export class AuthService {
  private secret: Uint8Array;

  constructor(private deps: AuthServiceDeps) {
    this.secret = new TextEncoder().encode(deps.jwtSecret);
  }

  get passwordLoginEnabled(): boolean {
    return Boolean(this.deps.users);
  }

  async issueToken(username: string, role: string): Promise<string> {
    return new SignJWT({ username, role })
      .setProtectedHeader({ alg: 'HS256' })
      .setIssuer(JWT_ISSUER)
      .setSubject(username)
      .setIssuedAt()
      .setExpirationTime(`${TOKEN_TTL_SECONDS}s`)
      .sign(this.secret);
  }

  async verifyToken(token: string): Promise<Result<z.infer<typeof claimsSchema>, AppError>> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        issuer: JWT_ISSUER,
        algorithms: ['HS256'],
      });
      const claims = claimsSchema.safeParse(payload);
      return claims.success ? ok(claims.data) : err(AuthErrors.INVALID_TOKEN);
    } catch (error) {
      log.debug('Dashboard token rejected', { error });
      return err(AuthErrors.INVALID_TOKEN);
    }
  }

  async login(username: string, password: string): Promise<Result<LoginResult, AppError>> {
    if (!username || !password) return err(AuthErrors.NO_AUTH_METHOD);
    const users = this.deps.users;
    if (!users) return err(AuthErrors.PASSWORD_AUTH_DISABLED);

    const verified = await withTimeout(users.verifyPassword(username, password), LOGIN_TIMEOUT_MS);
    if (verified === 'timeout') {
      log.warn('Password verification timed out', { data: { username } });
      return err(AuthErrors.LOGIN_TIMEOUT);
    }
    if (!verified.ok) {
      log.error('Password verification failed', { data: { username }, error: verified.error.message });
      return err(AuthErrors.INVALID_CREDENTIALS);
    }
    if (!verified.value) return err(AuthErrors.INVALID_CREDENTIALS);

    const role = verified.value.role;
    const token = await this.issueToken(username, role);
    log.info('User logged in', { data: { username, role } });
    return ok({ token, username, role });
  }

  /** Resolve a bearer token: a valid Keycloak token wins, then the dashboard JWT. */
  async authenticate(token: string): Promise<Result<AuthUser, AppError>> {
    const { keycloak } = this.deps;
    if (keycloak.enabled) {
      const identity = keycloak.validateToken(token);
      if (identity.ok) {
        return ok({
          username: identity.value.username,
          role: identity.value.isAdmin ? 'admin' : 'basic_user',
          source: 'keycloak',
          roles: identity.value.roles,
        });
      }
    }

    const claims = await this.verifyToken(token);
    if (!claims.ok) return claims;
    return ok({
      username: claims.value.username,
      role: await this.resolveRole(claims.value.username, claims.value.role),
      source: 'jwt',
      roles: [],
    });
  }

  async me(token: string | undefined): Promise<Result<MeResult, AppError>> {
    if (!token) return err(AuthErrors.MISSING_TOKEN);

    const { keycloak } = this.deps;
    if (keycloak.enabled) {
      const identity = keycloak.validateToken(token);
      if (identity.ok) {
        const { username, roles } = identity.value;
        return ok({
          authenticated: true,
          initToken: true,
          user: { username, name: username, role: hasAdminRole(roles) ? 'admin' : 'basic_user' },
        });
      }
      const alg = signingAlgorithm(token);
      if (alg && RSA_ALGORITHMS.has(alg)) {
        return err(AuthErrors.TOKEN_VALIDATION_FAILED);
      }
    }

    const claims = await this.verifyToken(token);
    if (!claims.ok) return claims;

    const { username } = claims.value;
    return ok({
      authenticated: true,
      initToken: await this.hasValidServiceAccountToken(),
      user: { username, name: username, role: await this.resolveRole(username, claims.value.role) },
    });
  }

  /** Validate a service-account token against the Karmada API server and store it. */
  async initToken(token: string): Promise<Result<{ success: true; message: string }, AppError>> {
    if (!token) return err(AuthErrors.NO_AUTH_METHOD);
    const kv = this.deps.kv;
    if (!kv) return err(AuthErrors.PASSWORD_AUTH_DISABLED);

    try {
      const version = await this.deps.connector.withToken(token).serverVersion();
      log.info('Service account token accepted', { data: { version } });
    } catch (error) {
      return err(AuthErrors.SERVICE_ACCOUNT_TOKEN_INVALID(fromKubernetesError(error).message));
    }

    try {
      await kv.put(SERVICE_ACCOUNT_TOKEN_KEY, token);
    } catch (error) {
      return err(AuthErrors.SERVICE_ACCOUNT_TOKEN_INVALID(errorMessage(error)));
    }
    return ok({ success: true, message: 'Token initialized successfully' });
  }

  async hasValidServiceAccountToken(): Promise<boolean> {
    const kv = this.deps.kv;
    if (!kv) return false;
    try {
      const token = await kv.get(SERVICE_ACCOUNT_TOKEN_KEY);
      if (!token) return false;
      await this.deps.connector.withToken(token).serverVersion();
      return true;
    } catch (error) {
      log.debug('Stored service account token is not usable', { error });
      return false;
    }
  }

  private async resolveRole(username: string, claimedRole: string): Promise<string> {
    if (claimedRole) return claimedRole;
    const users = this.deps.users;
    if (!users) return 'basic_user';
    const user = await users.get(username);
    return user.ok && user.value ? user.value.role : 'basic_user';
  }
}
