import { decodeJwt } from 'jose';
import { z } from 'zod';
import type { KeycloakConfig } from '../lib/config/schemas.js';
import type { AppError } from '../lib/errors/base.js';
import { AuthErrors } from '../lib/errors/auth-errors.js';
import { createLogger } from '../lib/logging/logger.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

const log = createLogger('Keycloak');

const ADMIN_ROLES = new Set(['admin', 'dashboard-admin']);

const rolesSchema = z.object({ roles: z.array(z.string()).default([]) });

const keycloakClaimsSchema = z.object({
  exp: z.number().optional(),
  preferred_username: z.string().optional(),
  email: z.string().optional(),
  realm_access: rolesSchema.optional(),
  resource_access: z.record(rolesSchema).optional(),
});

export interface KeycloakIdentity {
  username: string;
  email: string;
  roles: string[];
  isAdmin: boolean;
}

export type KeycloakPublicConfig =
  | { enabled: false }
  | {
      enabled: true;
      url: string;
      realm: string;
      clientId: string;
      redirectUri: string;
      logoutRedirectUri: string;
    };

export function hasAdminRole(roles: string[]): boolean {
  return roles.some((role) => ADMIN_ROLES.has(role.toLowerCase()));
}

/**
 * Reads identities out of Keycloak access tokens. Tokens are decoded and
 * checked for expiry; signatures are not verified here.
 */
export class KeycloakService {
  constructor(
    private config: KeycloakConfig,
    private now: () => number = Date.now
  ) {}

  get enabled(): boolean {
    return this.config.url !== undefined;
  }

  publicConfig(): KeycloakPublicConfig {
    if (!this.config.url) return { enabled: false };
    const base = this.config.frontendUrl.replace(/\/+$/, '');
    return {
      enabled: true,
      url: this.config.url,
      realm: this.config.realm,
      clientId: this.config.clientId,
      redirectUri: `${base}/callback`,
      logoutRedirectUri: `${base}/sign-out`,
    };
  }

  validateToken(token: string): Result<KeycloakIdentity, AppError> {
    if (!this.enabled) return err(AuthErrors.KEYCLOAK_NOT_CONFIGURED);

    let payload: unknown;
    try {
      payload = decodeJwt(token);
    } catch (error) {
      log.debug('Token is not a decodable JWT', { error });
      return err(AuthErrors.KEYCLOAK_INVALID_TOKEN);
    }

    const claims = keycloakClaimsSchema.safeParse(payload);
    if (!claims.success) return err(AuthErrors.KEYCLOAK_INVALID_TOKEN);

    const { exp, preferred_username, email, realm_access, resource_access } = claims.data;
    if (exp !== undefined && exp * 1000 <= this.now()) {
      return err(AuthErrors.KEYCLOAK_INVALID_TOKEN);
    }

    const username = preferred_username || email;
    if (!username) return err(AuthErrors.KEYCLOAK_INVALID_TOKEN);

    const roles = [
      ...(realm_access?.roles ?? []),
      ...Object.values(resource_access ?? {}).flatMap((access) => access.roles),
    ];

    return ok({ username, email: email ?? '', roles, isAdmin: hasAdminRole(roles) });
  }
}
