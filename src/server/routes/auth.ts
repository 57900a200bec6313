/**
 * Login, session and Keycloak routes. These are served without the
 * authentication middleware.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { bearerToken } from '../../lib/api/auth-middleware.js';
import { failureWithStatus, json, success } from '../../lib/api/response.js';
import { parseBody } from '../../lib/api/validation.js';
import { AuthErrors } from '../../lib/errors/auth-errors.js';
import { createLogger } from '../../lib/logging/logger.js';
import type { AuthService } from '../../services/auth.service.js';
import type { KeycloakService } from '../../services/keycloak.service.js';
import { respond, respondWithStatus, validationFailure } from '../shared.js';

const log = createLogger('AuthRoutes');

const loginSchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
});

const tokenSchema = z.object({ token: z.string().min(1) });

interface AuthDeps {
  auth: AuthService;
  keycloak: KeycloakService;
}

export function createAuthRoutes({ auth, keycloak }: AuthDeps) {
  const app = new Hono();

  // POST /api/v1/login
  app.post('/login', async (c) => {
    const body = await parseBody(c.req.raw, loginSchema);
    if (!body.ok || !body.value.username || !body.value.password) {
      return respondWithStatus(AuthErrors.NO_AUTH_METHOD);
    }

    const result = await auth.login(body.value.username, body.value.password);
    if (!result.ok) {
      log.warn('Login rejected', { requestId: c.get('requestId'), data: { username: body.value.username } });
      return respondWithStatus(result.error);
    }
    return c.json(success(result.value));
  });

  // GET /api/v1/me
  app.get('/me', async (c) => {
    const result = await auth.me(bearerToken(c.req.header('Authorization')));
    if (!result.ok) {
      return json(
        {
          code: result.error.status,
          message: result.error.message,
          data: { authenticated: false, initToken: false },
        },
        result.error.status
      );
    }
    return c.json(success(result.value));
  });

  // POST /api/v1/init-token
  app.post('/init-token', async (c) => {
    const body = await parseBody(c.req.raw, tokenSchema);
    if (!body.ok) return validationFailure(c, body.error);
    return respond(c, await auth.initToken(body.value.token));
  });

  app.get('/keycloak/config', (c) => c.json(success(keycloak.publicConfig())));

  app.get('/keycloak/callback', (c) => c.json(success({ code: c.req.query('code') ?? '' })));

  // POST /api/v1/keycloak/validate
  app.post('/keycloak/validate', async (c) => {
    if (!keycloak.enabled) return respondWithStatus(AuthErrors.KEYCLOAK_NOT_CONFIGURED);

    const body = await parseBody(c.req.raw, tokenSchema);
    if (!body.ok) return c.json(failureWithStatus(400, body.error.message), 400);

    const identity = keycloak.validateToken(body.value.token);
    if (!identity.ok) return respondWithStatus(identity.error);
    return c.json(success(identity.value));
  });

  return app;
}
