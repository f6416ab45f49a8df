import express, { NextFunction, Request, Response, Router } from 'express';
import { Clock, systemClock } from '../../shared/clock';
import { GatewayError } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';
import { IdentityBackend } from '../egress/identityClient';
import {
  clearCredentialCookies,
  CredentialCookieSettings,
  readCredentials,
  setCredentialCookies,
} from '../middleware/credentials';
import { TokenAuthority } from '../token/tokenAuthority';

const log = componentLogger('auth');

export interface AuthRouteDeps {
  tokens: TokenAuthority;
  identity: IdentityBackend;
  cookies: CredentialCookieSettings;
  clock?: Clock;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function wrap(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function readField(body: unknown, field: string): string | null {
  if (typeof body !== 'object' || body === null || !(field in body)) return null;
  const value: unknown = Object.getOwnPropertyDescriptor(body, field)?.value;
  return typeof value === 'string' && value ? value : null;
}

export function createAuthRoutes(deps: AuthRouteDeps): Router {
  const router = Router();
  const clock = deps.clock ?? systemClock;

  router.use(express.json({ limit: '16kb' }));

  // POST /auth/login - exchange login and password for a credential pair
  router.post('/login', wrap(async (req, res) => {
    const login = readField(req.body, 'login');
    const password = readField(req.body, 'password');
    if (!login || !password) {
      throw new GatewayError('BAD_REQUEST', 'login and password are required');
    }

    const identity = await deps.identity.authenticate(login, password);
    if (!identity.ok) {
      log.info('Login rejected', { login });
      throw new GatewayError('UNAUTHORIZED', 'Invalid login or password');
    }

    // SECURITY: roles come from the identity backend only, never from the request
    const tokens = await deps.tokens.issue(identity.subjectId, identity.roles);
    setCredentialCookies(res, tokens, deps.cookies, clock.now());
    log.info('Login succeeded', { subjectId: identity.subjectId, familyId: tokens.record.familyId });

    res.json({
      subjectId: identity.subjectId,
      roles: tokens.claims.roles,
      accessExpiresAt: tokens.accessExpiresAt,
    });
  }));

  // POST /auth/refresh - explicit rotation of the refresh cookie
  router.post('/refresh', wrap(async (req, res) => {
    const { refreshToken } = readCredentials(req, deps.cookies);
    if (!refreshToken) {
      throw new GatewayError('UNAUTHORIZED', 'Missing refresh token');
    }

    const rotation = await deps.tokens.rotate(refreshToken);
    if (!rotation.ok) {
      clearCredentialCookies(res, deps.cookies);
      throw new GatewayError('UNAUTHORIZED', `Refresh token ${rotation.reason}`);
    }

    setCredentialCookies(res, rotation.tokens, deps.cookies, clock.now());
    res.json({
      subjectId: rotation.tokens.claims.subjectId,
      roles: rotation.tokens.claims.roles,
      accessExpiresAt: rotation.tokens.accessExpiresAt,
    });
  }));

  // POST /auth/logout - revoke the refresh family and drop both cookies
  router.post('/logout', wrap(async (req, res) => {
    const { refreshToken } = readCredentials(req, deps.cookies);
    if (refreshToken) {
      const revoked = await deps.tokens.revokeToken(refreshToken);
      log.info('Logout', { revoked });
    }
    clearCredentialCookies(res, deps.cookies);
    res.status(204).end();
  }));

  return router;
}
