import { NextFunction, Request, RequestHandler, Response } from 'express';
import { Clock, systemClock } from '../../shared/clock';
import { GatewayError } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';
import { AccessClaims, IssuedTokens, Role, RolePolicy, Service } from '../../shared/types';
import { authorize } from '../authz/rbac';
import { ForwardResult, ProxyForwarder } from '../egress/forwarder';
import { RegistryCache } from '../registry/registryCache';
import { TokenAuthority, ValidationFailure } from '../token/tokenAuthority';
import {
  clearCredentialCookies,
  CredentialCookieSettings,
  readCredentials,
  setCredentialCookies,
} from './credentials';

const log = componentLogger('pipeline');

export interface PipelineDeps {
  registry: RegistryCache;
  tokens: TokenAuthority;
  forwarder: ProxyForwarder;
  rolePolicy: RolePolicy;
  cookies: CredentialCookieSettings;
  clock?: Clock;
}

export interface ProxyRoute {
  serviceName: string;
  resourcePath: string;
  query: string;
}

interface ResolvedResource {
  service: Readonly<Service>;
  requiredRoles: readonly Role[];
  /** Normalized resource path that was authorized and is forwarded. */
  path: string;
}

interface Authentication {
  claims: AccessClaims;
  rotated: IssuedTokens | null;
}

const VALIDATION_MESSAGES: Record<ValidationFailure, string> = {
  malformed: 'Malformed access token',
  invalid_signature: 'Invalid access token signature',
  expired: 'Access token expired',
};

/** Splits `/{service}/{resourcePath...}?query`; null when there is no service segment. */
export function parseProxyRoute(url: string): ProxyRoute | null {
  const queryAt = url.indexOf('?');
  const pathname = queryAt === -1 ? url : url.slice(0, queryAt);
  const query = queryAt === -1 ? '' : url.slice(queryAt);

  const match = /^\/+([^/]+)(\/.*)?$/.exec(pathname);
  if (!match) {
    return null;
  }
  return {
    serviceName: match[1],
    resourcePath: match[2] ?? '/',
    query,
  };
}

/**
 * Per-request decision sequence:
 * ResolveResource → AuthenticateToken (→ RotateIfExpired) → Authorize → Forward → Respond.
 * Each stage either hands its result to the next or throws a GatewayError,
 * after which nothing further runs and nothing is forwarded.
 */
export class GatewayPipeline {
  private readonly clock: Clock;

  constructor(private readonly deps: PipelineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  resolveResource(route: ProxyRoute, method: string): ResolvedResource {
    const lookup = this.deps.registry.lookup(route.serviceName, route.resourcePath, method);
    switch (lookup.status) {
      case 'unavailable':
        throw new GatewayError('UNAVAILABLE', 'Service registry is not loaded yet');
      case 'not_found':
        throw new GatewayError(
          'NOT_FOUND',
          lookup.reason === 'service' ? 'Unknown service' : 'Unknown resource'
        );
      case 'found':
        return { service: lookup.service, requiredRoles: lookup.requiredRoles, path: lookup.path };
    }
  }

  async authenticate(req: Request, res: Response): Promise<Authentication> {
    const { accessToken, refreshToken } = readCredentials(req, this.deps.cookies);

    if (accessToken) {
      const validation = await this.deps.tokens.validate(accessToken);
      if (validation.ok) {
        return { claims: validation.claims, rotated: null };
      }
      // Only an expired token may fall through to rotation
      if (validation.reason !== 'expired' || !refreshToken) {
        throw new GatewayError('UNAUTHORIZED', VALIDATION_MESSAGES[validation.reason]);
      }
    }

    if (!refreshToken) {
      throw new GatewayError('UNAUTHORIZED', 'Missing credentials');
    }

    const rotation = await this.deps.tokens.rotate(refreshToken);
    if (!rotation.ok) {
      clearCredentialCookies(res, this.deps.cookies);
      throw new GatewayError('UNAUTHORIZED', `Refresh token ${rotation.reason}`);
    }

    setCredentialCookies(res, rotation.tokens, this.deps.cookies, this.clock.now());
    return { claims: rotation.tokens.claims, rotated: rotation.tokens };
  }

  authorizeRequest(claims: AccessClaims, requiredRoles: readonly Role[]): void {
    if (authorize(claims.roles, requiredRoles, this.deps.rolePolicy) === 'deny') {
      throw new GatewayError('FORBIDDEN', 'Insufficient role permissions');
    }
  }

  async handle(req: Request, res: Response): Promise<ForwardResult> {
    const route = parseProxyRoute(req.url);
    if (!route) {
      throw new GatewayError('NOT_FOUND', 'Unknown service');
    }
    const method = req.method;

    const resolved = this.resolveResource(route, method);
    const { claims, rotated } = await this.authenticate(req, res);
    this.authorizeRequest(claims, resolved.requiredRoles);

    const result = await this.deps.forwarder.forward(req, res, {
      baseUrl: resolved.service.baseUrl,
      path: resolved.path,
      query: route.query,
      forwardedProto: req.protocol,
    });

    log.debug('Request forwarded', {
      service: route.serviceName,
      path: resolved.path,
      method,
      subjectId: claims.subjectId,
      rotated: rotated !== null,
      status: result.status,
      attempts: result.attempts,
    });
    return result;
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      this.handle(req, res).catch(next);
    };
  }
}
