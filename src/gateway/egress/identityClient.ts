import { errorMessage, GatewayError } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';
import { Role } from '../../shared/types';

const log = componentLogger('identity');

export type AuthenticationResult =
  | { ok: true; subjectId: string; roles: Role[] }
  | { ok: false };

/** The credential-issuing backend reached on the login path. */
export interface IdentityBackend {
  authenticate(login: string, password: string): Promise<AuthenticationResult>;
}

export interface HttpIdentityBackendOptions {
  url: string;
  timeoutMs: number;
}

function parseIdentity(body: unknown): AuthenticationResult | null {
  if (typeof body !== 'object' || body === null) return null;
  const subjectId = 'subjectId' in body ? body.subjectId : undefined;
  const roles = 'roles' in body ? body.roles : undefined;
  if (typeof subjectId !== 'string' || !subjectId) return null;
  if (!Array.isArray(roles) || !roles.every(role => typeof role === 'string')) return null;
  return { ok: true, subjectId, roles };
}

/**
 * Calls the identity backend over HTTP: POST {login, password} → {subjectId, roles}.
 * Login is not idempotent, so there is a timeout but no retry.
 */
export class HttpIdentityBackend implements IdentityBackend {
  constructor(private readonly options: HttpIdentityBackendOptions) {}

  async authenticate(login: string, password: string): Promise<AuthenticationResult> {
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ login, password }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        log.error('Identity backend timed out', { timeoutMs: this.options.timeoutMs });
        throw new GatewayError('GATEWAY_TIMEOUT', 'Identity backend timed out', { cause: error });
      }
      log.error('Identity backend unreachable', { error: errorMessage(error) });
      throw new GatewayError('BAD_GATEWAY', 'Identity backend unreachable', { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      return { ok: false };
    }
    if (!response.ok) {
      log.error('Identity backend returned an error', { status: response.status });
      throw new GatewayError('BAD_GATEWAY', `Identity backend returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GatewayError('BAD_GATEWAY', 'Identity backend returned invalid JSON', { cause: error });
    }

    const identity = parseIdentity(body);
    if (!identity) {
      throw new GatewayError('BAD_GATEWAY', 'Identity backend returned an unexpected payload');
    }
    return identity;
  }
}
