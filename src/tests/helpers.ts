import http from 'http';
import * as jose from 'jose';
import { Response } from 'supertest';
import { v4 as uuidv4 } from 'uuid';
import { app as downstreamApp } from '../downstream/index';
import { IdentityBackend, AuthenticationResult } from '../gateway/egress/identityClient';
import { createGateway, Gateway } from '../gateway/index';
import { InMemoryRegistryStore } from '../gateway/store/registryStore';
import { InMemoryRefreshTokenStore } from '../gateway/store/refreshTokenStore';
import { createManualClock, ManualClock } from '../shared/clock';
import { GatewayConfig, loadConfig } from '../shared/config';
import { Role } from '../shared/types';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Record<string, string> = {}): GatewayConfig {
  return loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET: TEST_SECRET,
    PROXY_TIMEOUT_MS: '2000',
    PROXY_RETRIES: '2',
    PROXY_RETRY_BACKOFF_MS: '5',
    ...overrides,
  });
}

export class FakeIdentityBackend implements IdentityBackend {
  private users = new Map<string, { password: string; subjectId: string; roles: Role[] }>();
  calls = 0;

  addUser(login: string, password: string, subjectId: string, roles: Role[]): void {
    this.users.set(login, { password, subjectId, roles });
  }

  async authenticate(login: string, password: string): Promise<AuthenticationResult> {
    this.calls++;
    const user = this.users.get(login);
    if (!user || user.password !== password) {
      return { ok: false };
    }
    return { ok: true, subjectId: user.subjectId, roles: [...user.roles] };
  }
}

export interface TestGateway extends Gateway {
  registryStore: InMemoryRegistryStore;
  refreshTokenStore: InMemoryRefreshTokenStore;
  identity: FakeIdentityBackend;
  clock: ManualClock;
  config: GatewayConfig;
}

export function createTestGateway(overrides: Record<string, string> = {}): TestGateway {
  const config = testConfig(overrides);
  const registryStore = new InMemoryRegistryStore();
  const refreshTokenStore = new InMemoryRefreshTokenStore();
  const identity = new FakeIdentityBackend();
  const clock = createManualClock(new Date('2026-03-02T10:00:00Z'));

  const gateway = createGateway({ config, registryStore, refreshTokenStore, identity, clock });
  return { ...gateway, registryStore, refreshTokenStore, identity, clock, config };
}

export async function listen(handler: http.RequestListener): Promise<{ server: http.Server; baseUrl: string }> {
  const server = http.createServer(handler);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

export function startDownstream(): Promise<{ server: http.Server; baseUrl: string }> {
  return listen(downstreamApp);
}

export function close(server: http.Server): Promise<void> {
  return new Promise(resolve => {
    server.closeAllConnections();
    server.close(() => resolve());
  });
}

/** A port that nothing listens on. */
export async function unusedPort(): Promise<number> {
  const { server, baseUrl } = await listen((_req, res) => res.end());
  await close(server);
  return Number(new URL(baseUrl).port);
}

/**
 * Sends a GET with the request target written exactly as given. supertest
 * resolves `..` and `%2e%2e` before sending, so paths like these need this.
 */
export async function rawGet(
  handler: http.RequestListener,
  path: string,
  headers: http.OutgoingHttpHeaders = {}
): Promise<{ status: number; body: unknown }> {
  const { server, baseUrl } = await listen(handler);
  try {
    return await new Promise((resolve, reject) => {
      const req = http.request(
        { host: '127.0.0.1', port: Number(new URL(baseUrl).port), path, method: 'GET', headers, agent: false },
        res => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf8');
            let body: unknown = text;
            try {
              body = JSON.parse(text);
            } catch {
              // Non-JSON bodies are returned as text
            }
            resolve({ status: res.statusCode ?? 0, body });
          });
          res.on('error', reject);
        }
      );
      req.on('error', reject);
      req.end();
    });
  } finally {
    await close(server);
  }
}

/** name -> value of every Set-Cookie on a response; cleared cookies map to ''. */
export function responseCookies(res: Response): Record<string, string> {
  const raw: unknown = res.get('Set-Cookie');
  const lines = Array.isArray(raw) ? raw.map(String) : typeof raw === 'string' ? [raw] : [];
  const cookies: Record<string, string> = {};
  for (const line of lines) {
    const pair = line.split(';')[0];
    const eq = pair.indexOf('=');
    cookies[pair.slice(0, eq)] = decodeURIComponent(pair.slice(eq + 1));
  }
  return cookies;
}

export function cookieHeader(values: Record<string, string>): string {
  return Object.entries(values)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

export async function createForeignToken(secret: string, roles: Role[] = ['bank_read']): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  return new jose.SignJWT({ roles, fid: uuidv4() })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject('intruder')
    .setJti(uuidv4())
    .setIssuedAt(now)
    .setExpirationTime(now + 3600)
    .setIssuer('sso-gateway')
    .setAudience('sso-gateway-clients')
    .sign(new TextEncoder().encode(secret));
}

export function createAlgNoneToken(roles: Role[] = ['admin']): string {
  const now = Math.floor(Date.now() / 1000);
  const header = { alg: 'none', typ: 'JWT' };
  const payload = {
    sub: 'intruder',
    roles,
    fid: uuidv4(),
    jti: uuidv4(),
    iss: 'sso-gateway',
    aud: 'sso-gateway-clients',
    iat: now,
    exp: now + 3600,
  };

  const encodedHeader = Buffer.from(JSON.stringify(header)).toString('base64url');
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString('base64url');

  return `${encodedHeader}.${encodedPayload}.`;
}
