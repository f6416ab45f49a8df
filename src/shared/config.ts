import { RolePolicy } from './types';

export type StorageDriver = 'memory' | 'redis';

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < min) {
    throw new Error(`${key} must be >= ${min}, got ${value}`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${key} must be true or false, got "${raw}"`);
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const match = choices.find(choice => choice === raw);
  if (!match) {
    throw new Error(`${key} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: Env = process.env) {
  const isTest = env.NODE_ENV === 'test';
  const isProduction = env.NODE_ENV === 'production';

  const jwtSecret = env.JWT_SECRET || (isProduction ? '' : 'test-secret-key-for-gateway-tokens');
  if (!jwtSecret) {
    throw new Error('JWT_SECRET is required in production');
  }

  return {
    gateway: {
      port: readInt(env, 'PORT', 3000),
    },
    tokens: {
      jwtSecret,
      jwtIssuer: env.JWT_ISSUER || 'sso-gateway',
      jwtAudience: env.JWT_AUDIENCE || 'sso-gateway-clients',
      accessTtlSeconds: readInt(env, 'ACCESS_TOKEN_TTL_SECONDS', 900, 1),
      refreshTtlSeconds: readInt(env, 'REFRESH_TOKEN_TTL_SECONDS', 1209600, 1),
      // Reuse of a consumed refresh token revokes every token descended from the same login
      reuseRevokesFamily: readBool(env, 'REFRESH_REUSE_REVOKES_FAMILY', true),
    },
    authz: {
      rolePolicy: readChoice<RolePolicy>(env, 'ROLE_POLICY', ['any', 'all'], 'any'),
    },
    registry: {
      refreshIntervalMs: readInt(env, 'REFRESH_RESOURCES_INTERVAL_MS', 30000, 1),
      ttlMs: readInt(env, 'REFRESH_RESOURCES_TTL_MS', 120000, 1),
    },
    proxy: {
      timeoutMs: readInt(env, 'PROXY_TIMEOUT_MS', 10000, 1),
      retries: readInt(env, 'PROXY_RETRIES', 2),
      retryBackoffMs: readInt(env, 'PROXY_RETRY_BACKOFF_MS', 100),
    },
    identity: {
      url: env.IDENTITY_URL || 'http://localhost:4000/authenticate',
      timeoutMs: readInt(env, 'IDENTITY_TIMEOUT_MS', 5000, 1),
    },
    cookies: {
      accessName: env.ACCESS_COOKIE_NAME || 'access_token',
      refreshName: env.REFRESH_COOKIE_NAME || 'refresh_token',
      secure: readBool(env, 'COOKIE_SECURE', !isTest),
    },
    storage: {
      driver: readChoice<StorageDriver>(env, 'STORAGE_DRIVER', ['memory', 'redis'], isTest ? 'memory' : 'redis'),
      redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    },
    logLevel: env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
    isTest,
  };
}

export type GatewayConfig = ReturnType<typeof loadConfig>;

export const config: GatewayConfig = loadConfig();
