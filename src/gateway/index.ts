import cookieParser from 'cookie-parser';
import express, { Express } from 'express';
import { Clock, systemClock } from '../shared/clock';
import { config as defaultConfig, GatewayConfig } from '../shared/config';
import { errorDetails } from '../shared/errors';
import { logger } from '../shared/logger';
import { HttpIdentityBackend, IdentityBackend } from './egress/identityClient';
import { ProxyForwarder } from './egress/forwarder';
import { CredentialCookieSettings, credentialCookieNames } from './middleware/credentials';
import { errorHandler } from './middleware/errorHandler';
import { GatewayPipeline } from './middleware/proxyPipeline';
import { RegistryCache } from './registry/registryCache';
import { createAuthRoutes } from './routes/auth';
import { InMemoryRegistryStore, RedisRegistryStore, RegistryStore } from './store/registryStore';
import {
  InMemoryRefreshTokenStore,
  RedisRefreshTokenStore,
  RefreshTokenStore,
} from './store/refreshTokenStore';
import { TokenAuthority } from './token/tokenAuthority';

export interface GatewayDeps {
  config: GatewayConfig;
  registryStore: RegistryStore;
  refreshTokenStore: RefreshTokenStore;
  identity: IdentityBackend;
  clock?: Clock;
}

export interface Gateway {
  app: Express;
  registry: RegistryCache;
  tokens: TokenAuthority;
  pipeline: GatewayPipeline;
}

export function createGateway(deps: GatewayDeps): Gateway {
  const { config } = deps;
  const clock = deps.clock ?? systemClock;
  const cookies: CredentialCookieSettings = config.cookies;

  const registry = new RegistryCache(deps.registryStore, {
    refreshIntervalMs: config.registry.refreshIntervalMs,
    ttlMs: config.registry.ttlMs,
    clock,
  });

  const tokens = new TokenAuthority(deps.refreshTokenStore, {
    jwtSecret: config.tokens.jwtSecret,
    issuer: config.tokens.jwtIssuer,
    audience: config.tokens.jwtAudience,
    accessTtlSeconds: config.tokens.accessTtlSeconds,
    refreshTtlSeconds: config.tokens.refreshTtlSeconds,
    reuseRevokesFamily: config.tokens.reuseRevokesFamily,
    clock,
  });

  const forwarder = new ProxyForwarder({
    timeoutMs: config.proxy.timeoutMs,
    retries: config.proxy.retries,
    retryBackoffMs: config.proxy.retryBackoffMs,
    strippedCookies: credentialCookieNames(cookies),
  });

  const pipeline = new GatewayPipeline({
    registry,
    tokens,
    forwarder,
    rolePolicy: config.authz.rolePolicy,
    cookies,
    clock,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(cookieParser());

  // Gateway-owned routes; everything else is resolved against the registry
  app.get('/health', (_req, res) => {
    const status = registry.status();
    res.status(status.ready ? 200 : 503).json({
      status: !status.ready ? 'warming' : status.stale ? 'stale' : 'ok',
      service: 'gateway',
      registry: status,
    });
  });
  app.use('/auth', createAuthRoutes({ tokens, identity: deps.identity, cookies, clock }));

  // ANY /{service}/{resourcePath...} - no body parser on this path, bodies stream through
  app.use(pipeline.middleware());
  app.use(errorHandler);

  return { app, registry, tokens, pipeline };
}

function createStores(config: GatewayConfig): { registryStore: RegistryStore; refreshTokenStore: RefreshTokenStore } {
  if (config.storage.driver === 'memory') {
    return {
      registryStore: new InMemoryRegistryStore(),
      refreshTokenStore: new InMemoryRefreshTokenStore(),
    };
  }
  return {
    registryStore: new RedisRegistryStore(config.storage.redisUrl),
    refreshTokenStore: new RedisRefreshTokenStore(config.storage.redisUrl),
  };
}

async function start(): Promise<void> {
  const config = defaultConfig;
  const { registryStore, refreshTokenStore } = createStores(config);
  await registryStore.connect();
  await refreshTokenStore.connect();

  const gateway = createGateway({
    config,
    registryStore,
    refreshTokenStore,
    identity: new HttpIdentityBackend(config.identity),
  });

  // Proxy traffic is answered with 503 until this first refresh lands
  const first = await gateway.registry.start();
  if (!first.ok) {
    logger.warn('Initial registry refresh failed; retrying on schedule', { error: first.error });
  }

  const server = gateway.app.listen(config.gateway.port, () => {
    logger.info(`Gateway listening on port ${config.gateway.port}`, { storage: config.storage.driver });
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    await gateway.registry.stop();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await Promise.all([registryStore.disconnect(), refreshTokenStore.disconnect()]);
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Shutdown failed', errorDetails(error));
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  start().catch(error => {
    logger.error('Gateway failed to start', errorDetails(error));
    process.exit(1);
  });
}
