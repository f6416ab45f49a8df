import { Clock, systemClock } from '../../shared/clock';
import { errorMessage } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';
import { Role, Service } from '../../shared/types';
import { RegistryStore } from '../store/registryStore';
import { buildSnapshot, matchRoute, RegisteredResource, RegistrySnapshot } from './snapshot';

const log = componentLogger('registry');

export type LookupResult =
  | {
      status: 'found';
      service: Readonly<Service>;
      resource: RegisteredResource;
      requiredRoles: readonly Role[];
      path: string;
      snapshotVersion: number;
    }
  | { status: 'not_found'; reason: 'service' | 'resource' }
  | { status: 'unavailable' };

export type RefreshResult =
  | { ok: true; version: number }
  | { ok: false; error: string };

export interface RegistryStatus {
  ready: boolean;
  version: number | null;
  fetchedAt: number | null;
  stale: boolean;
  lastError: string | null;
  lastErrorAt: number | null;
  consecutiveFailures: number;
}

export interface RegistryCacheOptions {
  refreshIntervalMs: number;
  ttlMs: number;
  clock?: Clock;
}

/**
 * Read-mostly view of the registry.
 *
 * Readers only dereference `current`; the refresher is the sole writer and
 * replaces it in one assignment after a fetch has fully succeeded. A reader
 * that grabbed the previous snapshot keeps a complete, frozen object.
 */
export class RegistryCache {
  private current: RegistrySnapshot | null = null;
  private nextVersion = 1;
  private inFlight: Promise<RefreshResult> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private abortController: AbortController | null = null;
  private lastError: string | null = null;
  private lastErrorAt: number | null = null;
  private consecutiveFailures = 0;
  private readonly clock: Clock;

  constructor(
    private readonly store: RegistryStore,
    private readonly options: RegistryCacheOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  lookup(serviceName: string, resourcePath: string, method: string): LookupResult {
    const snapshot = this.current;
    if (!snapshot) {
      return { status: 'unavailable' };
    }

    const match = matchRoute(snapshot, serviceName, resourcePath, method);
    if (match.status === 'not_found') {
      return match;
    }
    return { ...match, snapshotVersion: snapshot.version };
  }

  /**
   * Fetches the whole registry and installs it if, and only if, the fetch and
   * validation both succeed. Calls made while a refresh is running join it.
   */
  refresh(): Promise<RefreshResult> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runRefresh(): Promise<RefreshResult> {
    const controller = new AbortController();
    this.abortController = controller;

    try {
      const records = await this.store.fetchAll(controller.signal);
      if (controller.signal.aborted) {
        return this.recordFailure(new Error('Registry refresh aborted'));
      }

      const snapshot = buildSnapshot(records, this.nextVersion, this.clock.now());
      this.nextVersion += 1;
      this.current = snapshot;
      this.consecutiveFailures = 0;

      log.debug('Registry snapshot installed', {
        version: snapshot.version,
        services: snapshot.serviceCount,
        resources: snapshot.resourceCount,
      });
      return { ok: true, version: snapshot.version };
    } catch (error) {
      return this.recordFailure(error);
    } finally {
      if (this.abortController === controller) {
        this.abortController = null;
      }
    }
  }

  private recordFailure(error: unknown): RefreshResult {
    const message = errorMessage(error);
    this.lastError = message;
    this.lastErrorAt = this.clock.now();
    this.consecutiveFailures += 1;

    log.warn('Registry refresh failed, keeping previous snapshot', {
      error: message,
      servingVersion: this.current?.version ?? null,
      consecutiveFailures: this.consecutiveFailures,
    });
    return { ok: false, error: message };
  }

  /** Refreshes immediately, then on every interval tick until `stop`. */
  start(): Promise<RefreshResult> {
    if (!this.timer) {
      this.timer = setInterval(() => {
        void this.refresh();
      }, this.options.refreshIntervalMs);
      this.timer.unref();
    }
    return this.refresh();
  }

  /**
   * Stops the schedule and abandons a running fetch. The abandoned fetch never
   * installs anything, so the current snapshot stays as it was.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isReady(): boolean {
    return this.current !== null;
  }

  status(): RegistryStatus {
    const snapshot = this.current;
    return {
      ready: snapshot !== null,
      version: snapshot?.version ?? null,
      fetchedAt: snapshot?.fetchedAt ?? null,
      stale: snapshot !== null && this.clock.now() - snapshot.fetchedAt > this.options.ttlMs,
      lastError: this.lastError,
      lastErrorAt: this.lastErrorAt,
      consecutiveFailures: this.consecutiveFailures,
    };
  }
}
