import Redis from 'ioredis';
import { RegistryRecords, Resource, Service } from '../../shared/types';
import { createRedisClient, RedisClientFactory } from './redisClient';

export interface RegistryStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Full enumeration of services and resources in one consistent read. */
  fetchAll(signal?: AbortSignal): Promise<RegistryRecords>;
}

function abortIfRequested(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Error('Registry fetch aborted');
  }
}

/**
 * Registry held in process. Admin tooling and tests write through `seed`;
 * reads return copies so a caller can never reach back into the store.
 */
export class InMemoryRegistryStore implements RegistryStore {
  private services: Map<string, Service> = new Map();
  private resources: Map<string, Resource> = new Map();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.reset();
  }

  async fetchAll(signal?: AbortSignal): Promise<RegistryRecords> {
    abortIfRequested(signal);
    return {
      services: [...this.services.values()].map(service => ({ ...service })),
      resources: [...this.resources.values()].map(resource => ({
        ...resource,
        requiredRoles: [...resource.requiredRoles],
      })),
    };
  }

  seed(records: Partial<RegistryRecords>): void {
    this.reset();
    for (const service of records.services ?? []) {
      this.services.set(service.id, { ...service });
    }
    for (const resource of records.resources ?? []) {
      this.resources.set(resource.id, { ...resource, requiredRoles: [...resource.requiredRoles] });
    }
  }

  reset(): void {
    this.services.clear();
    this.resources.clear();
  }
}

const SERVICES_KEY = 'registry:services';
const RESOURCES_KEY = 'registry:resources';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function readString(source: Record<string, unknown>, field: string, key: string): string {
  const value = source[field];
  if (typeof value !== 'string' || !value) {
    throw new Error(`Registry entry ${key} is missing "${field}"`);
  }
  return value;
}

function parseEntry(key: string, raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Registry entry ${key} is not valid JSON`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Registry entry ${key} is not an object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function parseServiceEntry(id: string, raw: string): Service {
  const entry = parseEntry(`service:${id}`, raw);
  return {
    id,
    name: readString(entry, 'name', id),
    baseUrl: readString(entry, 'baseUrl', id),
  };
}

export function parseResourceEntry(id: string, raw: string): Resource {
  const entry = parseEntry(`resource:${id}`, raw);
  const requiredRoles = entry.requiredRoles ?? [];
  if (!isStringArray(requiredRoles)) {
    throw new Error(`Registry entry resource:${id} has invalid requiredRoles`);
  }
  return {
    id,
    serviceId: readString(entry, 'serviceId', id),
    path: readString(entry, 'path', id),
    method: typeof entry.method === 'string' && entry.method ? entry.method : '*',
    requiredRoles,
  };
}

/**
 * Registry kept in two Redis hashes written by the admin surface:
 *   registry:services  id -> {"name","baseUrl"}
 *   registry:resources id -> {"serviceId","path","method","requiredRoles"}
 * Both hashes are read inside one MULTI so a fetch never mixes two admin writes.
 */
export class RedisRegistryStore implements RegistryStore {
  private client: Redis | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly createClient: RedisClientFactory = createRedisClient
  ) {}

  async connect(): Promise<void> {
    this.client = this.createClient(this.redisUrl);

    await this.client.ping();
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  async fetchAll(signal?: AbortSignal): Promise<RegistryRecords> {
    if (!this.client) throw new Error('Redis not connected');
    abortIfRequested(signal);

    const replies = await this.client.multi().hgetall(SERVICES_KEY).hgetall(RESOURCES_KEY).exec();
    abortIfRequested(signal);

    if (!replies || replies.length !== 2) {
      throw new Error('Registry transaction was discarded');
    }
    const [servicesReply, resourcesReply] = replies;
    if (servicesReply[0]) throw servicesReply[0];
    if (resourcesReply[0]) throw resourcesReply[0];

    return {
      services: Object.entries(toHash(servicesReply[1])).map(([id, raw]) => parseServiceEntry(id, raw)),
      resources: Object.entries(toHash(resourcesReply[1])).map(([id, raw]) => parseResourceEntry(id, raw)),
    };
  }
}

function toHash(reply: unknown): Record<string, string> {
  if (typeof reply !== 'object' || reply === null) {
    throw new Error('Unexpected HGETALL reply');
  }
  const hash: Record<string, string> = {};
  for (const [field, value] of Object.entries(reply)) {
    if (typeof value !== 'string') {
      throw new Error(`Unexpected value for registry field ${field}`);
    }
    hash[field] = value;
  }
  return hash;
}
