import { RegistryRecords, Resource, Role, Service } from '../../shared/types';

const SERVICE_NAME = /^[A-Za-z0-9._~-]+$/;

const DOT_SEGMENTS = new Set(['.', '..']);

export const ANY_METHOD = '*';

export class RegistryValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryValidationError';
  }
}

export interface RegisteredResource {
  readonly id: string;
  readonly serviceId: string;
  readonly path: string;
  readonly method: string;
  readonly requiredRoles: readonly Role[];
}

interface RouteEntry {
  readonly resource: RegisteredResource;
  readonly method: string;
  readonly segments: readonly string[];
  readonly isPattern: boolean;
}

interface ServiceRoutes {
  readonly service: Readonly<Service>;
  readonly exact: ReadonlyMap<string, RouteEntry>;
  readonly patterns: readonly RouteEntry[];
}

/**
 * One immutable generation of the registry. Built wholesale from a complete
 * fetch and never mutated afterwards.
 */
export interface RegistrySnapshot {
  readonly version: number;
  readonly fetchedAt: number;
  readonly serviceCount: number;
  readonly resourceCount: number;
  readonly routes: ReadonlyMap<string, ServiceRoutes>;
}

export type RouteMatch =
  | {
      status: 'found';
      service: Readonly<Service>;
      resource: RegisteredResource;
      requiredRoles: readonly Role[];
      /** The normalized path the match was made on; the only path that may be forwarded. */
      path: string;
    }
  | { status: 'not_found'; reason: 'service' | 'resource' };

function splitPath(path: string): string[] {
  return path.split('/').filter(Boolean);
}

/**
 * Path segments, or null when a segment, raw or percent-decoded, is a dot
 * segment or hides a separator. URL resolution downstream would rewrite such a
 * path into one other than the one that was matched.
 */
export function safeSegments(path: string): string[] | null {
  const segments = splitPath(path);
  for (const segment of segments) {
    let decoded: string;
    try {
      decoded = decodeURIComponent(segment);
    } catch {
      return null;
    }
    if (DOT_SEGMENTS.has(decoded) || decoded.includes('/') || decoded.includes('\\')) {
      return null;
    }
  }
  return segments;
}

export function normalizeMethod(method: string): string {
  const upper = method.trim().toUpperCase();
  return upper === 'ANY' ? ANY_METHOD : upper;
}

function exactKey(method: string, path: string): string {
  return `${method} ${path}`;
}

function validateService(service: Service, seen: Set<string>): void {
  if (!SERVICE_NAME.test(service.name) || DOT_SEGMENTS.has(service.name)) {
    throw new RegistryValidationError(`Service ${service.id} has an invalid name "${service.name}"`);
  }
  if (seen.has(service.name)) {
    throw new RegistryValidationError(`Duplicate service name "${service.name}"`);
  }

  let url: URL;
  try {
    url = new URL(service.baseUrl);
  } catch {
    throw new RegistryValidationError(`Service ${service.name} has an invalid base URL`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RegistryValidationError(`Service ${service.name} must use http or https`);
  }
}

function compileRoute(resource: Resource): RouteEntry {
  const segments = safeSegments(resource.path);
  if (!segments) {
    throw new RegistryValidationError(`Resource ${resource.id} has a dot segment in its path`);
  }
  const starAt = segments.indexOf('*');
  if (starAt !== -1 && starAt !== segments.length - 1) {
    throw new RegistryValidationError(`Resource ${resource.id}: '*' is only allowed as the last segment`);
  }
  if (!resource.method.trim()) {
    throw new RegistryValidationError(`Resource ${resource.id} has no method`);
  }

  const frozen: RegisteredResource = Object.freeze({
    id: resource.id,
    serviceId: resource.serviceId,
    path: '/' + segments.join('/'),
    method: normalizeMethod(resource.method),
    requiredRoles: Object.freeze([...new Set(resource.requiredRoles)]),
  });

  return Object.freeze({
    resource: frozen,
    method: frozen.method,
    segments: Object.freeze(segments),
    isPattern: segments.some(segment => segment === '*' || segment.startsWith(':')),
  });
}

/**
 * Builds a snapshot from a full registry fetch. Throws RegistryValidationError
 * when the records are inconsistent, so a bad fetch never replaces a good one.
 */
export function buildSnapshot(records: RegistryRecords, version: number, fetchedAt: number): RegistrySnapshot {
  const seenNames = new Set<string>();
  const byId = new Map<string, { service: Readonly<Service>; exact: Map<string, RouteEntry>; patterns: RouteEntry[] }>();

  for (const service of records.services) {
    validateService(service, seenNames);
    seenNames.add(service.name);
    byId.set(service.id, {
      service: Object.freeze({ ...service, baseUrl: service.baseUrl.replace(/\/+$/, '') }),
      exact: new Map(),
      patterns: [],
    });
  }

  for (const resource of records.resources) {
    const owner = byId.get(resource.serviceId);
    if (!owner) {
      throw new RegistryValidationError(
        `Resource ${resource.id} references unknown service ${resource.serviceId}`
      );
    }

    const entry = compileRoute(resource);
    const key = exactKey(entry.method, entry.resource.path);
    if (entry.isPattern) {
      if (owner.patterns.some(p => exactKey(p.method, p.resource.path) === key)) {
        throw new RegistryValidationError(`Duplicate route ${key} on service ${owner.service.name}`);
      }
      owner.patterns.push(entry);
    } else {
      if (owner.exact.has(key)) {
        throw new RegistryValidationError(`Duplicate route ${key} on service ${owner.service.name}`);
      }
      owner.exact.set(key, entry);
    }
  }

  const routes = new Map<string, ServiceRoutes>();
  for (const owner of byId.values()) {
    routes.set(owner.service.name, Object.freeze({
      service: owner.service,
      exact: owner.exact,
      patterns: Object.freeze(owner.patterns),
    }));
  }

  return Object.freeze({
    version,
    fetchedAt,
    serviceCount: records.services.length,
    resourceCount: records.resources.length,
    routes,
  });
}

function methodMatches(entry: RouteEntry, method: string): boolean {
  return entry.method === ANY_METHOD || entry.method === method;
}

function patternMatches(entry: RouteEntry, segments: readonly string[]): boolean {
  const pattern = entry.segments;
  for (let i = 0; i < pattern.length; i++) {
    const part = pattern[i];
    if (part === '*') {
      return true;
    }
    if (i >= segments.length) {
      return false;
    }
    if (!part.startsWith(':') && part !== segments[i]) {
      return false;
    }
  }
  return pattern.length === segments.length;
}

export function matchRoute(
  snapshot: RegistrySnapshot,
  serviceName: string,
  resourcePath: string,
  method: string
): RouteMatch {
  const owner = snapshot.routes.get(serviceName);
  if (!owner) {
    return { status: 'not_found', reason: 'service' };
  }

  const segments = safeSegments(resourcePath);
  if (!segments) {
    return { status: 'not_found', reason: 'resource' };
  }
  const verb = normalizeMethod(method);
  const path = '/' + segments.join('/');

  const entry =
    owner.exact.get(exactKey(verb, path)) ??
    owner.exact.get(exactKey(ANY_METHOD, path)) ??
    owner.patterns.find(p => methodMatches(p, verb) && patternMatches(p, segments));

  if (!entry) {
    return { status: 'not_found', reason: 'resource' };
  }

  return {
    status: 'found',
    service: owner.service,
    resource: entry.resource,
    requiredRoles: entry.resource.requiredRoles,
    path,
  };
}
