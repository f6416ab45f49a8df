import http, { IncomingHttpHeaders, IncomingMessage, OutgoingHttpHeaders, ServerResponse } from 'http';
import https from 'https';
import { Readable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { errorMessage, GatewayError } from '../../shared/errors';
import { componentLogger } from '../../shared/logger';

const log = componentLogger('proxy');

const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// Methods without request-body side effects; only these are ever retried
const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'TRACE']);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

export interface ForwarderOptions {
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
  /** Cookie names removed from the outbound Cookie header. */
  strippedCookies: readonly string[];
}

export interface ForwardTarget {
  baseUrl: string;
  path: string;
  query: string;
  forwardedProto?: string;
}

export interface ForwardResult {
  status: number;
  attempts: number;
  /** False when the downstream body broke off after the head was relayed. */
  completed: boolean;
}

type FailureKind = 'connect' | 'timeout' | 'other';

class UpstreamFailure extends Error {
  constructor(readonly kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamFailure';
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}

function classify(error: unknown): UpstreamFailure {
  if (error instanceof UpstreamFailure) {
    return error;
  }
  const code = errorCode(error);
  const kind: FailureKind = CONNECTION_ERROR_CODES.has(code) ? 'connect' : 'other';
  return new UpstreamFailure(kind, `${code || 'ERROR'}: ${errorMessage(error)}`, { cause: error });
}

export function isSafeMethod(method: string): boolean {
  return SAFE_METHODS.has(method.toUpperCase());
}

export function hasRequestBody(headers: IncomingHttpHeaders): boolean {
  if (headers['transfer-encoding'] !== undefined) return true;
  const length = headers['content-length'];
  return length !== undefined && length !== '0';
}

/** Drops the named cookies from a Cookie header; null when nothing is left. */
export function stripCookies(header: string, names: ReadonlySet<string>): string | null {
  const kept = header
    .split(';')
    .map(pair => pair.trim())
    .filter(pair => {
      if (!pair) return false;
      const eq = pair.indexOf('=');
      const name = (eq === -1 ? pair : pair.slice(0, eq)).trim();
      return !names.has(name);
    });
  return kept.length > 0 ? kept.join('; ') : null;
}

function connectionTokens(headers: IncomingHttpHeaders): Set<string> {
  const value = headers.connection;
  if (!value) return new Set();
  return new Set(value.split(',').map(token => token.trim().toLowerCase()).filter(Boolean));
}

export function buildOutboundHeaders(
  req: IncomingMessage,
  strippedCookies: ReadonlySet<string>,
  forwardedProto: string
): OutgoingHttpHeaders {
  const listed = connectionTokens(req.headers);
  const out: OutgoingHttpHeaders = {};

  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    const lower = name.toLowerCase();
    if (HOP_BY_HOP.has(lower) || listed.has(lower) || lower === 'host') continue;

    if (lower === 'cookie' && typeof value === 'string') {
      const remaining = stripCookies(value, strippedCookies);
      if (remaining !== null) out[name] = remaining;
      continue;
    }
    out[name] = value;
  }

  // Chunked bodies are re-framed by the outbound request
  if (req.headers['transfer-encoding'] !== undefined) {
    delete out['content-length'];
  }

  const priorFor = req.headers['x-forwarded-for'];
  const prior = Array.isArray(priorFor) ? priorFor.join(', ') : priorFor ?? '';
  const address = req.socket.remoteAddress ?? '';
  out['x-forwarded-for'] = prior && address ? `${prior}, ${address}` : prior || address;
  if (req.headers.host) out['x-forwarded-host'] = req.headers.host;
  out['x-forwarded-proto'] = forwardedProto;

  return out;
}

function buildResponseHeaders(upstream: IncomingMessage, res: ServerResponse): OutgoingHttpHeaders {
  const listed = connectionTokens(upstream.headers);
  const out: OutgoingHttpHeaders = {};

  for (const [name, value] of Object.entries(upstream.headers)) {
    if (value === undefined) continue;
    const lower = name.toLowerCase();
    if (HOP_BY_HOP.has(lower) || listed.has(lower)) continue;
    out[name] = value;
  }

  // Rotated credential cookies set by the pipeline go out alongside the downstream's own
  const pending = res.getHeader('set-cookie');
  if (pending !== undefined) {
    const ours = Array.isArray(pending) ? pending : [String(pending)];
    const theirs = upstream.headers['set-cookie'] ?? [];
    out['set-cookie'] = [...ours, ...theirs];
  }

  return out;
}

export function buildTargetUrl(target: ForwardTarget): URL {
  const base = target.baseUrl.replace(/\/+$/, '');
  const path = target.path.startsWith('/') ? target.path : `/${target.path}`;
  return new URL(`${base}${path}${target.query}`);
}

/**
 * Transparent streaming pass-through to a registered service.
 *
 * The request body is piped, never buffered, and the downstream status,
 * headers and body are relayed as they arrive. Only connection-level failures
 * of safe, bodiless requests are retried.
 */
export class ProxyForwarder {
  private readonly strippedCookies: ReadonlySet<string>;

  constructor(private readonly options: ForwarderOptions) {
    this.strippedCookies = new Set(options.strippedCookies);
  }

  async forward(req: IncomingMessage, res: ServerResponse, target: ForwardTarget): Promise<ForwardResult> {
    const url = buildTargetUrl(target);
    const method = (req.method ?? 'GET').toUpperCase();
    const headers = buildOutboundHeaders(req, this.strippedCookies, target.forwardedProto ?? 'http');
    const replayable = isSafeMethod(method) && !hasRequestBody(req.headers);
    const maxAttempts = replayable ? this.options.retries + 1 : 1;

    let attempt = 0;
    for (;;) {
      attempt++;
      try {
        const upstream = await this.openUpstream(url, method, headers, replayable ? null : req, res);
        const completed = await this.relay(upstream, res);
        log.debug('Proxied request', { method, target: url.href, status: upstream.statusCode, attempt });
        return { status: upstream.statusCode ?? 502, attempts: attempt, completed };
      } catch (error) {
        const failure = classify(error);
        if (failure.kind === 'connect' && attempt < maxAttempts && !res.destroyed) {
          const backoff = this.options.retryBackoffMs * 2 ** (attempt - 1);
          log.warn('Downstream connection failed, retrying', {
            method,
            target: url.href,
            attempt,
            backoffMs: backoff,
            error: failure.message,
          });
          await sleep(backoff);
          continue;
        }

        log.error('Downstream request failed', { method, target: url.href, attempt, error: failure.message });
        if (failure.kind === 'timeout') {
          throw new GatewayError('GATEWAY_TIMEOUT', 'Downstream service timed out', { cause: failure });
        }
        throw new GatewayError('BAD_GATEWAY', 'Downstream service unreachable', { cause: failure });
      }
    }
  }

  /** Resolves once the downstream response head arrives. */
  private openUpstream(
    url: URL,
    method: string,
    headers: OutgoingHttpHeaders,
    body: Readable | null,
    res: ServerResponse
  ): Promise<IncomingMessage> {
    return new Promise((resolve, reject) => {
      const transport = url.protocol === 'https:' ? https : http;
      let settled = false;

      const upstreamReq = transport.request(url, { method, headers }, upstreamRes => {
        settle();
        resolve(upstreamRes);
      });

      const timer = setTimeout(() => {
        upstreamReq.destroy(
          new UpstreamFailure('timeout', `No response within ${this.options.timeoutMs}ms`)
        );
      }, this.options.timeoutMs);

      // Caller went away: stop the downstream call too
      const onClientClose = (): void => {
        if (!res.writableFinished) {
          upstreamReq.destroy();
        }
      };

      // relay() takes over client-close handling once the head arrives
      const settle = (): void => {
        settled = true;
        clearTimeout(timer);
        res.off('close', onClientClose);
      };

      upstreamReq.on('error', error => {
        if (!settled) {
          settle();
          reject(classify(error));
        }
      });
      res.once('close', onClientClose);

      if (body) {
        body.pipe(upstreamReq);
      } else {
        upstreamReq.end();
      }
    });
  }

  private relay(upstream: IncomingMessage, res: ServerResponse): Promise<boolean> {
    return new Promise(resolve => {
      res.writeHead(upstream.statusCode ?? 502, upstream.statusMessage, buildResponseHeaders(upstream, res));

      upstream.on('error', error => {
        log.error('Downstream response broke off', { error: errorMessage(error) });
        res.destroy();
        resolve(false);
      });
      res.once('close', () => {
        if (!upstream.complete) upstream.destroy();
        resolve(res.writableFinished && upstream.complete);
      });

      upstream.pipe(res);
    });
  }
}
