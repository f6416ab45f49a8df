import Redis from 'ioredis';
import { RefreshTokenRecord } from '../../shared/types';
import { createRedisClient, RedisClientFactory } from './redisClient';

export type ClaimResult =
  | { status: 'claimed'; record: RefreshTokenRecord }
  | { status: 'reused'; record: RefreshTokenRecord }
  | { status: 'revoked' }
  | { status: 'expired' }
  | { status: 'not_found' };

export interface RefreshTokenStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  insert(record: RefreshTokenRecord): Promise<void>;
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /**
   * Atomically marks the record consumed if it is unconsumed, unrevoked and
   * unexpired at `now`. Of any number of concurrent claims on one hash, at
   * most one returns `claimed`; the others see `reused`.
   */
  claim(tokenHash: string, now: number): Promise<ClaimResult>;
  revokeFamily(familyId: string): Promise<number>;
  revokeSubject(subjectId: string): Promise<number>;
}

export class InMemoryRefreshTokenStore implements RefreshTokenStore {
  private records: Map<string, RefreshTokenRecord> = new Map();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.records.clear();
  }

  async insert(record: RefreshTokenRecord): Promise<void> {
    if (this.records.has(record.tokenHash)) {
      throw new Error('Refresh token hash collision');
    }
    this.records.set(record.tokenHash, { ...record, roles: [...record.roles] });
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const record = this.records.get(tokenHash);
    return record ? { ...record, roles: [...record.roles] } : null;
  }

  async claim(tokenHash: string, now: number): Promise<ClaimResult> {
    // Check and update run without an await in between, which makes this the critical section
    const record = this.records.get(tokenHash);
    if (!record) return { status: 'not_found' };
    if (record.consumed) return { status: 'reused', record: { ...record, roles: [...record.roles] } };
    if (record.revoked) return { status: 'revoked' };
    if (record.expiresAt <= now) return { status: 'expired' };

    record.consumed = true;
    return { status: 'claimed', record: { ...record, roles: [...record.roles] } };
  }

  async revokeFamily(familyId: string): Promise<number> {
    return this.revokeWhere(record => record.familyId === familyId);
  }

  async revokeSubject(subjectId: string): Promise<number> {
    return this.revokeWhere(record => record.subjectId === subjectId);
  }

  private revokeWhere(predicate: (record: RefreshTokenRecord) => boolean): number {
    let count = 0;
    for (const record of this.records.values()) {
      if (predicate(record) && !record.revoked) {
        record.revoked = true;
        count++;
      }
    }
    return count;
  }
}

const recordKey = (tokenHash: string) => `refresh:${tokenHash}`;
const familyKey = (familyId: string) => `refresh-family:${familyId}`;
const subjectKey = (subjectId: string) => `refresh-subject:${subjectId}`;

// KEYS[1] record hash, ARGV[1] now (epoch ms). Returns the status followed by field/value pairs.
const CLAIM_SCRIPT = `
local v = redis.call('HMGET', KEYS[1], 'subjectId', 'roles', 'familyId', 'issuedAt', 'expiresAt', 'consumed', 'revoked')
if not v[5] then return {'not_found'} end
local status
if v[6] == '1' then status = 'reused'
elseif v[7] == '1' then status = 'revoked'
elseif tonumber(v[5]) <= tonumber(ARGV[1]) then status = 'expired'
else
  redis.call('HSET', KEYS[1], 'consumed', '1')
  status = 'claimed'
end
return {status, 'subjectId', v[1], 'roles', v[2], 'familyId', v[3], 'issuedAt', v[4], 'expiresAt', v[5], 'consumed', v[6], 'revoked', v[7]}
`;

// KEYS[1] index set. Marks every member record revoked; returns how many changed.
const REVOKE_INDEX_SCRIPT = `
local members = redis.call('SMEMBERS', KEYS[1])
local count = 0
for _, tokenHash in ipairs(members) do
  local key = 'refresh:' .. tokenHash
  if redis.call('EXISTS', key) == 1 and redis.call('HGET', key, 'revoked') ~= '1' then
    redis.call('HSET', key, 'revoked', '1')
    count = count + 1
  end
end
return count
`;

function toRecord(tokenHash: string, fields: Record<string, string>): RefreshTokenRecord {
  let roles: unknown;
  try {
    roles = JSON.parse(fields.roles ?? '[]');
  } catch {
    throw new Error(`Refresh record ${tokenHash} has unreadable roles`);
  }
  if (!Array.isArray(roles) || !roles.every(role => typeof role === 'string')) {
    throw new Error(`Refresh record ${tokenHash} has invalid roles`);
  }

  return {
    tokenHash,
    subjectId: fields.subjectId ?? '',
    roles,
    familyId: fields.familyId ?? '',
    issuedAt: Number(fields.issuedAt),
    expiresAt: Number(fields.expiresAt),
    consumed: fields.consumed === '1',
    revoked: fields.revoked === '1',
  };
}

function pairsToFields(pairs: readonly unknown[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < pairs.length; i += 2) {
    const name = pairs[i];
    const value = pairs[i + 1];
    if (typeof name === 'string' && typeof value === 'string') {
      fields[name] = value;
    }
  }
  return fields;
}

export class RedisRefreshTokenStore implements RefreshTokenStore {
  private client: Redis | null = null;

  constructor(
    private readonly redisUrl: string,
    private readonly createClient: RedisClientFactory = createRedisClient
  ) {}

  private get redis(): Redis {
    if (!this.client) throw new Error('Redis not connected');
    return this.client;
  }

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

  async insert(record: RefreshTokenRecord): Promise<void> {
    const key = recordKey(record.tokenHash);
    const created = await this.redis.hsetnx(key, 'subjectId', record.subjectId);
    if (created !== 1) {
      throw new Error('Refresh token hash collision');
    }

    await this.redis
      .multi()
      .hset(key, {
        roles: JSON.stringify(record.roles),
        familyId: record.familyId,
        issuedAt: String(record.issuedAt),
        expiresAt: String(record.expiresAt),
        consumed: record.consumed ? '1' : '0',
        revoked: record.revoked ? '1' : '0',
      })
      .pexpireat(key, record.expiresAt)
      .sadd(familyKey(record.familyId), record.tokenHash)
      .pexpireat(familyKey(record.familyId), record.expiresAt)
      .sadd(subjectKey(record.subjectId), record.tokenHash)
      .pexpireat(subjectKey(record.subjectId), record.expiresAt)
      .exec();
  }

  async findByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const fields = await this.redis.hgetall(recordKey(tokenHash));
    if (Object.keys(fields).length === 0) return null;
    return toRecord(tokenHash, fields);
  }

  async claim(tokenHash: string, now: number): Promise<ClaimResult> {
    const reply = await this.redis.eval(CLAIM_SCRIPT, 1, recordKey(tokenHash), String(now));
    if (!Array.isArray(reply) || typeof reply[0] !== 'string') {
      throw new Error('Unexpected reply from refresh claim script');
    }

    const status = reply[0];
    switch (status) {
      case 'claimed':
        return { status: 'claimed', record: { ...toRecord(tokenHash, pairsToFields(reply.slice(1))), consumed: true } };
      case 'reused':
        return { status: 'reused', record: toRecord(tokenHash, pairsToFields(reply.slice(1))) };
      case 'revoked':
        return { status: 'revoked' };
      case 'expired':
        return { status: 'expired' };
      case 'not_found':
        return { status: 'not_found' };
      default:
        throw new Error(`Unknown refresh claim status "${status}"`);
    }
  }

  async revokeFamily(familyId: string): Promise<number> {
    return this.revokeIndex(familyKey(familyId));
  }

  async revokeSubject(subjectId: string): Promise<number> {
    return this.revokeIndex(subjectKey(subjectId));
  }

  private async revokeIndex(key: string): Promise<number> {
    const count = await this.redis.eval(REVOKE_INDEX_SCRIPT, 1, key);
    return typeof count === 'number' ? count : 0;
  }
}
