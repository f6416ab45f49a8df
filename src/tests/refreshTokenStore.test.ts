import RedisMock from 'ioredis-mock';
import {
  InMemoryRefreshTokenStore,
  RedisRefreshTokenStore,
  RefreshTokenStore,
} from '../gateway/store/refreshTokenStore';
import { RefreshTokenRecord } from '../shared/types';

const NOW = Date.parse('2026-03-02T10:00:00Z');
const DAY = 86400 * 1000;

function record(overrides: Partial<RefreshTokenRecord> = {}): RefreshTokenRecord {
  return {
    tokenHash: 'hash-1',
    subjectId: 'user-1',
    roles: ['bank_read'],
    familyId: 'family-1',
    issuedAt: NOW,
    expiresAt: NOW + DAY,
    consumed: false,
    revoked: false,
    ...overrides,
  };
}

const stores: Array<[string, () => RefreshTokenStore]> = [
  ['in-memory', () => new InMemoryRefreshTokenStore()],
  ['redis', () => new RedisRefreshTokenStore('redis://localhost:6379', () => new RedisMock())],
];

describe.each(stores)('RefreshTokenStore (%s)', (_name, createStore) => {
  let store: RefreshTokenStore;

  beforeEach(async () => {
    // ioredis-mock instances on one host share their data
    await new RedisMock().flushall();
    store = createStore();
    await store.connect();
  });

  afterEach(async () => {
    await store.disconnect();
  });

  test('1. inserted records are found by hash', async () => {
    await store.insert(record());

    expect(await store.findByHash('hash-1')).toEqual(record());
    expect(await store.findByHash('hash-unknown')).toBeNull();
  });

  test('2. inserting the same hash twice fails', async () => {
    await store.insert(record());
    await expect(store.insert(record({ subjectId: 'user-2' }))).rejects.toThrow('Refresh token hash collision');
  });

  test('3. first claim succeeds and marks the record consumed', async () => {
    await store.insert(record());

    expect(await store.claim('hash-1', NOW + 1000)).toEqual({
      status: 'claimed',
      record: record({ consumed: true }),
    });
    expect((await store.findByHash('hash-1'))?.consumed).toBe(true);
  });

  test('4. second claim is reused and returns the record', async () => {
    await store.insert(record());
    await store.claim('hash-1', NOW);

    const second = await store.claim('hash-1', NOW);

    expect(second).toEqual({ status: 'reused', record: record({ consumed: true }) });
  });

  test('5. two racing claims: exactly one is claimed, the other reused', async () => {
    await store.insert(record());

    const results = await Promise.all([store.claim('hash-1', NOW), store.claim('hash-1', NOW)]);

    expect(results.map(result => result.status).sort()).toEqual(['claimed', 'reused']);
  });

  test('6. expired records are expired at their expiry instant and stay unconsumed', async () => {
    await store.insert(record());

    expect(await store.claim('hash-1', NOW + DAY)).toEqual({ status: 'expired' });
    expect((await store.findByHash('hash-1'))?.consumed).toBe(false);
  });

  test('7. unknown hashes are not_found', async () => {
    expect(await store.claim('hash-unknown', NOW)).toEqual({ status: 'not_found' });
  });

  test('8. revoking a family revokes its members only and counts changes', async () => {
    await store.insert(record());
    await store.insert(record({ tokenHash: 'hash-2' }));
    await store.insert(record({ tokenHash: 'hash-3', familyId: 'family-2' }));

    expect(await store.revokeFamily('family-1')).toBe(2);
    expect(await store.revokeFamily('family-1')).toBe(0);

    expect(await store.claim('hash-1', NOW)).toEqual({ status: 'revoked' });
    expect(await store.claim('hash-3', NOW)).toMatchObject({ status: 'claimed' });
  });

  test('9. a consumed record keeps reporting reuse after revocation', async () => {
    await store.insert(record());
    await store.claim('hash-1', NOW);
    await store.revokeFamily('family-1');

    expect(await store.claim('hash-1', NOW)).toMatchObject({ status: 'reused' });
  });

  test('10. revoking a subject covers every family of that subject', async () => {
    await store.insert(record());
    await store.insert(record({ tokenHash: 'hash-2', familyId: 'family-2' }));
    await store.insert(record({ tokenHash: 'hash-3', subjectId: 'user-2', familyId: 'family-3' }));

    expect(await store.revokeSubject('user-1')).toBe(2);

    expect((await store.findByHash('hash-1'))?.revoked).toBe(true);
    expect((await store.findByHash('hash-2'))?.revoked).toBe(true);
    expect((await store.findByHash('hash-3'))?.revoked).toBe(false);
  });
});

describe('RedisRefreshTokenStore keys', () => {
  test('11. record and both index sets expire with the record', async () => {
    const redis = new RedisMock();
    await redis.flushall();
    const store = new RedisRefreshTokenStore('redis://localhost:6379', () => new RedisMock());
    await store.connect();
    const expiresAt = Date.now() + DAY;

    try {
      await store.insert(record({ expiresAt }));

      for (const key of ['refresh:hash-1', 'refresh-family:family-1', 'refresh-subject:user-1']) {
        const ttl = await redis.pttl(key);
        expect(ttl).toBeGreaterThan(0);
        expect(ttl).toBeLessThanOrEqual(DAY);
      }
    } finally {
      await store.disconnect();
    }
  });

  test('12. stored roles that are not a string list are rejected', async () => {
    const redis = new RedisMock();
    await redis.flushall();
    await redis.hset('refresh:hash-bad', { subjectId: 'user-1', roles: '{"admin":true}', expiresAt: String(NOW + DAY) });
    const store = new RedisRefreshTokenStore('redis://localhost:6379', () => new RedisMock());
    await store.connect();

    try {
      await expect(store.findByHash('hash-bad')).rejects.toThrow('Refresh record hash-bad has invalid roles');
    } finally {
      await store.disconnect();
    }
  });
});
