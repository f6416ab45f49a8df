import Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { RedisRegistryStore } from '../gateway/store/registryStore';

describe('RedisRegistryStore', () => {
  let redis: Redis;
  let store: RedisRegistryStore;

  beforeEach(async () => {
    redis = new RedisMock();
    await redis.flushall();
    store = new RedisRegistryStore('redis://localhost:6379', () => new RedisMock());
    await store.connect();
  });

  afterEach(async () => {
    await store.disconnect();
  });

  test('1. services and resources are read from their hashes', async () => {
    await redis.hset('registry:services', 'svc-bank', '{"name":"bank","baseUrl":"http://bank.internal"}');
    await redis.hset(
      'registry:resources',
      'res-accounts',
      '{"serviceId":"svc-bank","path":"/getAccounts","method":"GET","requiredRoles":["bank_read"]}'
    );

    expect(await store.fetchAll()).toEqual({
      services: [{ id: 'svc-bank', name: 'bank', baseUrl: 'http://bank.internal' }],
      resources: [
        { id: 'res-accounts', serviceId: 'svc-bank', path: '/getAccounts', method: 'GET', requiredRoles: ['bank_read'] },
      ],
    });
  });

  test('2. an empty registry is empty, not an error', async () => {
    expect(await store.fetchAll()).toEqual({ services: [], resources: [] });
  });

  test('3. one bad entry fails the whole fetch', async () => {
    await redis.hset('registry:services', 'svc-bank', '{"name":"bank","baseUrl":"http://bank.internal"}');
    await redis.hset('registry:resources', 'res-broken', 'not json');

    await expect(store.fetchAll()).rejects.toThrow('Registry entry resource:res-broken is not valid JSON');
  });

  test('4. an aborted fetch is refused', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(store.fetchAll(controller.signal)).rejects.toThrow('Registry fetch aborted');
  });
});
