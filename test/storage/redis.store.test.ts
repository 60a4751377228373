import Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { beforeEach, describe, expect, it } from 'vitest';
import { RedisKeyValueStore } from '../../src/storage/redis.store';

describe('RedisKeyValueStore', () => {
    let redis: Redis;
    let kv: RedisKeyValueStore;

    beforeEach(async () => {
        redis = new RedisMock();
        await redis.flushall();
        kv = new RedisKeyValueStore(redis);
    });

    it('hupdate borra y escribe campos en una transacción', async () => {
        await kv.hset('h', { a: '1', b: '2' });

        expect(await kv.hupdate('h', { b: '3', c: '4' }, ['a', 'z'])).toBe(1);
        expect(await kv.hgetall('h')).toEqual({ b: '3', c: '4' });

        expect(await kv.hupdate('h', {}, ['b', 'c'])).toBe(2);
        expect(await kv.exists('h')).toBe(false);
    });

    it('pushCapped conserva solo los últimos elementos', async () => {
        for (const value of ['a', 'b', 'c', 'd']) {
            await kv.pushCapped('l', value, 3);
        }
        expect(await kv.lrange('l')).toEqual(['b', 'c', 'd']);
    });

    it('pushCapped falla si un comando de la transacción falla', async () => {
        await redis.set('l', 'texto');

        await expect(kv.pushCapped('l', 'a', 3)).rejects.toThrow();
        expect(await redis.get('l')).toBe('texto');
    });
});
