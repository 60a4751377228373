// src/storage/redis.store.ts

import Redis, { ChainableCommander } from 'ioredis';
import { KeyValueStore } from './key-value.store';

/**
 * Implementación sobre Redis. La expiración la aplica Redis (PEXPIRE).
 */
export class RedisKeyValueStore implements KeyValueStore {
    constructor(private readonly redis: Redis) {}

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        if (Object.keys(fields).length === 0) return;
        await this.redis.hset(key, fields);
    }

    async hget(key: string, field: string): Promise<string | null> {
        return this.redis.hget(key, field);
    }

    async hgetall(key: string): Promise<Record<string, string>> {
        return this.redis.hgetall(key);
    }

    async hdel(key: string, field: string): Promise<number> {
        return this.redis.hdel(key, field);
    }

    async hupdate(key: string, fields: Record<string, string>, removed: string[]): Promise<number> {
        const transaction = this.redis.multi();
        if (removed.length > 0) transaction.hdel(key, ...removed);
        if (Object.keys(fields).length > 0) transaction.hset(key, fields);

        const results = await execTransaction(transaction);
        return removed.length > 0 ? Number(results[0]) : 0;
    }

    async hlen(key: string): Promise<number> {
        return this.redis.hlen(key);
    }

    async pushCapped(key: string, value: string, capacity: number): Promise<void> {
        await execTransaction(
            this.redis
                .multi()
                .rpush(key, value)
                .ltrim(key, -capacity, -1)
        );
    }

    async lrange(key: string): Promise<string[]> {
        return this.redis.lrange(key, 0, -1);
    }

    async sadd(key: string, member: string): Promise<void> {
        await this.redis.sadd(key, member);
    }

    async srem(key: string, member: string): Promise<void> {
        await this.redis.srem(key, member);
    }

    async smembers(key: string): Promise<string[]> {
        return this.redis.smembers(key);
    }

    async del(...keys: string[]): Promise<void> {
        if (keys.length === 0) return;
        await this.redis.del(...keys);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.redis.exists(key)) > 0;
    }

    async pexpire(key: string, ttlMs: number): Promise<void> {
        await this.redis.pexpire(key, ttlMs);
    }

    async sweepExpired(): Promise<number> {
        return 0;
    }
}

/**
 * MULTI/EXEC. ioredis no rechaza la promesa cuando falla un comando dentro
 * de la transacción: el error viene en su par [error, resultado].
 */
async function execTransaction(transaction: ChainableCommander): Promise<unknown[]> {
    const replies = await transaction.exec();
    if (!replies) {
        throw new Error('La transacción de Redis fue abortada');
    }

    for (const [error] of replies) {
        if (error) throw error;
    }
    return replies.map(([, result]) => result);
}
