// src/services/index.ts

import Redis from 'ioredis';
import { KeyValueStore } from '../storage/key-value.store';
import { MemoryKeyValueStore } from '../storage/memory.store';
import { RedisKeyValueStore } from '../storage/redis.store';
import { RoomService } from './room.service';
import { RoomStateStore } from './room-state.store';

export type CoreServices = {
    kv: KeyValueStore;
    store: RoomStateStore;
    rooms: RoomService;
    close: () => Promise<void>;
};

/**
 * Con REDIS_URL el estado de las salas es durable; sin él, vive en memoria
 */
export function createServices(redisUrl: string, now: () => number = Date.now): CoreServices {
    if (redisUrl) {
        const redis = new Redis(redisUrl);
        redis.on('error', error => console.error('❌ Error de Redis:', error.message));

        const kv = new RedisKeyValueStore(redis);
        const store = new RoomStateStore(kv, { now });
        console.log('🗄️ Estado de salas en Redis');

        return {
            kv,
            store,
            rooms: new RoomService(store, now),
            close: async () => {
                await redis.quit();
            }
        };
    }

    const kv = new MemoryKeyValueStore(now);
    const store = new RoomStateStore(kv, { now });
    console.log('🗄️ Estado de salas en memoria');

    return {
        kv,
        store,
        rooms: new RoomService(store, now),
        close: async () => {}
    };
}
