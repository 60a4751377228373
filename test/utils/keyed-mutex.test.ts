import { describe, expect, it } from 'vitest';
import { KeyedMutex } from '../../src/utils/concurrency/keyed-mutex';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('KeyedMutex', () => {
    it('ejecuta en orden de llegada las tareas de una misma clave', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        const first = mutex.runExclusive('room-1', async () => {
            order.push('a:start');
            await delay(20);
            order.push('a:end');
        });
        const second = mutex.runExclusive('room-1', async () => {
            order.push('b:start');
            order.push('b:end');
        });

        await Promise.all([first, second]);
        expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('no bloquea claves distintas', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        const slow = mutex.runExclusive('room-1', async () => {
            order.push('a:start');
            await delay(20);
            order.push('a:end');
        });
        const fast = mutex.runExclusive('room-2', async () => {
            order.push('b:start');
            order.push('b:end');
        });

        await Promise.all([slow, fast]);
        expect(order).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
    });

    it('propaga el error y deja avanzar la cola', async () => {
        const mutex = new KeyedMutex();

        const failing = mutex.runExclusive('room-1', async () => {
            throw new Error('boom');
        });
        const next = mutex.runExclusive('room-1', async () => 42);

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
        expect(mutex.pendingKeys()).toEqual([]);
    });
});
