import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { startCleanupJob } from '../../src/services/cleanup.job';
import { RoomStateStore } from '../../src/services/room-state.store';
import { MemoryKeyValueStore } from '../../src/storage/memory.store';

describe('startCleanupJob', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('limpia en cada intervalo hasta que se detiene', async () => {
        const store = new RoomStateStore(new MemoryKeyValueStore());
        const cleanup = vi.spyOn(store, 'cleanupEmptyRooms').mockResolvedValue(['room-1']);

        const job = startCleanupJob(store, 1);
        await vi.advanceTimersByTimeAsync(60_000);
        expect(cleanup).toHaveBeenCalledTimes(1);

        job.stop();
        await vi.advanceTimersByTimeAsync(120_000);
        expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('un fallo se registra y se reintenta en el siguiente ciclo', async () => {
        const store = new RoomStateStore(new MemoryKeyValueStore());
        const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const cleanup = vi.spyOn(store, 'cleanupEmptyRooms')
            .mockRejectedValueOnce(new Error('sin conexión'))
            .mockResolvedValue([]);

        const job = startCleanupJob(store, 1);
        await vi.advanceTimersByTimeAsync(120_000);
        job.stop();

        expect(cleanup).toHaveBeenCalledTimes(2);
        expect(errors).toHaveBeenCalledTimes(1);
        errors.mockRestore();
    });
});
