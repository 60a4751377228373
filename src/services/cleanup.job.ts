// src/services/cleanup.job.ts

import { RoomStateStore } from './room-state.store';

/**
 * Purga periódica de salas vacías. El intervalo no mantiene vivo el proceso.
 */
export function startCleanupJob(store: RoomStateStore, intervalMinutes: number) {
    let running = false;

    const timer = setInterval(() => {
        if (running) return;
        running = true;

        store.cleanupEmptyRooms()
            .then(purged => {
                if (purged.length > 0) {
                    console.log(`🧹 Salas vacías purgadas: ${purged.join(', ')}`);
                }
            })
            .catch(error => console.error('❌ Error en la limpieza de salas:', error))
            .finally(() => {
                running = false;
            });
    }, intervalMinutes * 60 * 1000);

    timer.unref();

    return {
        stop: () => clearInterval(timer)
    };
}
