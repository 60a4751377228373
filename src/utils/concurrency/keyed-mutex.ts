// src/utils/concurrency/keyed-mutex.ts

/**
 * Exclusión mutua por clave sobre cadenas de promesas.
 * Las tareas con la misma clave se ejecutan en orden de llegada;
 * claves distintas nunca compiten entre sí.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const run = previous.then(task);

        // La cola avanza aunque la tarea falle; el error le llega a quien espera `run`
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.tails.set(key, tail);

        try {
            return await run;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /**
     * Claves con tareas pendientes o en curso
     */
    pendingKeys(): string[] {
        return Array.from(this.tails.keys());
    }
}
