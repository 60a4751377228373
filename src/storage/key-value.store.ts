// src/storage/key-value.store.ts

/**
 * Primitivas genéricas de almacenamiento clave/valor con expiración por clave.
 * Un hash, lista o conjunto que queda vacío deja de existir.
 */
export interface KeyValueStore {
    /** Escribe varios campos de un hash en un solo paso */
    hset(key: string, fields: Record<string, string>): Promise<void>;
    hget(key: string, field: string): Promise<string | null>;
    hgetall(key: string): Promise<Record<string, string>>;
    /** Devuelve cuántos campos se eliminaron */
    hdel(key: string, field: string): Promise<number>;
    hlen(key: string): Promise<number>;
    /**
     * Elimina `removed` y escribe `fields` en un solo paso atómico:
     * ninguna lectura ve la mitad del cambio. Devuelve cuántos campos se eliminaron.
     */
    hupdate(key: string, fields: Record<string, string>, removed: string[]): Promise<number>;

    /** Añade al final y descarta desde el principio hasta quedar en `capacity` */
    pushCapped(key: string, value: string, capacity: number): Promise<void>;
    lrange(key: string): Promise<string[]>;

    sadd(key: string, member: string): Promise<void>;
    srem(key: string, member: string): Promise<void>;
    smembers(key: string): Promise<string[]>;

    del(...keys: string[]): Promise<void>;
    exists(key: string): Promise<boolean>;
    /** Sin efecto si la clave no existe */
    pexpire(key: string, ttlMs: number): Promise<void>;

    /** Elimina físicamente las claves expiradas (Redis lo hace solo) */
    sweepExpired(): Promise<number>;
}
