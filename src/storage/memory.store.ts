// src/storage/memory.store.ts

import { KeyValueStore } from './key-value.store';

type Entry =
    | { kind: 'hash'; value: Map<string, string>; expiresAt: number | null }
    | { kind: 'list'; value: string[]; expiresAt: number | null }
    | { kind: 'set'; value: Set<string>; expiresAt: number | null };

type EntryOf<K extends Entry['kind']> = Extract<Entry, { kind: K }>;

/**
 * Implementación en memoria del proceso. Volátil: se pierde al reiniciar.
 * La expiración se evalúa contra el reloj inyectado.
 */
export class MemoryKeyValueStore implements KeyValueStore {
    private entries: Map<string, Entry> = new Map();

    constructor(private readonly now: () => number = Date.now) {}

    async hset(key: string, fields: Record<string, string>): Promise<void> {
        const names = Object.keys(fields);
        if (names.length === 0) return;

        const entry = this.read(key, 'hash') ?? this.create<EntryOf<'hash'>>(key, { kind: 'hash', value: new Map(), expiresAt: null });
        for (const name of names) {
            entry.value.set(name, fields[name]);
        }
    }

    async hget(key: string, field: string): Promise<string | null> {
        return this.read(key, 'hash')?.value.get(field) ?? null;
    }

    async hgetall(key: string): Promise<Record<string, string>> {
        const entry = this.read(key, 'hash');
        return entry ? Object.fromEntries(entry.value) : {};
    }

    async hdel(key: string, field: string): Promise<number> {
        const entry = this.read(key, 'hash');
        if (!entry || !entry.value.delete(field)) return 0;

        if (entry.value.size === 0) this.entries.delete(key);
        return 1;
    }

    // Sin await intermedio: el cambio completo ocurre en un mismo paso del bucle de eventos
    async hupdate(key: string, fields: Record<string, string>, removed: string[]): Promise<number> {
        const names = Object.keys(fields);
        const current = this.read(key, 'hash');
        if (!current && names.length === 0) return 0;

        const entry = current ?? this.create<EntryOf<'hash'>>(key, { kind: 'hash', value: new Map(), expiresAt: null });
        let count = 0;
        for (const field of removed) {
            if (entry.value.delete(field)) count++;
        }
        for (const name of names) {
            entry.value.set(name, fields[name]);
        }

        if (entry.value.size === 0) this.entries.delete(key);
        return count;
    }

    async hlen(key: string): Promise<number> {
        return this.read(key, 'hash')?.value.size ?? 0;
    }

    async pushCapped(key: string, value: string, capacity: number): Promise<void> {
        const entry = this.read(key, 'list') ?? this.create<EntryOf<'list'>>(key, { kind: 'list', value: [], expiresAt: null });
        entry.value.push(value);
        if (entry.value.length > capacity) {
            entry.value.splice(0, entry.value.length - capacity);
        }
    }

    async lrange(key: string): Promise<string[]> {
        const entry = this.read(key, 'list');
        return entry ? [...entry.value] : [];
    }

    async sadd(key: string, member: string): Promise<void> {
        const entry = this.read(key, 'set') ?? this.create<EntryOf<'set'>>(key, { kind: 'set', value: new Set(), expiresAt: null });
        entry.value.add(member);
    }

    async srem(key: string, member: string): Promise<void> {
        const entry = this.read(key, 'set');
        if (!entry) return;

        entry.value.delete(member);
        if (entry.value.size === 0) this.entries.delete(key);
    }

    async smembers(key: string): Promise<string[]> {
        const entry = this.read(key, 'set');
        return entry ? Array.from(entry.value) : [];
    }

    async del(...keys: string[]): Promise<void> {
        for (const key of keys) {
            this.entries.delete(key);
        }
    }

    async exists(key: string): Promise<boolean> {
        return this.live(key) !== null;
    }

    async pexpire(key: string, ttlMs: number): Promise<void> {
        const entry = this.live(key);
        if (entry) entry.expiresAt = this.now() + ttlMs;
    }

    async sweepExpired(): Promise<number> {
        let removed = 0;
        for (const key of Array.from(this.entries.keys())) {
            if (this.live(key) === null) removed++;
        }
        return removed;
    }

    /**
     * Devuelve la entrada si no expiró; si expiró la elimina
     */
    private live(key: string): Entry | null {
        const entry = this.entries.get(key);
        if (!entry) return null;

        if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }

    private read<K extends Entry['kind']>(key: string, kind: K): EntryOf<K> | null {
        const entry = this.live(key);
        if (!entry) return null;
        if (!isKind(entry, kind)) {
            throw new Error(`La clave ${key} contiene un ${entry.kind}, no un ${kind}`);
        }
        return entry;
    }

    private create<E extends Entry>(key: string, entry: E): E {
        this.entries.set(key, entry);
        return entry;
    }
}

function isKind<K extends Entry['kind']>(entry: Entry, kind: K): entry is EntryOf<K> {
    return entry.kind === kind;
}
