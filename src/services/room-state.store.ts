// src/services/room-state.store.ts

import { ChatMessage, Participant } from '../core/domain';
import {
    assignController,
    findController,
    nextControllerId,
    orderByJoin,
    repairControl
} from '../core/rules/control.rules';
import { EMPTY_ROOM_GRACE_HOURS, HOUR_MS, MAX_MESSAGES_PER_ROOM, ROOM_EXPIRY_HOURS } from '../config/constants';
import { KeyValueStore } from '../storage/key-value.store';
import { decodeMessage, decodeParticipant, encode } from '../storage/serialization';
import { KeyedMutex } from '../utils/concurrency/keyed-mutex';

const ROOM_EXPIRY_MS = ROOM_EXPIRY_HOURS * HOUR_MS;
export const EMPTY_ROOM_GRACE_MS = EMPTY_ROOM_GRACE_HOURS * HOUR_MS;

export const STATE_KEYS = {
    participants: (roomId: string) => `room:${roomId}:participants`,
    messages: (roomId: string) => `room:${roomId}:messages`,
    activeRooms: 'rooms:active',
    emptyRooms: 'rooms:empty'
} as const;

export type RosterChange = {
    before: Participant[];
    after: Participant[];
};

export type RoomStateStoreOptions = {
    now?: () => number;
};

/**
 * Estado vivo de una sala: registro de participantes + historial de chat.
 * No bloquea; solo se obtiene a través de RoomStateStore.withRoom
 * (o de las operaciones sueltas del store, que bloquean una a una).
 */
export class RoomState {
    private readonly participantsKey: string;
    private readonly messagesKey: string;

    constructor(
        readonly roomId: string,
        private readonly kv: KeyValueStore,
        private readonly now: () => number
    ) {
        this.participantsKey = STATE_KEYS.participants(roomId);
        this.messagesKey = STATE_KEYS.messages(roomId);
    }

    /**
     * Inserta o sobrescribe (reconexión). Renueva la expiración de 24 h.
     */
    async addOrUpdate(participant: Participant): Promise<void> {
        await this.update(participants => [...participants.filter(p => p.id !== participant.id), participant]);
    }

    /**
     * Idempotente. Devuelve false si el participante no estaba.
     * Si la sala queda vacía empieza la ventana de gracia del historial.
     */
    async remove(participantId: string): Promise<boolean> {
        const { before } = await this.update(participants => participants.filter(p => p.id !== participantId));
        return before.some(p => p.id === participantId);
    }

    async get(participantId: string): Promise<Participant | null> {
        const raw = await this.kv.hget(this.participantsKey, participantId);
        return raw === null ? null : decodeParticipant(raw);
    }

    async listOrderedByJoin(): Promise<Participant[]> {
        const entries = await this.kv.hgetall(this.participantsKey);
        const participants: Participant[] = [];
        for (const raw of Object.values(entries)) {
            const participant = decodeParticipant(raw);
            if (participant) participants.push(participant);
        }
        return orderByJoin(participants);
    }

    async count(): Promise<number> {
        return this.kv.hlen(this.participantsKey);
    }

    async getController(): Promise<Participant | null> {
        return findController(await this.listOrderedByJoin());
    }

    /**
     * El participante indicado pasa a ser el único con control.
     * Si no está en la sala nadie queda con control: validar antes.
     */
    async setController(participantId: string): Promise<void> {
        await this.update(participants => assignController(participants, participantId));
    }

    /**
     * Quita el control a todos y se lo da al más antiguo que no sea `excludingId`
     */
    async transferControlToNext(excludingId: string): Promise<Participant | null> {
        const { after } = await this.update(participants =>
            assignController(participants, nextControllerId(participants, excludingId))
        );
        return findController(after);
    }

    /**
     * Repara el invariante de un único controlador. Sala vacía: sin cambios.
     */
    async ensureControlConsistency(): Promise<Participant | null> {
        const { after } = await this.update(repairControl);
        return findController(after);
    }

    /**
     * Aplica una transición completa del registro (altas, bajas y cambios de control)
     * en una sola escritura: las lecturas sin bloqueo ven el antes o el después.
     * Solo es segura con la sala bloqueada.
     */
    async update(transition: (participants: Participant[]) => Participant[]): Promise<RosterChange> {
        const before = await this.listOrderedByJoin();
        const after = orderByJoin(transition(before));

        const { written, removed } = diffRoster(before, after);
        await this.kv.hupdate(
            this.participantsKey,
            Object.fromEntries(written.map(p => [p.id, encode(p)])),
            removed
        );

        if (written.length > 0 && after.length > 0) {
            await this.touch();
        } else if (removed.length > 0 && after.length === 0) {
            await this.markEmpty();
        }
        return { before, after };
    }

    async appendMessage(message: ChatMessage): Promise<void> {
        await this.kv.pushCapped(this.messagesKey, encode(message), MAX_MESSAGES_PER_ROOM);
        const ttl = (await this.count()) > 0 ? ROOM_EXPIRY_MS : EMPTY_ROOM_GRACE_MS;
        await this.kv.pexpire(this.messagesKey, ttl);
    }

    async listMessages(): Promise<ChatMessage[]> {
        const messages: ChatMessage[] = [];
        for (const raw of await this.kv.lrange(this.messagesKey)) {
            const message = decodeMessage(raw);
            if (message) messages.push(message);
        }
        return messages;
    }

    /**
     * Borra participantes, historial y marcas de actividad de la sala
     */
    async clear(): Promise<void> {
        await this.kv.del(this.participantsKey, this.messagesKey);
        await this.kv.srem(STATE_KEYS.activeRooms, this.roomId);
        await this.kv.hdel(STATE_KEYS.emptyRooms, this.roomId);
    }

    /**
     * Sala con gente: expiración de 24 h y fuera de la lista de vacías
     */
    private async touch(): Promise<void> {
        await this.kv.pexpire(this.participantsKey, ROOM_EXPIRY_MS);
        await this.kv.pexpire(this.messagesKey, ROOM_EXPIRY_MS);
        await this.kv.sadd(STATE_KEYS.activeRooms, this.roomId);
        await this.kv.hdel(STATE_KEYS.emptyRooms, this.roomId);
    }

    async markEmpty(): Promise<void> {
        await this.kv.srem(STATE_KEYS.activeRooms, this.roomId);
        await this.kv.hset(STATE_KEYS.emptyRooms, { [this.roomId]: String(this.now()) });
        await this.kv.pexpire(this.messagesKey, EMPTY_ROOM_GRACE_MS);
    }
}

/**
 * Fachada del estado de las salas (registro + chat + ciclo de vida).
 * El backend (memoria o Redis) solo cambia la durabilidad.
 */
export class RoomStateStore {
    private readonly mutex = new KeyedMutex();
    private readonly now: () => number;

    constructor(private readonly kv: KeyValueStore, options: RoomStateStoreOptions = {}) {
        this.now = options.now ?? Date.now;
    }

    /**
     * Ejecuta una secuencia compuesta con la sala bloqueada
     */
    withRoom<T>(roomId: string, task: (room: RoomState) => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(roomId, () => task(this.view(roomId)));
    }

    addOrUpdate(roomId: string, participant: Participant): Promise<void> {
        return this.withRoom(roomId, room => room.addOrUpdate(participant));
    }

    remove(roomId: string, participantId: string): Promise<boolean> {
        return this.withRoom(roomId, room => room.remove(participantId));
    }

    setController(roomId: string, participantId: string): Promise<void> {
        return this.withRoom(roomId, room => room.setController(participantId));
    }

    transferControlToNext(roomId: string, excludingId: string): Promise<Participant | null> {
        return this.withRoom(roomId, room => room.transferControlToNext(excludingId));
    }

    ensureControlConsistency(roomId: string): Promise<Participant | null> {
        return this.withRoom(roomId, room => room.ensureControlConsistency());
    }

    appendMessage(roomId: string, message: ChatMessage): Promise<void> {
        return this.withRoom(roomId, room => room.appendMessage(message));
    }

    clearRoomData(roomId: string): Promise<void> {
        return this.withRoom(roomId, room => room.clear());
    }

    // Lecturas sin bloqueo

    get(roomId: string, participantId: string): Promise<Participant | null> {
        return this.view(roomId).get(participantId);
    }

    listOrderedByJoin(roomId: string): Promise<Participant[]> {
        return this.view(roomId).listOrderedByJoin();
    }

    count(roomId: string): Promise<number> {
        return this.view(roomId).count();
    }

    getController(roomId: string): Promise<Participant | null> {
        return this.view(roomId).getController();
    }

    listMessages(roomId: string): Promise<ChatMessage[]> {
        return this.view(roomId).listMessages();
    }

    listActiveRoomIds(): Promise<string[]> {
        return this.kv.smembers(STATE_KEYS.activeRooms);
    }

    /**
     * Purga las salas vacías cuya ventana de gracia ya venció.
     * Devuelve los ids purgados.
     */
    async cleanupEmptyRooms(): Promise<string[]> {
        const now = this.now();

        // Salas marcadas como activas pero sin nadie (p. ej. expiró el registro)
        for (const roomId of await this.listActiveRoomIds()) {
            await this.withRoom(roomId, async room => {
                if ((await room.count()) === 0) await room.markEmpty();
            });
        }

        const purged: string[] = [];
        const marks = await this.kv.hgetall(STATE_KEYS.emptyRooms);
        for (const [roomId, emptiedAt] of Object.entries(marks)) {
            await this.withRoom(roomId, async room => {
                if ((await room.count()) > 0) {
                    await this.kv.hdel(STATE_KEYS.emptyRooms, roomId);
                    return;
                }
                if (now - Number(emptiedAt) >= EMPTY_ROOM_GRACE_MS) {
                    await room.clear();
                    purged.push(roomId);
                }
            });
        }

        await this.kv.sweepExpired();
        return purged;
    }

    private view(roomId: string): RoomState {
        return new RoomState(roomId, this.kv, this.now);
    }
}

/**
 * Campos a escribir (nuevos o modificados) y a borrar entre dos versiones del registro
 */
function diffRoster(before: Participant[], after: Participant[]): { written: Participant[]; removed: string[] } {
    const previous = new Map(before.map(p => [p.id, encode(p)]));
    const kept = new Set(after.map(p => p.id));

    return {
        written: after.filter(p => previous.get(p.id) !== encode(p)),
        removed: before.filter(p => !kept.has(p.id)).map(p => p.id)
    };
}
