// src/services/session.registry.ts

import { SessionRecord } from '../core/domain';

/**
 * Conexión → sala/participante al que está unida.
 * Se fija al unirse y se limpia al salir, ser expulsado o cerrarse la sala.
 */
export class SessionRegistry {
    private sessions: Map<string, SessionRecord> = new Map();

    set(connectionId: string, record: SessionRecord): void {
        this.sessions.set(connectionId, record);
    }

    get(connectionId: string): SessionRecord | null {
        return this.sessions.get(connectionId) ?? null;
    }

    /**
     * Limpia el registro; con `roomId` solo si la conexión sigue en esa sala
     */
    clear(connectionId: string, roomId?: string): void {
        const record = this.sessions.get(connectionId);
        if (!record) return;
        if (roomId !== undefined && record.roomId !== roomId) return;

        this.sessions.delete(connectionId);
    }

    size(): number {
        return this.sessions.size;
    }
}
