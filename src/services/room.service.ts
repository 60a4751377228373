// src/services/room.service.ts

import { CreateRoomInput, PublicRoom, Room, RoomDirectory, SyncMode } from '../core/domain';
import { generateInviteCode, generateRoomId } from '../utils/generators/id.generator';
import { hashPassword, verifyPassword } from '../utils/crypto/password.util';
import { RoomStateStore } from './room-state.store';

/**
 * Servicio de metadatos de salas (nombre, invitación, contraseña, video, reproducción).
 * Implementación en memoria del contrato RoomDirectory.
 */
export class RoomService implements RoomDirectory {
    private rooms: Map<string, Room> = new Map();

    constructor(
        private readonly state: RoomStateStore,
        private readonly now: () => number = Date.now
    ) {}

    /**
     * Crea una nueva sala con un código de invitación único
     */
    async createRoom(input: CreateRoomInput): Promise<Room> {
        const room: Room = {
            id: generateRoomId(),
            name: input.name,
            inviteCode: this.uniqueInviteCode(),
            adminId: input.adminId,
            isActive: true,
            isPrivate: input.isPrivate ?? false,
            passwordHash: input.isPrivate && input.password ? hashPassword(input.password) : null,
            videoUrl: input.videoUrl ?? '',
            currentPosition: 0,
            isPlaying: false,
            syncMode: input.syncMode ?? 'strict',
            createdAt: new Date(this.now()),
            endedAt: null
        };

        this.rooms.set(room.id, room);
        console.log(`🏠 Sala ${room.id} (${room.inviteCode}) creada por ${room.adminId}`);
        return { ...room };
    }

    async getRoomById(roomId: string): Promise<Room | null> {
        const room = this.rooms.get(roomId);
        return room ? { ...room } : null;
    }

    async getRoomByInviteCode(inviteCode: string): Promise<Room | null> {
        const code = inviteCode.trim().toUpperCase();
        for (const room of this.rooms.values()) {
            if (room.inviteCode === code) return { ...room };
        }
        return null;
    }

    /**
     * Las salas públicas (o privadas sin contraseña) aceptan cualquier contraseña
     */
    async validateRoomPassword(roomId: string, password?: string): Promise<boolean> {
        const room = this.rooms.get(roomId);
        if (!room) return false;
        if (!room.isPrivate || !room.passwordHash) return true;
        if (!password) return false;

        return verifyPassword(password, room.passwordHash);
    }

    async isUserAdmin(roomId: string, userId: string): Promise<boolean> {
        return this.rooms.get(roomId)?.adminId === userId;
    }

    /**
     * Administrador o controlador actual
     */
    async canUserControlRoom(roomId: string, userId: string): Promise<boolean> {
        if (!roomId.trim() || !userId.trim()) return false;
        if (await this.isUserAdmin(roomId, userId)) return true;

        const participant = await this.state.get(roomId, userId);
        return participant !== null && participant.hasControl;
    }

    async updatePlaybackState(roomId: string, position: number, isPlaying: boolean): Promise<boolean> {
        const room = this.activeRoom(roomId);
        if (!room || !Number.isFinite(position) || position < 0) return false;

        room.currentPosition = position;
        room.isPlaying = isPlaying;
        return true;
    }

    /**
     * Cambiar de video reinicia la reproducción (posición 0, en pausa)
     */
    async updateVideoUrl(roomId: string, videoUrl: string): Promise<boolean> {
        const room = this.activeRoom(roomId);
        if (!room || !videoUrl.trim()) return false;

        room.videoUrl = videoUrl;
        room.currentPosition = 0;
        room.isPlaying = false;
        return true;
    }

    async updateSyncMode(roomId: string, syncMode: SyncMode): Promise<boolean> {
        const room = this.activeRoom(roomId);
        if (!room) return false;

        room.syncMode = syncMode;
        console.log(`🎚️ Sala ${roomId}: modo de sincronización ${syncMode}`);
        return true;
    }

    /**
     * Solo el administrador puede terminar una sala activa
     */
    async endRoom(roomId: string, userId: string): Promise<boolean> {
        const room = this.activeRoom(roomId);
        if (!room || room.adminId !== userId) return false;

        room.isActive = false;
        room.endedAt = new Date(this.now());
        console.log(`🔒 Sala ${roomId} terminada por ${userId}`);
        return true;
    }

    /**
     * Estado público de una sala (sin información sensible)
     */
    toPublic(room: Room): PublicRoom {
        const { passwordHash: _passwordHash, ...rest } = room;
        return rest;
    }

    private activeRoom(roomId: string): Room | null {
        const room = this.rooms.get(roomId);
        return room && room.isActive ? room : null;
    }

    private uniqueInviteCode(): string {
        const taken = new Set(Array.from(this.rooms.values(), r => r.inviteCode));
        let code = generateInviteCode();
        while (taken.has(code)) {
            code = generateInviteCode();
        }
        return code;
    }
}
