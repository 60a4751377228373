// src/core/domain/room.types.ts

/**
 * Modos de sincronización de una sala
 */
export const SYNC_MODES = ['strict', 'relaxed'] as const;

export type SyncMode = typeof SYNC_MODES[number];

/**
 * Sala persistida. La gestiona el servicio de metadatos, no el motor de coordinación
 */
export type Room = {
    id: string;
    name: string;
    inviteCode: string;
    adminId: string;
    isActive: boolean;
    isPrivate: boolean;
    passwordHash: string | null;
    videoUrl: string;
    currentPosition: number;
    isPlaying: boolean;
    syncMode: SyncMode;
    createdAt: Date;
    endedAt: Date | null;
};

/**
 * Estado público de una sala (sin información sensible)
 */
export type PublicRoom = Omit<Room, 'passwordHash'>;

export type CreateRoomInput = {
    name: string;
    adminId: string;
    videoUrl?: string;
    isPrivate?: boolean;
    password?: string;
    syncMode?: SyncMode;
};

/**
 * Contrato del servicio de metadatos de salas
 */
export interface RoomDirectory {
    getRoomById(roomId: string): Promise<Room | null>;
    getRoomByInviteCode(inviteCode: string): Promise<Room | null>;
    validateRoomPassword(roomId: string, password?: string): Promise<boolean>;
    isUserAdmin(roomId: string, userId: string): Promise<boolean>;
    canUserControlRoom(roomId: string, userId: string): Promise<boolean>;
    updatePlaybackState(roomId: string, position: number, isPlaying: boolean): Promise<boolean>;
    updateVideoUrl(roomId: string, videoUrl: string): Promise<boolean>;
    updateSyncMode(roomId: string, syncMode: SyncMode): Promise<boolean>;
    endRoom(roomId: string, userId: string): Promise<boolean>;
}
