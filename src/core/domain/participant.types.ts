// src/core/domain/participant.types.ts

/**
 * Identidad autenticada de una conexión
 */
export type UserIdentity = {
    id: string;
    displayName: string;
    avatarUrl: string | null;
};

/**
 * Participante de una sala
 */
export type Participant = {
    id: string;              // id estable del usuario
    connectionId: string;    // cambia en cada reconexión
    displayName: string;
    avatarUrl: string | null;
    hasControl: boolean;
    joinedAt: number;        // epoch ms, inmutable; orden de sucesión del control
};

/**
 * Vista pública de un participante (lo que reciben los clientes)
 */
export type ParticipantSnapshot = {
    id: string;
    displayName: string;
    avatarUrl: string | null;
    hasControl: boolean;
    joinedAt: string;
    isAdmin: boolean;
};
