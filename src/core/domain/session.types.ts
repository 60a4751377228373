// src/core/domain/session.types.ts

import { UserIdentity } from './participant.types';

/**
 * Contexto de la conexión que origina una acción
 */
export type SessionContext = {
    connectionId: string;
    user: UserIdentity;
};

/**
 * Registro explícito de la sala a la que está unida una conexión
 */
export type SessionRecord = {
    roomId: string;
    participantId: string;
    displayName: string;
};

/**
 * Respuesta de una acción (se envía en el callback del cliente)
 */
export type ActionResult =
    | { success: true }
    | { success: false; error: string };
