// src/core/errors/room.errors.ts

/**
 * Categorías de error de una acción sobre una sala
 */
export type RoomErrorKind =
    | 'not_found'          // sala inexistente o inactiva, participante ausente
    | 'permission_denied'  // sin control ni rol de administrador
    | 'validation'         // datos de entrada inválidos
    | 'collaborator';      // falló el servicio de metadatos

/**
 * Error esperado de una acción. Se notifica al cliente y nunca corta la conexión
 */
export class RoomError extends Error {
    constructor(readonly kind: RoomErrorKind, message: string) {
        super(message);
        this.name = 'RoomError';
    }
}

export const notFound = (message: string) => new RoomError('not_found', message);

export const permissionDenied = (message: string) => new RoomError('permission_denied', message);

export const invalid = (message: string) => new RoomError('validation', message);

export const collaboratorFailed = (message: string) => new RoomError('collaborator', message);

export function isRoomError(error: unknown): error is RoomError {
    return error instanceof RoomError;
}
