// src/sockets/middleware/auth.middleware.ts

import { Socket } from 'socket.io';
import { z } from 'zod';
import { UserIdentity } from '../../core/domain';

/**
 * Identidad que envía el cliente en `handshake.auth`.
 * La emisión de tokens queda en manos de la capa de autenticación previa.
 */
const handshakeSchema = z.object({
    userId: z.string().trim().min(1),
    displayName: z.string().trim().min(1).max(50),
    avatarUrl: z.string().url().nullish()
});

const identities = new WeakMap<Socket, UserIdentity>();

export function authMiddleware(socket: Socket, next: (err?: Error) => void): void {
    const parsed = handshakeSchema.safeParse(socket.handshake.auth);
    if (!parsed.success) {
        console.warn(`🚫 Conexión ${socket.id} rechazada: identidad inválida`);
        return next(new Error('Identidad inválida'));
    }

    identities.set(socket, {
        id: parsed.data.userId,
        displayName: parsed.data.displayName,
        avatarUrl: parsed.data.avatarUrl ?? null
    });
    next();
}

/**
 * Identidad ligada a la conexión durante toda su vida
 */
export function getIdentity(socket: Socket): UserIdentity | null {
    return identities.get(socket) ?? null;
}
