// src/sockets/handlers/connection.handlers.ts

import { Socket } from 'socket.io';
import { SessionContext } from '../../core/domain';
import { RoomSessionService } from '../../services/room-session.service';

/**
 * Maneja la desconexión: salida inmediata de la sala en la que estuviera
 */
export function registerConnectionHandlers(socket: Socket, ctx: SessionContext, session: RoomSessionService): void {

    socket.on('disconnect', (reason) => {
        console.log(`Socket desconectado: ${socket.id}, razón: ${reason}`);

        session.disconnect(ctx).catch(error =>
            console.error(`❌ Error al procesar la desconexión de ${socket.id}:`, error)
        );
    });
}
