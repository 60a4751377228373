// src/sockets/utils.handlers.ts

import { Socket } from 'socket.io';
import { ZodType, ZodTypeDef } from 'zod';
import { ActionResult, SessionContext } from '../core/domain';
import { ClientEvent } from '../core/constants';
import { RoomSessionService } from '../services/room-session.service';

/**
 * Registra una acción: valida el payload, la ejecuta en la sesión
 * y responde por el callback del cliente si lo envió
 */
export function bindAction<T>(
    socket: Socket,
    ctx: SessionContext,
    session: RoomSessionService,
    event: ClientEvent,
    schema: ZodType<T, ZodTypeDef, unknown>,
    action: (payload: T) => Promise<ActionResult>
): void {
    socket.on(event, (payload: unknown, callback?: unknown) => {
        const reply = (result: ActionResult) => {
            if (typeof callback === 'function') callback(result);
        };

        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            reply(session.reject(ctx, `Datos inválidos para ${event}: ${issue?.message ?? 'formato incorrecto'}`));
            return;
        }

        action(parsed.data)
            .then(reply)
            .catch(error => console.error(`❌ Error inesperado en ${event}:`, error));
    });
}
