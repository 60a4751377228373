// src/routes/room.routes.ts

import { Router } from 'express';
import { z } from 'zod';
import { SYNC_MODES } from '../core/domain';
import { invalid, notFound } from '../core/errors/room.errors';
import { RoomService } from '../services/room.service';

const createRoomSchema = z.object({
    name: z.string().trim().min(1).max(100),
    videoUrl: z.string().optional(),
    isPrivate: z.boolean().optional(),
    password: z.string().min(1).optional(),
    syncMode: z.enum(SYNC_MODES).optional()
});

/**
 * Rutas de metadatos de salas. La identidad llega en `x-user-id`,
 * fijada por la capa de autenticación previa.
 */
export function createRoomRouter(roomService: RoomService): Router {
    const router = Router();

    router.post('/', async (req, res, next) => {
        try {
            const adminId = req.header('x-user-id')?.trim();
            if (!adminId) {
                throw invalid('Falta el encabezado x-user-id.');
            }

            const parsed = createRoomSchema.safeParse(req.body);
            if (!parsed.success) {
                throw invalid(parsed.error.issues[0]?.message ?? 'Datos de sala inválidos.');
            }

            const room = await roomService.createRoom({ ...parsed.data, adminId });
            res.status(201).json(roomService.toPublic(room));
        } catch (error) {
            next(error);
        }
    });

    // Antes que /:roomId para que "invite" no se tome como id
    router.get('/invite/:inviteCode', async (req, res, next) => {
        try {
            const room = await roomService.getRoomByInviteCode(req.params.inviteCode);
            if (!room) throw notFound('No existe una sala con ese código de invitación.');
            res.json(roomService.toPublic(room));
        } catch (error) {
            next(error);
        }
    });

    router.get('/:roomId', async (req, res, next) => {
        try {
            const room = await roomService.getRoomById(req.params.roomId);
            if (!room) throw notFound('La sala no existe.');
            res.json(roomService.toPublic(room));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
