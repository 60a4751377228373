// src/middleware/error.middleware.ts

import { Request, Response, NextFunction } from 'express';
import { isRoomError, RoomErrorKind } from '../core/errors/room.errors';

const STATUS_BY_KIND: Record<RoomErrorKind, number> = {
    not_found: 404,
    permission_denied: 403,
    validation: 400,
    collaborator: 502
};

/**
 * Middleware global para manejo de errores
 * Los errores de sala se traducen a su código HTTP; el resto es un 500
 */
export function errorMiddleware(
    err: unknown,
    _req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (isRoomError(err)) {
        res.status(STATUS_BY_KIND[err.kind]).json({ error: err.kind, message: err.message });
        return;
    }

    console.error('Error capturado:', err);

    res.status(500).json({
        error: 'Internal Server Error',
        message: err instanceof Error ? err.message : 'Something went wrong'
    });
}
