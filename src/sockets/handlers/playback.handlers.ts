// src/sockets/handlers/playback.handlers.ts

import { Socket } from 'socket.io';
import { SessionContext } from '../../core/domain';
import { CLIENT_EVENTS } from '../../core/constants';
import { RoomSessionService } from '../../services/room-session.service';
import { changeVideoSchema, positionSchema, roomSchema } from '../schemas';
import { bindAction } from '../utils.handlers';

/**
 * Maneja eventos de reproducción y sincronización
 */
export function registerPlaybackHandlers(socket: Socket, ctx: SessionContext, session: RoomSessionService): void {

    bindAction(socket, ctx, session, CLIENT_EVENTS.CHANGE_VIDEO, changeVideoSchema, ({ roomId, url, title, thumbnail }) =>
        session.changeVideo(ctx, roomId, { url, title, thumbnail })
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.PLAY, roomSchema, ({ roomId }) =>
        session.playVideo(ctx, roomId)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.PAUSE, roomSchema, ({ roomId }) =>
        session.pauseVideo(ctx, roomId)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.SEEK, positionSchema, ({ roomId, position }) =>
        session.seekVideo(ctx, roomId, position)
    );

    // Informe periódico (latido si viene del controlador)
    bindAction(socket, ctx, session, CLIENT_EVENTS.REPORT_POSITION, positionSchema, ({ roomId, position }) =>
        session.reportPosition(ctx, roomId, position)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.REQUEST_SYNC, roomSchema, ({ roomId }) =>
        session.requestSync(ctx, roomId)
    );
}
