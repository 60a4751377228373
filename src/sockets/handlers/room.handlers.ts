// src/sockets/handlers/room.handlers.ts

import { Socket } from 'socket.io';
import { SessionContext } from '../../core/domain';
import { CLIENT_EVENTS } from '../../core/constants';
import { RoomSessionService } from '../../services/room-session.service';
import { joinRoomSchema, kickUserSchema, roomSchema, syncModeSchema, transferControlSchema } from '../schemas';
import { bindAction } from '../utils.handlers';

/**
 * Maneja eventos de salas, participantes y control
 */
export function registerRoomHandlers(socket: Socket, ctx: SessionContext, session: RoomSessionService): void {

    // Unirse a sala (también reconexión)
    bindAction(socket, ctx, session, CLIENT_EVENTS.JOIN_ROOM, joinRoomSchema, ({ roomId, password }) =>
        session.joinRoom(ctx, roomId, password)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.LEAVE_ROOM, roomSchema, ({ roomId }) =>
        session.leaveRoom(ctx, roomId)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.CLOSE_ROOM, roomSchema, ({ roomId }) =>
        session.closeRoom(ctx, roomId)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.REQUEST_PARTICIPANTS, roomSchema, ({ roomId }) =>
        session.requestParticipants(ctx, roomId)
    );

    bindAction(socket, ctx, session, CLIENT_EVENTS.UPDATE_SYNC_MODE, syncModeSchema, ({ roomId, mode }) =>
        session.updateSyncMode(ctx, roomId, mode)
    );

    // Transferir control
    bindAction(socket, ctx, session, CLIENT_EVENTS.TRANSFER_CONTROL, transferControlSchema, ({ roomId, targetParticipantId }) =>
        session.transferControl(ctx, roomId, targetParticipantId)
    );

    // Expulsar participante
    bindAction(socket, ctx, session, CLIENT_EVENTS.KICK_USER, kickUserSchema, ({ roomId, targetUserId }) =>
        session.kickUser(ctx, roomId, targetUserId)
    );
}
