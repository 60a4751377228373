// src/sockets/handlers/chat.handlers.ts

import { Socket } from 'socket.io';
import { SessionContext } from '../../core/domain';
import { CLIENT_EVENTS } from '../../core/constants';
import { RoomSessionService } from '../../services/room-session.service';
import { sendMessageSchema } from '../schemas';
import { bindAction } from '../utils.handlers';

export function registerChatHandlers(socket: Socket, ctx: SessionContext, session: RoomSessionService): void {
    bindAction(socket, ctx, session, CLIENT_EVENTS.SEND_MESSAGE, sendMessageSchema, ({ roomId, text }) =>
        session.sendMessage(ctx, roomId, text)
    );
}
