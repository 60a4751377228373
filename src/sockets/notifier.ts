// src/sockets/notifier.ts

import { Server } from 'socket.io';
import { RoomNotifier, ServerEventName, ServerEventPayloads } from '../core/domain';

/**
 * Canal de salida sobre Socket.IO: cada sala es un room de Socket.IO con el mismo id
 */
export class SocketIoNotifier implements RoomNotifier {
    constructor(private readonly io: Server) {}

    toRoom<E extends ServerEventName>(roomId: string, event: E, payload: ServerEventPayloads[E]): void {
        this.io.to(roomId).emit(event, payload);
    }

    toRoomExcept<E extends ServerEventName>(
        roomId: string,
        excludedConnectionId: string,
        event: E,
        payload: ServerEventPayloads[E]
    ): void {
        this.io.to(roomId).except(excludedConnectionId).emit(event, payload);
    }

    toConnection<E extends ServerEventName>(connectionId: string, event: E, payload: ServerEventPayloads[E]): void {
        this.io.to(connectionId).emit(event, payload);
    }

    attach(connectionId: string, roomId: string): void {
        this.io.in(connectionId).socketsJoin(roomId);
    }

    detach(connectionId: string, roomId: string): void {
        this.io.in(connectionId).socketsLeave(roomId);
    }
}
