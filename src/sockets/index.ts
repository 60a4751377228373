// src/sockets/index.ts
import { Server } from 'socket.io';
import type { Server as HttpServer } from 'http';

import { CORS_ORIGIN } from '../config/env.config';
import { RoomDirectory } from '../core/domain';
import { ControlService } from '../services/control.service';
import { PositionReconciler } from '../services/position-sync.service';
import { RoomSessionService } from '../services/room-session.service';
import { RoomStateStore } from '../services/room-state.store';
import { SessionRegistry } from '../services/session.registry';
import { registerChatHandlers } from './handlers/chat.handlers';
import { registerConnectionHandlers } from './handlers/connection.handlers';
import { registerPlaybackHandlers } from './handlers/playback.handlers';
import { registerRoomHandlers } from './handlers/room.handlers';
import { authMiddleware, getIdentity } from './middleware/auth.middleware';
import { SocketIoNotifier } from './notifier';

export type SocketDeps = {
    store: RoomStateStore;
    rooms: RoomDirectory;
    corsOrigin?: string;
    now?: () => number;
};

export function initSocket(server: HttpServer, deps: SocketDeps) {
    const io = new Server(server, {
        cors: { origin: deps.corsOrigin ?? CORS_ORIGIN },
        // Configuración optimizada para móviles
        pingTimeout: 60000,          // 60 segundos antes de considerar desconexión
        pingInterval: 25000,          // Verificar conexión cada 25 segundos
        connectTimeout: 45000,        // 45 segundos para establecer conexión
        transports: ['websocket', 'polling'], // Usar WebSocket con fallback a polling
        allowUpgrades: true,          // Permitir upgrade de polling a websocket
        perMessageDeflate: false      // Desactivar compresión para mejor rendimiento en móvil
    });

    const session = new RoomSessionService({
        store: deps.store,
        rooms: deps.rooms,
        control: new ControlService(),
        reconciler: new PositionReconciler(),
        sessions: new SessionRegistry(),
        notifier: new SocketIoNotifier(io),
        now: deps.now
    });

    io.use(authMiddleware);

    io.on('connection', (socket) => {
        const user = getIdentity(socket);
        if (!user) {
            socket.disconnect(true);
            return;
        }

        console.log(`Socket conectado: ${socket.id} (${user.displayName})`);
        const ctx = { connectionId: socket.id, user };

        // Handlers separados
        registerRoomHandlers(socket, ctx, session);
        registerPlaybackHandlers(socket, ctx, session);
        registerChatHandlers(socket, ctx, session);
        registerConnectionHandlers(socket, ctx, session);
    });

    return { io, session };
}
