// src/services/room-session.service.ts

import {
    ActionResult,
    Participant,
    Room,
    RoomDirectory,
    RoomNotifier,
    SessionContext,
    SYNC_MODES,
    SyncMode
} from '../core/domain';
import { SERVER_EVENTS } from '../core/constants';
import { collaboratorFailed, invalid, isRoomError, notFound, permissionDenied } from '../core/errors/room.errors';
import { MAX_CHAT_MESSAGE_LENGTH } from '../config/constants';
import {
    createChatMessage,
    createSystemMessage,
    toMessageView,
    toParticipantSnapshot
} from '../utils/mappers/room.mappers';
import { ControlChange, ControlService } from './control.service';
import { PositionReconciler } from './position-sync.service';
import { RoomState, RoomStateStore } from './room-state.store';
import { SessionRegistry } from './session.registry';

export type RoomSessionDeps = {
    store: RoomStateStore;
    rooms: RoomDirectory;
    control: ControlService;
    reconciler: PositionReconciler;
    sessions: SessionRegistry;
    notifier: RoomNotifier;
    now?: () => number;
};

export type VideoChange = {
    url: string;
    title: string;
    thumbnail?: string | null;
};

/**
 * Sesión de coordinación de salas.
 * La mutación del estado y las notificaciones van juntas con la sala bloqueada,
 * así el orden de difusión es el orden de aceptación. Las acciones que exigen
 * el control lo comprueban dentro del bloqueo, antes de escribir en el servicio de metadatos.
 */
export class RoomSessionService {
    private readonly store: RoomStateStore;
    private readonly rooms: RoomDirectory;
    private readonly control: ControlService;
    private readonly reconciler: PositionReconciler;
    private readonly sessions: SessionRegistry;
    private readonly notifier: RoomNotifier;
    private readonly now: () => number;

    constructor(deps: RoomSessionDeps) {
        this.store = deps.store;
        this.rooms = deps.rooms;
        this.control = deps.control;
        this.reconciler = deps.reconciler;
        this.sessions = deps.sessions;
        this.notifier = deps.notifier;
        this.now = deps.now ?? Date.now;
    }

    // Salas

    joinRoom(ctx: SessionContext, roomId: string, password?: string): Promise<ActionResult> {
        return this.run(ctx, 'unirse a la sala', async () => {
            const room = await this.requireActiveRoom(roomId);
            const isAdmin = room.adminId === ctx.user.id;

            if (room.isPrivate && !isAdmin && !(await this.rooms.validateRoomPassword(roomId, password))) {
                throw permissionDenied('Contraseña incorrecta.');
            }

            // Una conexión solo puede estar en una sala
            const previous = this.sessions.get(ctx.connectionId);
            if (previous && previous.roomId !== roomId) {
                await this.departRoom(previous.roomId, previous.participantId, ctx.connectionId);
            }

            await this.store.withRoom(roomId, async state => {
                const existing = await state.get(ctx.user.id);
                if (existing) {
                    await this.resumeParticipant(ctx, state, room, existing);
                } else {
                    await this.admitParticipant(ctx, state, room, isAdmin);
                }
            });
        });
    }

    leaveRoom(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'salir de la sala', async () => {
            const session = this.sessions.get(ctx.connectionId);
            if (!session || session.roomId !== roomId) return;

            await this.departRoom(roomId, session.participantId, ctx.connectionId);
        });
    }

    /**
     * Una desconexión es una salida inmediata, sin periodo de gracia
     */
    async disconnect(ctx: SessionContext): Promise<void> {
        const session = this.sessions.get(ctx.connectionId);
        if (!session) return;

        console.log(`🔌 ${session.participantId} (${ctx.connectionId}) se desconectó de la sala ${session.roomId}`);
        await this.run(ctx, 'procesar la desconexión', () =>
            this.departRoom(session.roomId, session.participantId, ctx.connectionId)
        );
    }

    requestParticipants(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'obtener los participantes', async () => {
            const adminId = await this.resolveAdminId(roomId);
            const participants = await this.store.listOrderedByJoin(roomId);

            this.notifier.toConnection(ctx.connectionId, SERVER_EVENTS.ROOM_PARTICIPANTS, {
                participants: participants.map(p => toParticipantSnapshot(p, adminId))
            });
        });
    }

    closeRoom(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'cerrar la sala', async () => {
            if (!(await this.rooms.isUserAdmin(roomId, ctx.user.id))) {
                throw permissionDenied('Solo el administrador puede cerrar la sala.');
            }
            if (!(await this.rooms.endRoom(roomId, ctx.user.id))) {
                throw collaboratorFailed('No se pudo cerrar la sala.');
            }

            await this.store.withRoom(roomId, async state => {
                this.notifier.toRoom(roomId, SERVER_EVENTS.ROOM_CLOSED, {
                    roomId,
                    reason: 'El administrador cerró la sala'
                });

                for (const participant of await state.listOrderedByJoin()) {
                    this.notifier.detach(participant.connectionId, roomId);
                    this.sessions.clear(participant.connectionId, roomId);
                }

                await state.clear();
                this.reconciler.clearRoom(roomId);
            });

            console.log(`🔒 Sala ${roomId} cerrada por ${ctx.user.id}`);
        });
    }

    updateSyncMode(ctx: SessionContext, roomId: string, mode: string): Promise<ActionResult> {
        return this.run(ctx, 'cambiar el modo de sincronización', async () => {
            const room = await this.requireActiveRoom(roomId);
            if (room.adminId !== ctx.user.id) {
                throw permissionDenied('Solo el administrador puede cambiar el modo de sincronización.');
            }
            if (!isSyncMode(mode)) {
                throw invalid("Modo de sincronización inválido. Debe ser 'relaxed' o 'strict'.");
            }
            if (!(await this.rooms.updateSyncMode(roomId, mode))) {
                throw collaboratorFailed('No se pudo guardar el modo de sincronización.');
            }

            await this.store.withRoom(roomId, async () => {
                this.notifier.toRoom(roomId, SERVER_EVENTS.SYNC_MODE_CHANGED, { syncMode: mode });
                if (mode === 'strict') {
                    this.notifier.toRoom(roomId, SERVER_EVENTS.FORCE_SYNC, {
                        position: room.currentPosition,
                        isPlaying: room.isPlaying
                    });
                }
            });

            console.log(`🎚️ Sala ${roomId}: ${ctx.user.id} cambió el modo a ${mode}`);
        });
    }

    // Control y participantes

    transferControl(ctx: SessionContext, roomId: string, targetParticipantId: string): Promise<ActionResult> {
        return this.run(ctx, 'transferir el control', async () => {
            const room = await this.requireActiveRoom(roomId);
            const isAdmin = room.adminId === ctx.user.id;

            await this.store.withRoom(roomId, async state => {
                const change = await this.control.transfer(state, ctx.user.id, targetParticipantId, isAdmin);
                this.announceControl(roomId, change);
                await this.broadcastParticipants(state, room.adminId);
            });

            console.log(`🎮 Sala ${roomId}: ${ctx.user.id} transfirió el control a ${targetParticipantId}`);
        });
    }

    kickUser(ctx: SessionContext, roomId: string, targetUserId: string): Promise<ActionResult> {
        return this.run(ctx, 'expulsar al usuario', async () => {
            const room = await this.requireActiveRoom(roomId);
            if (room.adminId !== ctx.user.id) {
                throw permissionDenied('Solo el administrador puede expulsar usuarios.');
            }
            if (targetUserId === ctx.user.id) {
                throw invalid('El administrador no puede expulsarse a sí mismo.');
            }

            await this.store.withRoom(roomId, async state => {
                const target = await state.get(targetUserId);
                if (!target) {
                    throw notFound('El usuario no está en la sala.');
                }

                const admin = await state.get(ctx.user.id);
                const adminName = admin?.displayName ?? ctx.user.displayName;

                const { change } = await this.control.release(state, target.id);

                this.notifier.toConnection(target.connectionId, SERVER_EVENTS.USER_KICKED, {
                    roomId,
                    reason: `Has sido expulsado de la sala por ${adminName}`
                });
                this.notifier.detach(target.connectionId, roomId);
                this.sessions.clear(target.connectionId, roomId);

                const notice = createSystemMessage(`${target.displayName} fue expulsado de la sala por ${adminName}`, this.now());
                await state.appendMessage(notice);
                this.notifier.toRoom(roomId, SERVER_EVENTS.CHAT_MESSAGE, toMessageView(notice));

                this.announceControl(roomId, change);
                await this.broadcastParticipants(state, room.adminId);

                console.log(`👢 ${target.displayName} (${target.id}) expulsado de la sala ${roomId} por ${ctx.user.id}`);
            });
        });
    }

    // Chat

    sendMessage(ctx: SessionContext, roomId: string, text: string): Promise<ActionResult> {
        return this.run(ctx, 'enviar el mensaje', async () => {
            const content = text.trim();
            if (!content) {
                throw invalid('El mensaje no puede estar vacío.');
            }
            if (content.length > MAX_CHAT_MESSAGE_LENGTH) {
                throw invalid(`El mensaje supera los ${MAX_CHAT_MESSAGE_LENGTH} caracteres.`);
            }

            await this.store.withRoom(roomId, async state => {
                const sender = await state.get(ctx.user.id);
                if (!sender) {
                    throw notFound('Ya no estás en esta sala.');
                }

                const message = createChatMessage(sender, content, this.now());
                await state.appendMessage(message);
                this.notifier.toRoom(roomId, SERVER_EVENTS.CHAT_MESSAGE, toMessageView(message));
            });
        });
    }

    // Reproducción

    changeVideo(ctx: SessionContext, roomId: string, video: VideoChange): Promise<ActionResult> {
        return this.run(ctx, 'cambiar el video', async () => {
            const url = video.url.trim();
            if (!url) {
                throw invalid('La URL del video no puede estar vacía.');
            }

            await this.store.withRoom(roomId, async state => {
                await this.authorizePlayback(ctx, state);
                if (!(await this.rooms.updateVideoUrl(roomId, url))) {
                    throw collaboratorFailed('No se pudo guardar el nuevo video.');
                }

                this.reconciler.clearRoom(roomId);
                this.notifier.toRoom(roomId, SERVER_EVENTS.VIDEO_CHANGED, {
                    videoUrl: url,
                    videoTitle: video.title,
                    videoThumbnail: video.thumbnail ?? null
                });
            });

            console.log(`🎬 Sala ${roomId}: ${ctx.user.id} cambió el video a ${url}`);
        });
    }

    playVideo(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'reproducir el video', async () => {
            await this.commitPlayback(ctx, roomId, room => ({ position: room.currentPosition, isPlaying: true }));
        });
    }

    pauseVideo(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'pausar el video', async () => {
            await this.commitPlayback(ctx, roomId, room => ({ position: room.currentPosition, isPlaying: false }));
        });
    }

    seekVideo(ctx: SessionContext, roomId: string, position: number): Promise<ActionResult> {
        return this.run(ctx, 'mover la reproducción', async () => {
            assertPosition(position);
            await this.commitPlayback(ctx, roomId, room => ({ position, isPlaying: room.isPlaying }));
        });
    }

    /**
     * Informe periódico de posición. Del controlador es además el latido
     * que se reenvía al resto de la sala.
     */
    reportPosition(ctx: SessionContext, roomId: string, position: number): Promise<ActionResult> {
        return this.run(ctx, 'informar la posición', async () => {
            assertPosition(position);

            await this.store.withRoom(roomId, async state => {
                // El control se comprueba con la sala bloqueada: una transferencia en curso ya se ve
                const reporter = await state.get(ctx.user.id);
                if (!reporter) {
                    throw notFound('No estás en esta sala.');
                }

                const room = await this.requireActiveRoom(roomId);
                if (reporter.hasControl) {
                    if (!(await this.rooms.updatePlaybackState(roomId, position, room.isPlaying))) {
                        throw collaboratorFailed('No se pudo guardar la posición de reproducción.');
                    }
                    this.notifier.toRoomExcept(roomId, ctx.connectionId, SERVER_EVENTS.HEARTBEAT, { position });
                }

                const result = this.reconciler.report(roomId, ctx.connectionId, position, await state.count());
                if (!result) return;

                for (const connectionId of result.outliers) {
                    this.notifier.toConnection(connectionId, SERVER_EVENTS.FORCE_SYNC, {
                        position: result.median,
                        isPlaying: room.isPlaying
                    });
                    console.log(`⏱️ Resincronizando ${connectionId} en la sala ${roomId} (mediana ${result.median})`);
                }
            });
        });
    }

    requestSync(ctx: SessionContext, roomId: string): Promise<ActionResult> {
        return this.run(ctx, 'sincronizar la reproducción', async () => {
            const room = await this.requireActiveRoom(roomId);
            this.notifier.toConnection(ctx.connectionId, SERVER_EVENTS.FORCE_SYNC, {
                position: room.currentPosition,
                isPlaying: room.isPlaying
            });
        });
    }

    /**
     * Rechazo previo a la sesión (p. ej. payload inválido)
     */
    reject(ctx: SessionContext, message: string): ActionResult {
        console.warn(`⚠️ Acción rechazada para ${ctx.user.id}: ${message}`);
        return this.fail(ctx, message);
    }

    // Secuencias internas

    private async admitParticipant(ctx: SessionContext, state: RoomState, room: Room, isAdmin: boolean): Promise<void> {
        const { user, connectionId } = ctx;
        const change = await this.control.admit(state, {
            id: user.id,
            connectionId,
            displayName: user.displayName,
            avatarUrl: user.avatarUrl,
            joinedAt: this.now()
        }, isAdmin);

        this.notifier.attach(connectionId, room.id);
        this.sessions.set(connectionId, { roomId: room.id, participantId: user.id, displayName: user.displayName });

        const joined = { roomId: room.id, participantId: user.id, displayName: user.displayName, avatarUrl: user.avatarUrl };
        this.notifier.toConnection(connectionId, SERVER_EVENTS.ROOM_JOINED, joined);
        this.notifier.toRoomExcept(room.id, connectionId, SERVER_EVENTS.ROOM_JOINED, joined);
        this.notifier.toRoomExcept(room.id, connectionId, SERVER_EVENTS.PARTICIPANT_JOINED_NOTICE, { displayName: user.displayName });

        this.announceControl(room.id, change);
        await this.broadcastParticipants(state, room.adminId);

        this.notifier.toConnection(connectionId, SERVER_EVENTS.FORCE_SYNC, {
            position: room.currentPosition,
            isPlaying: room.isPlaying
        });
        await this.sendChatHistory(state, connectionId);

        console.log(`👤 ${user.displayName} (${user.id}) se unió a la sala ${room.id}. Participantes: ${await state.count()}`);
    }

    /**
     * Reconexión: misma identidad, nueva conexión. Nadie más recibe aviso de entrada.
     */
    private async resumeParticipant(ctx: SessionContext, state: RoomState, room: Room, existing: Participant): Promise<void> {
        const { user, connectionId } = ctx;

        if (existing.connectionId !== connectionId) {
            this.notifier.detach(existing.connectionId, room.id);
            this.sessions.clear(existing.connectionId, room.id);
        }

        const { participant, change } = await this.control.reconnect(state, existing, connectionId, user);

        this.notifier.attach(connectionId, room.id);
        this.sessions.set(connectionId, { roomId: room.id, participantId: user.id, displayName: participant.displayName });

        this.notifier.toConnection(connectionId, SERVER_EVENTS.ROOM_JOINED, {
            roomId: room.id,
            participantId: participant.id,
            displayName: participant.displayName,
            avatarUrl: participant.avatarUrl
        });

        const participants = await state.listOrderedByJoin();
        this.notifier.toConnection(connectionId, SERVER_EVENTS.ROOM_PARTICIPANTS, {
            participants: participants.map(p => toParticipantSnapshot(p, room.adminId))
        });

        if (change.changed) {
            this.announceControl(room.id, change);
        } else if (participant.hasControl) {
            this.notifier.toConnection(connectionId, SERVER_EVENTS.CONTROL_TRANSFERRED, {
                newControllerId: participant.id,
                newControllerName: participant.displayName
            });
        }

        this.notifier.toConnection(connectionId, SERVER_EVENTS.FORCE_SYNC, {
            position: room.currentPosition,
            isPlaying: room.isPlaying
        });
        await this.sendChatHistory(state, connectionId);

        console.log(`🔄 ${participant.displayName} (${participant.id}) reconectado a la sala ${room.id} (control: ${participant.hasControl})`);
    }

    /**
     * Salida (explícita o por desconexión). Idempotente: si el participante ya no está,
     * o está registrado con otra conexión, no notifica nada.
     */
    private async departRoom(roomId: string, participantId: string, connectionId: string): Promise<void> {
        const adminId = await this.resolveAdminId(roomId);

        await this.store.withRoom(roomId, async state => {
            this.notifier.detach(connectionId, roomId);
            this.sessions.clear(connectionId, roomId);

            const current = await state.get(participantId);
            if (!current || current.connectionId !== connectionId) return;

            const { removed, remaining, change } = await this.control.release(state, participantId);
            if (!removed) return;

            this.announceControl(roomId, change);
            this.notifier.toRoom(roomId, SERVER_EVENTS.ROOM_LEFT, {
                roomId,
                participantId,
                displayName: removed.displayName
            });
            this.notifier.toRoom(roomId, SERVER_EVENTS.PARTICIPANT_LEFT_NOTICE, { displayName: removed.displayName });

            if (remaining > 0) {
                await this.broadcastParticipants(state, adminId);
            } else {
                // El historial sobrevive la ventana de gracia; los informes de posición no
                this.reconciler.clearRoom(roomId);
                console.log(`🕳️ Sala ${roomId} vacía`);
            }

            console.log(`🚪 ${removed.displayName} (${participantId}) salió de la sala ${roomId}. Quedan: ${remaining}`);
        });
    }

    /**
     * Solo con la sala bloqueada: así nadie que acaba de ceder el control lo sigue usando
     */
    private async authorizePlayback(ctx: SessionContext, state: RoomState): Promise<Room> {
        const participant = await state.get(ctx.user.id);
        if (!participant) {
            throw notFound('No estás en esta sala.');
        }

        const room = await this.requireActiveRoom(state.roomId);
        if (!participant.hasControl && room.adminId !== ctx.user.id) {
            throw permissionDenied('No tienes permiso para controlar la reproducción.');
        }
        return room;
    }

    /**
     * Primero se guarda en el servicio de metadatos; solo si tuvo éxito se difunde
     */
    private async commitPlayback(
        ctx: SessionContext,
        roomId: string,
        next: (room: Room) => { position: number; isPlaying: boolean }
    ): Promise<void> {
        await this.store.withRoom(roomId, async state => {
            const room = await this.authorizePlayback(ctx, state);
            const { position, isPlaying } = next(room);

            if (!(await this.rooms.updatePlaybackState(roomId, position, isPlaying))) {
                throw collaboratorFailed('No se pudo guardar el estado de reproducción.');
            }
            this.notifier.toRoom(roomId, SERVER_EVENTS.PLAYBACK_UPDATE, { position, isPlaying });
        });
    }

    private async requireActiveRoom(roomId: string): Promise<Room> {
        const room = await this.rooms.getRoomById(roomId);
        if (!room || !room.isActive) {
            throw notFound('La sala no existe o ya no está activa.');
        }
        return room;
    }

    /**
     * Solo para marcar al administrador en las instantáneas: si el servicio
     * de metadatos falla la salida sigue adelante sin esa marca.
     */
    private async resolveAdminId(roomId: string): Promise<string | null> {
        try {
            const room = await this.rooms.getRoomById(roomId);
            return room ? room.adminId : null;
        } catch (error) {
            console.error(`❌ No se pudo leer la sala ${roomId}:`, error);
            return null;
        }
    }

    private announceControl(roomId: string, change: ControlChange): void {
        if (!change.changed || !change.controller) return;

        this.notifier.toRoom(roomId, SERVER_EVENTS.CONTROL_TRANSFERRED, {
            newControllerId: change.controller.id,
            newControllerName: change.controller.displayName
        });
    }

    private async broadcastParticipants(state: RoomState, adminId: string | null): Promise<void> {
        const participants = await state.listOrderedByJoin();
        this.notifier.toRoom(state.roomId, SERVER_EVENTS.ROOM_PARTICIPANTS, {
            participants: participants.map(p => toParticipantSnapshot(p, adminId))
        });
    }

    private async sendChatHistory(state: RoomState, connectionId: string): Promise<void> {
        const messages = await state.listMessages();
        this.notifier.toConnection(connectionId, SERVER_EVENTS.CHAT_HISTORY, {
            messages: messages.map(toMessageView)
        });
    }

    /**
     * Frontera de errores: ninguna acción lanza hacia la capa de transporte
     */
    private async run(ctx: SessionContext, action: string, task: () => Promise<void>): Promise<ActionResult> {
        try {
            await task();
            return { success: true };
        } catch (error) {
            if (isRoomError(error)) {
                console.warn(`⚠️ No se pudo ${action} (${ctx.user.id}): ${error.message}`);
                return this.fail(ctx, error.message);
            }

            console.error(`❌ Error al ${action} (${ctx.connectionId}):`, error);
            return this.fail(ctx, `Ocurrió un error al ${action}.`);
        }
    }

    private fail(ctx: SessionContext, message: string): ActionResult {
        this.notifier.toConnection(ctx.connectionId, SERVER_EVENTS.ERROR, { message });
        return { success: false, error: message };
    }
}

function isSyncMode(value: string): value is SyncMode {
    return SYNC_MODES.some(mode => mode === value);
}

function assertPosition(position: number): void {
    if (!Number.isFinite(position) || position < 0) {
        throw invalid('La posición debe ser un número mayor o igual a cero.');
    }
}
