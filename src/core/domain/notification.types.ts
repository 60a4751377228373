// src/core/domain/notification.types.ts

import { SERVER_EVENTS } from '../constants/socket.events';
import { ChatMessageView } from './chat.types';
import { ParticipantSnapshot } from './participant.types';
import { SyncMode } from './room.types';

export type PlaybackState = {
    position: number;
    isPlaying: boolean;
};

/**
 * Carga útil de cada notificación del servidor
 */
export type ServerEventPayloads = {
    [SERVER_EVENTS.ROOM_JOINED]: { roomId: string; participantId: string; displayName: string; avatarUrl: string | null };
    [SERVER_EVENTS.ROOM_LEFT]: { roomId: string; participantId: string; displayName: string };
    [SERVER_EVENTS.PARTICIPANT_JOINED_NOTICE]: { displayName: string };
    [SERVER_EVENTS.PARTICIPANT_LEFT_NOTICE]: { displayName: string };
    [SERVER_EVENTS.ROOM_PARTICIPANTS]: { participants: ParticipantSnapshot[] };
    [SERVER_EVENTS.CHAT_HISTORY]: { messages: ChatMessageView[] };
    [SERVER_EVENTS.CHAT_MESSAGE]: ChatMessageView;
    [SERVER_EVENTS.CONTROL_TRANSFERRED]: { newControllerId: string; newControllerName: string };
    [SERVER_EVENTS.PLAYBACK_UPDATE]: PlaybackState;
    [SERVER_EVENTS.FORCE_SYNC]: PlaybackState;
    [SERVER_EVENTS.HEARTBEAT]: { position: number };
    [SERVER_EVENTS.VIDEO_CHANGED]: { videoUrl: string; videoTitle: string; videoThumbnail: string | null };
    [SERVER_EVENTS.USER_KICKED]: { roomId: string; reason: string };
    [SERVER_EVENTS.ROOM_CLOSED]: { roomId: string; reason: string };
    [SERVER_EVENTS.SYNC_MODE_CHANGED]: { syncMode: SyncMode };
    [SERVER_EVENTS.ERROR]: { message: string };
};

export type ServerEventName = keyof ServerEventPayloads;

/**
 * Único canal de salida hacia los clientes: lo usan la sesión y los procesos de fondo
 */
export interface RoomNotifier {
    toRoom<E extends ServerEventName>(roomId: string, event: E, payload: ServerEventPayloads[E]): void;
    toRoomExcept<E extends ServerEventName>(roomId: string, excludedConnectionId: string, event: E, payload: ServerEventPayloads[E]): void;
    toConnection<E extends ServerEventName>(connectionId: string, event: E, payload: ServerEventPayloads[E]): void;
    /** Suma la conexión al grupo de difusión de la sala */
    attach(connectionId: string, roomId: string): void;
    detach(connectionId: string, roomId: string): void;
}
