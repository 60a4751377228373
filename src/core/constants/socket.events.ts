// src/core/constants/socket.events.ts

/**
 * Eventos de Socket.IO del servidor de salas
 * Centralizados para evitar strings hardcodeados
 */

/**
 * Acciones que envían los clientes
 */
export const CLIENT_EVENTS = {
    JOIN_ROOM: 'room:join',
    LEAVE_ROOM: 'room:leave',
    CLOSE_ROOM: 'room:close',
    REQUEST_PARTICIPANTS: 'room:participants',
    UPDATE_SYNC_MODE: 'room:syncMode',
    SEND_MESSAGE: 'chat:send',
    CHANGE_VIDEO: 'video:change',
    PLAY: 'playback:play',
    PAUSE: 'playback:pause',
    SEEK: 'playback:seek',
    REPORT_POSITION: 'playback:report',
    REQUEST_SYNC: 'playback:requestSync',
    TRANSFER_CONTROL: 'control:transfer',
    KICK_USER: 'participant:kick',
} as const;

/**
 * Notificaciones que emite el servidor
 */
export const SERVER_EVENTS = {
    ROOM_JOINED: 'room:joined',
    ROOM_LEFT: 'room:left',
    PARTICIPANT_JOINED_NOTICE: 'participant:joinedNotice',
    PARTICIPANT_LEFT_NOTICE: 'participant:leftNotice',
    ROOM_PARTICIPANTS: 'room:participants',
    CHAT_HISTORY: 'chat:history',
    CHAT_MESSAGE: 'chat:message',
    CONTROL_TRANSFERRED: 'control:transferred',
    PLAYBACK_UPDATE: 'playback:update',
    FORCE_SYNC: 'playback:forceSync',
    HEARTBEAT: 'playback:heartbeat',
    VIDEO_CHANGED: 'video:changed',
    USER_KICKED: 'participant:kicked',
    ROOM_CLOSED: 'room:closed',
    SYNC_MODE_CHANGED: 'room:syncModeChanged',
    ERROR: 'session:error',
} as const;

export type ClientEvent = typeof CLIENT_EVENTS[keyof typeof CLIENT_EVENTS];

export type ServerEvent = typeof SERVER_EVENTS[keyof typeof SERVER_EVENTS];
