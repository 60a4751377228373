// src/config/constants.ts
export const MAX_MESSAGES_PER_ROOM = 50;
export const MAX_CHAT_MESSAGE_LENGTH = 1000;
export const INVITE_CODE_LENGTH = 8;

// Expiración de los datos de una sala mientras tiene participantes (en horas)
export const ROOM_EXPIRY_HOURS = 24;

// Tiempo de gracia antes de purgar una sala vacía (en horas)
export const EMPTY_ROOM_GRACE_HOURS = 3;

// Reconciliación de posiciones
export const POSITION_TOLERANCE_SECONDS = 3.0;
export const REPORT_QUORUM_RATIO = 0.8;
export const MIN_POSITION_REPORTS = 2;

// Remitente reservado para los mensajes del sistema
export const SYSTEM_SENDER_ID = 'system';
export const SYSTEM_SENDER_NAME = 'Sistema';

export const HOUR_MS = 60 * 60 * 1000;
