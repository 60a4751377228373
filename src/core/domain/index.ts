// src/core/domain/index.ts

/**
 * Módulo central de tipos de dominio
 */

export * from './participant.types';
export * from './chat.types';
export * from './room.types';
export * from './session.types';
export * from './notification.types';
