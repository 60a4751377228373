// src/config/env.config.ts

/**
 * Configuración de variables de entorno
 */

/**
 * Puerto del servidor
 */
export const PORT = Number(process.env.PORT) || 3000;

/**
 * Entorno de ejecución
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Origen permitido para CORS (Express y Socket.IO)
 */
export const CORS_ORIGIN = process.env.CORS_ORIGIN || '*';

/**
 * Conexión a Redis. Si está vacía se usa el almacenamiento en memoria
 */
export const REDIS_URL = process.env.REDIS_URL || '';

/**
 * Cada cuántos minutos se purgan las salas vacías
 */
export const CLEANUP_INTERVAL_MINUTES = Number(process.env.CLEANUP_INTERVAL_MINUTES) || 10;
