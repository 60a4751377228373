// src/sockets/schemas.ts

import { z } from 'zod';

/**
 * Payloads de los eventos de cliente
 */

const roomId = z.string().trim().min(1, 'Falta el id de la sala');

export const roomSchema = z.object({ roomId });

export const joinRoomSchema = z.object({
    roomId,
    password: z.string().optional()
});

export const syncModeSchema = z.object({
    roomId,
    mode: z.string()
});

export const sendMessageSchema = z.object({
    roomId,
    text: z.string()
});

export const changeVideoSchema = z.object({
    roomId,
    url: z.string(),
    title: z.string().default(''),
    thumbnail: z.string().nullish()
});

export const positionSchema = z.object({
    roomId,
    position: z.number()
});

export const transferControlSchema = z.object({
    roomId,
    targetParticipantId: z.string().min(1)
});

export const kickUserSchema = z.object({
    roomId,
    targetUserId: z.string().min(1)
});
