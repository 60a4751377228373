// src/storage/serialization.ts

import { z } from 'zod';
import { ChatMessage, Participant } from '../core/domain';

/**
 * Formato persistido de participantes y mensajes (JSON)
 */
const participantRecord = z.object({
    id: z.string(),
    connectionId: z.string(),
    displayName: z.string(),
    avatarUrl: z.string().nullable(),
    hasControl: z.boolean(),
    joinedAt: z.number()
});

const chatMessageRecord = z.object({
    id: z.string(),
    senderId: z.string(),
    senderName: z.string(),
    avatarUrl: z.string().nullable(),
    content: z.string(),
    sentAt: z.number()
});

export function encode(value: Participant | ChatMessage): string {
    return JSON.stringify(value);
}

export function decodeParticipant(raw: string): Participant | null {
    return decode(raw, participantRecord);
}

export function decodeMessage(raw: string): ChatMessage | null {
    return decode(raw, chatMessageRecord);
}

function decode<T>(raw: string, schema: z.ZodType<T>): T | null {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch (error) {
        console.warn('⚠️ Registro con JSON inválido descartado:', error);
        return null;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        console.warn('⚠️ Registro con formato inesperado descartado:', parsed.error.issues);
        return null;
    }
    return parsed.data;
}
