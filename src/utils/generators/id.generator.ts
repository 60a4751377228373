// src/utils/generators/id.generator.ts

import { nanoid } from 'nanoid';
import { INVITE_CODE_LENGTH } from '../../config/constants';

/**
 * Utilidades para generación de identificadores únicos
 */

/**
 * Genera un código de invitación aleatorio
 * @param length Longitud del código (por defecto 8)
 * @returns Código en mayúsculas
 * @example generateInviteCode() // "QWERTYUP"
 */
export function generateInviteCode(length = INVITE_CODE_LENGTH): string {
    const chars = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
    let code = '';
    for (let i = 0; i < length; i++) {
        code += chars[Math.floor(Math.random() * chars.length)];
    }
    return code;
}

export function generateRoomId(): string {
    return `room_${nanoid(12)}`;
}

export function generateMessageId(): string {
    return nanoid();
}
