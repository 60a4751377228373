// src/core/domain/chat.types.ts

/**
 * Mensaje de chat. Inmutable una vez creado
 */
export type ChatMessage = {
    id: string;
    senderId: string;        // SYSTEM_SENDER_ID para avisos del sistema
    senderName: string;
    avatarUrl: string | null;
    content: string;
    sentAt: number;          // epoch ms
};

export type ChatMessageView = Omit<ChatMessage, 'sentAt'> & {
    sentAt: string;
    isSystem: boolean;
};
