// src/utils/mappers/room.mappers.ts

import { ChatMessage, ChatMessageView, Participant, ParticipantSnapshot } from '../../core/domain';
import { SYSTEM_SENDER_ID, SYSTEM_SENDER_NAME } from '../../config/constants';
import { generateMessageId } from '../generators/id.generator';

export function toParticipantSnapshot(participant: Participant, adminId: string | null): ParticipantSnapshot {
    return {
        id: participant.id,
        displayName: participant.displayName,
        avatarUrl: participant.avatarUrl,
        hasControl: participant.hasControl,
        joinedAt: new Date(participant.joinedAt).toISOString(),
        isAdmin: participant.id === adminId
    };
}

export function toMessageView(message: ChatMessage): ChatMessageView {
    return {
        ...message,
        sentAt: new Date(message.sentAt).toISOString(),
        isSystem: message.senderId === SYSTEM_SENDER_ID
    };
}

export function createChatMessage(sender: Participant, content: string, sentAt: number): ChatMessage {
    return {
        id: generateMessageId(),
        senderId: sender.id,
        senderName: sender.displayName,
        avatarUrl: sender.avatarUrl,
        content,
        sentAt
    };
}

export function createSystemMessage(content: string, sentAt: number): ChatMessage {
    return {
        id: generateMessageId(),
        senderId: SYSTEM_SENDER_ID,
        senderName: SYSTEM_SENDER_NAME,
        avatarUrl: null,
        content,
        sentAt
    };
}
