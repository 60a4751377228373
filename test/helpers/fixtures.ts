// test/helpers/fixtures.ts

import { Participant, SessionContext } from '../../src/core/domain';

export function participant(id: string, joinedAt: number, overrides: Partial<Participant> = {}): Participant {
    return {
        id,
        connectionId: `conn-${id}`,
        displayName: id.toUpperCase(),
        avatarUrl: null,
        hasControl: false,
        joinedAt,
        ...overrides
    };
}

export function contextFor(userId: string, displayName: string, connectionId = `conn-${userId}`): SessionContext {
    return {
        connectionId,
        user: { id: userId, displayName, avatarUrl: null }
    };
}
