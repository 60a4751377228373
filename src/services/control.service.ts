// src/services/control.service.ts

import { Participant, UserIdentity } from '../core/domain';
import { notFound, permissionDenied } from '../core/errors/room.errors';
import { assignController, findController, repairControl } from '../core/rules/control.rules';
import { RoomState, RosterChange } from './room-state.store';

/**
 * Resultado de una transición del rol de controlador
 */
export type ControlChange = {
    controller: Participant | null;
    changed: boolean;   // true si el controlador es otro que antes de la transición
};

export type Departure = {
    removed: Participant | null;
    remaining: number;
    change: ControlChange;
};

/**
 * Protocolo de transferencia del control de reproducción.
 * Trabaja sobre una sala ya bloqueada (RoomStateStore.withRoom); cada alta o baja
 * se escribe junto con su cambio de controlador en una sola transición del registro.
 */
export class ControlService {
    /**
     * Alta de un participante nuevo.
     * Primera persona en una sala vacía: recibe el control.
     * Administrador entrando a una sala con otro controlador: se lo queda él.
     */
    async admit(room: RoomState, newcomer: Omit<Participant, 'hasControl'>, isAdmin: boolean): Promise<ControlChange> {
        const roster = await room.update(participants => {
            const joined = [...participants, { ...newcomer, hasControl: participants.length === 0 }];
            return repairControl(isAdmin ? assignController(joined, newcomer.id) : joined);
        });

        const change = describeChange(roster);
        if (isAdmin && roster.before.length > 0 && change.changed) {
            console.log(`👑 El administrador ${newcomer.id} toma el control de la sala ${room.roomId}`);
        }
        return change;
    }

    /**
     * Reconexión: nueva conexión, misma identidad. No toca hasControl ni joinedAt.
     */
    async reconnect(room: RoomState, existing: Participant, connectionId: string, user: UserIdentity) {
        const resumed: Participant = {
            ...existing,
            connectionId,
            displayName: user.displayName,
            avatarUrl: user.avatarUrl
        };

        const roster = await room.update(participants =>
            repairControl([...participants.filter(p => p.id !== existing.id), resumed])
        );

        const participant = roster.after.find(p => p.id === existing.id) ?? resumed;
        return { participant, change: describeChange(roster) };
    }

    /**
     * Transferencia explícita pedida por el administrador o el controlador actual
     */
    async transfer(room: RoomState, requesterId: string, targetId: string, requesterIsAdmin: boolean): Promise<ControlChange> {
        const requester = await room.get(requesterId);
        if (!requesterIsAdmin && !requester?.hasControl) {
            throw permissionDenied('Solo el administrador o quien tiene el control puede transferirlo.');
        }

        const target = await room.get(targetId);
        if (!target) {
            throw notFound('El participante indicado no está en la sala.');
        }

        return describeChange(await room.update(participants => assignController(participants, targetId)));
    }

    /**
     * Baja de un participante (salida, desconexión o expulsión) con sucesión del control
     */
    async release(room: RoomState, participantId: string): Promise<Departure> {
        const roster = await room.update(participants =>
            repairControl(participants.filter(p => p.id !== participantId))
        );

        const removed = roster.before.find(p => p.id === participantId) ?? null;
        const change = describeChange(roster);
        if (removed?.hasControl && change.controller) {
            console.log(`🔁 Control de la sala ${room.roomId} transferido a ${change.controller.id}`);
        }

        return { removed, remaining: roster.after.length, change };
    }
}

function describeChange({ before, after }: RosterChange): ControlChange {
    const previous = findController(before);
    const controller = findController(after);
    return { controller, changed: controller !== null && controller.id !== previous?.id };
}
